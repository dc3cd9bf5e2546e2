import { describe, expect, it } from 'vitest';

import { Point2D } from './Geometry2D';

describe('Point2D', () => {
  it('adds, subtracts and scales', () => {
    const a = new Point2D(1, 2);
    const b = new Point2D(3, -1);

    expect(a.add(b)).toEqual(new Point2D(4, 1));
    expect(a.subtract(b)).toEqual(new Point2D(-2, 3));
    expect(a.scale(2)).toEqual(new Point2D(2, 4));
    expect(a.negate()).toEqual(new Point2D(-1, -2));
  });

  it('turns a quarter turn counter-clockwise', () => {
    const turned = new Point2D(3, 1).rotate90();

    expect(turned.x).toBe(-1);
    expect(turned.y).toBe(3);
  });

  it('compares within a tolerance', () => {
    expect(new Point2D(1, 1).equals(new Point2D(1 + 1e-12, 1))).toBe(true);
    expect(new Point2D(1, 1).equals(new Point2D(1.1, 1), 0.05)).toBe(false);
  });

  it('clones without sharing state', () => {
    const p = new Point2D(1, 2);
    const copy = p.clone();
    copy.x = 9;

    expect(p.x).toBe(1);
  });

  it('prints as a coordinate pair', () => {
    expect(new Point2D(2, 1.5).toString()).toBe('(2, 1.5)');
  });
});
