import { describe, expect, it } from 'vitest';

import { Point2D } from './Geometry2D';
import { combineSigns, parallelAxis, removeParallelAxis, weightedCentroid } from './ParallelAxis';
import { DegenerateCompositeError } from './SectionErrors';

describe('parallelAxis', () => {
  it('adds A*d²', () => {
    expect(parallelAxis(10, 4, 3)).toBe(46);
  });

  it('ignores the sign of the offset', () => {
    expect(parallelAxis(10, 4, -3)).toBe(parallelAxis(10, 4, 3));
  });

  it('is undone by removeParallelAxis', () => {
    expect(removeParallelAxis(46, 4, 3)).toBe(10);
  });
});

describe('combineSigns', () => {
  it('multiplies signs', () => {
    expect(combineSigns(1, 1)).toBe(1);
    expect(combineSigns(1, -1)).toBe(-1);
    expect(combineSigns(-1, 1)).toBe(-1);
    expect(combineSigns(-1, -1)).toBe(1);
  });
});

describe('weightedCentroid', () => {
  it('weights centroids by signed area', () => {
    const cog = weightedCentroid([
      { sign: 1, area: 6, centroid: new Point2D(0, 0) },
      { sign: 1, area: 2, centroid: new Point2D(4, 8) },
    ]);

    expect(cog.x).toBe(1);
    expect(cog.y).toBe(2);
  });

  it('moves away from removed material', () => {
    const cog = weightedCentroid([
      { sign: 1, area: 10, centroid: new Point2D(0, 0) },
      { sign: -1, area: 5, centroid: new Point2D(2, 0) },
    ]);

    expect(cog.x).toBe(-2);
  });

  it('throws on zero net area', () => {
    expect(() => weightedCentroid([
      { sign: 1, area: 3, centroid: new Point2D(1, 1) },
      { sign: -1, area: 3, centroid: new Point2D(2, 2) },
    ])).toThrow(DegenerateCompositeError);
  });

  it('throws when the net area vanishes relative to the gross area', () => {
    const terms = [
      { sign: 1 as const, area: 1, centroid: new Point2D(0, 0) },
      { sign: -1 as const, area: 1 - 1e-9, centroid: new Point2D(0, 0) },
    ];

    expect(() => weightedCentroid(terms, 1e-6)).toThrow(DegenerateCompositeError);
    expect(() => weightedCentroid(terms, 1e-12)).not.toThrow();
  });
});
