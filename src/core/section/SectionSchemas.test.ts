import { describe, expect, it } from 'vitest';

import { findGeometryIssues, ShapeDimensionsSchema } from './SectionSchemas';

describe('findGeometryIssues', () => {
  it('accepts valid sections of every kind', () => {
    expect(findGeometryIssues({ kind: 'rod', radius: 1 })).toEqual([]);
    expect(findGeometryIssues({ kind: 'pipe', outerRadius: 1, thickness: 0.1 })).toEqual([]);
    expect(findGeometryIssues({ kind: 'rectangle', width: 2, height: 3 })).toEqual([]);
    expect(findGeometryIssues({ kind: 'boxBeam', width: 2, height: 3, thickness: 0.2 })).toEqual([]);
    expect(findGeometryIssues({
      kind: 'iBeam', width: 2, height: 3, webThickness: 0.2, flangeThickness: 0.3,
    })).toEqual([]);
  });

  it('accepts a zero-size void', () => {
    expect(findGeometryIssues({ kind: 'pipe', outerRadius: 1, thickness: 1 })).toEqual([]);
    expect(findGeometryIssues({
      kind: 'iBeam', width: 2, height: 2, webThickness: 1, flangeThickness: 1,
    })).toEqual([]);
  });

  it('reports each violated I-beam constraint', () => {
    expect(findGeometryIssues({
      kind: 'iBeam', width: 2, height: 2, webThickness: 3, flangeThickness: 1.5,
    })).toEqual([
      'webThickness must not exceed width',
      '2 * flangeThickness must not exceed height',
    ]);
  });

  it('reports a box beam whose walls overlap', () => {
    expect(findGeometryIssues({ kind: 'boxBeam', width: 2, height: 6, thickness: 1.5 })).toEqual([
      '2 * thickness must not exceed min(width, height)',
    ]);
  });

  it('reports non-positive outer dimensions', () => {
    expect(findGeometryIssues({ kind: 'rectangle', width: 0, height: 1 })).toEqual([
      'width must be positive',
    ]);
  });

  it('reports pipe and box beam walls of zero thickness', () => {
    expect(findGeometryIssues({ kind: 'pipe', outerRadius: 1, thickness: 0 })).toEqual([
      'thickness must be positive',
    ]);
    expect(findGeometryIssues({ kind: 'boxBeam', width: 2, height: 3, thickness: 0 })).toEqual([
      'thickness must be positive',
    ]);
  });

  it('reports NaN', () => {
    expect(findGeometryIssues({ kind: 'rod', radius: NaN })).toEqual(['radius must be a number']);
  });
});

describe('ShapeDimensionsSchema', () => {
  it('rejects unknown kinds', () => {
    expect(ShapeDimensionsSchema.safeParse({ kind: 'tee', width: 1 }).success).toBe(false);
  });

  it('parses plain data into typed dimensions', () => {
    const parsed = ShapeDimensionsSchema.parse({ kind: 'pipe', outerRadius: 0.5, thickness: 0.05 });

    expect(parsed.kind).toBe('pipe');
    if (parsed.kind === 'pipe') {
      expect(parsed.outerRadius - parsed.thickness).toBeCloseTo(0.45, 12);
    }
  });
});
