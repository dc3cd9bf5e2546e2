/**
 * Parallel axis theorem and centroid helpers
 *
 * I = I_c + A * d²   (moment about an axis at distance d from the centroidal axis)
 * x̄ = Σ(s * A * x) / Σ(s * A)   (signed-area-weighted centroid)
 */

import { Point2D } from './Geometry2D';
import { DegenerateCompositeError } from './SectionErrors';
import { DEFAULT_SECTION_CONFIG } from './SectionConfig';

/** +1 for added material, -1 for removed material */
export type Sign = 1 | -1;

export interface CentroidTerm {
  sign: Sign;
  area: number;
  centroid: Point2D;
}

/**
 * Shift a centroidal moment to a parallel axis at `offset`.
 */
export function parallelAxis(centroidalMoment: number, area: number, offset: number): number {
  return centroidalMoment + area * offset * offset;
}

/**
 * Inverse of parallelAxis: bring a moment about an offset axis back to the centroid.
 */
export function removeParallelAxis(moment: number, area: number, offset: number): number {
  return moment - area * offset * offset;
}

export function combineSigns(a: Sign, b: Sign): Sign {
  return a === b ? 1 : -1;
}

/**
 * Signed-area-weighted centroid of a set of terms.
 * Throws DegenerateCompositeError when the net area is zero, or smaller than
 * `tolerance` times the gross area.
 */
export function weightedCentroid(
  terms: Iterable<CentroidTerm>,
  tolerance: number = DEFAULT_SECTION_CONFIG.degenerateAreaTolerance
): Point2D {
  let netArea = 0;
  let grossArea = 0;
  let Qx = 0;  // Σ A*y
  let Qy = 0;  // Σ A*x

  for (const term of terms) {
    const A = term.sign * term.area;
    netArea += A;
    grossArea += Math.abs(term.area);
    Qx += A * term.centroid.y;
    Qy += A * term.centroid.x;
  }

  if (netArea === 0 || Math.abs(netArea) <= tolerance * grossArea) {
    throw new DegenerateCompositeError(netArea, grossArea);
  }

  return new Point2D(Qy / netArea, Qx / netArea);
}
