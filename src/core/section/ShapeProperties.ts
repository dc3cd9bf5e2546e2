/**
 * ShapeProperties - one-call summary of a primitive or composite section
 */

import { CompositeShape } from './CompositeShape';
import { StructuralShape } from './StructuralShape';

/** Calculated shape properties */
export interface ShapePropertiesResult {
  A: number;              // Area [unit²]

  // Centroid coordinates
  xc: number;             // Centroid x-coordinate [unit]
  yc: number;             // Centroid y-coordinate [unit]

  // Second moments of area about the frame origin
  Ixx: number;            // Moment of inertia about x-axis [unit⁴]
  Iyy: number;            // Moment of inertia about y-axis [unit⁴]
  J: number;              // Polar moment Ixx + Iyy [unit⁴]

  // Centroidal moments of inertia
  Ixx_c: number;          // [unit⁴]
  Iyy_c: number;          // [unit⁴]

  // Radii of gyration
  rx: number;             // [unit]
  ry: number;             // [unit]

  // Elastic section moduli, primitives only (a composite has no single outline)
  Wx?: number;            // [unit³]
  Wy?: number;            // [unit³]
}

export function calculateShapeProperties(section: StructuralShape | CompositeShape): ShapePropertiesResult {
  const A = section.area();
  const Ixx = section.momentOfInertiaX();
  const Iyy = section.momentOfInertiaY();
  const Ixx_c = section.centroidalMomentOfInertiaX();
  const Iyy_c = section.centroidalMomentOfInertiaY();
  const { x: xc, y: yc } = section instanceof CompositeShape
    ? section.calculateCenterOfGravity()
    : section.centerOfGravity;

  const result: ShapePropertiesResult = {
    A,
    xc, yc,
    Ixx, Iyy,
    J: Ixx + Iyy,
    Ixx_c, Iyy_c,
    rx: A > 0 ? Math.sqrt(Ixx_c / A) : 0,
    ry: A > 0 ? Math.sqrt(Iyy_c / A) : 0,
  };

  if (section instanceof StructuralShape) {
    result.Wx = section.sectionModulusX();
    result.Wy = section.sectionModulusY();
  }

  return result;
}
