/**
 * CompositeShape - signed superposition of primitive sections
 *
 * A composite is an ordered list of (sign, shape) members. Solid material is
 * added with sign +1 and voids are subtracted with sign -1:
 *
 *   A   = Σ s * A_i
 *   Ixx = Σ s * Ixx_i      (each member already carries its own A_i * y_i² term)
 *   Iyy = Σ s * Iyy_i
 *
 * Members are copied in, so later changes to the caller's shape do not leak
 * into the composite. updateCenterOfGravity() is the only operation that
 * changes existing members.
 */

import { ConsoleService } from '../console/ConsoleService';
import type { Point2D } from './Geometry2D';
import { combineSigns, removeParallelAxis, weightedCentroid, type Sign } from './ParallelAxis';
import { resolveSectionConfig, type ISectionConfig } from './SectionConfig';
import type { StructuralShape } from './StructuralShape';

export interface CompositeMember {
  readonly sign: Sign;
  readonly shape: StructuralShape;
}

export class CompositeShape {
  private readonly entries: CompositeMember[] = [];
  private readonly config: ISectionConfig;

  constructor(config?: Partial<ISectionConfig>) {
    this.config = resolveSectionConfig(config);
  }

  /** Add a copy of `shape` as solid material */
  add(shape: StructuralShape): this {
    return this.push(1, shape);
  }

  /** Subtract a copy of `shape` as a void */
  sub(shape: StructuralShape): this {
    return this.push(-1, shape);
  }

  private push(sign: Sign, shape: StructuralShape): this {
    this.entries.push({ sign, shape: shape.clone() });
    return this;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * Members in insertion order. The shapes are copies: moving one does not
   * move the member inside the composite.
   */
  members(): readonly CompositeMember[] {
    return this.entries.map(({ sign, shape }) => ({ sign, shape: shape.clone() }));
  }

  area(): number {
    return this.sum(shape => shape.area());
  }

  /** Second moment about the global x-axis */
  momentOfInertiaX(): number {
    return this.sum(shape => shape.momentOfInertiaX());
  }

  /** Second moment about the global y-axis */
  momentOfInertiaY(): number {
    return this.sum(shape => shape.momentOfInertiaY());
  }

  polarMomentOfInertia(): number {
    return this.momentOfInertiaX() + this.momentOfInertiaY();
  }

  private sum(property: (shape: StructuralShape) => number): number {
    return this.entries.reduce((total, { sign, shape }) => total + sign * property(shape), 0);
  }

  calculateCenterOfGravity(): Point2D {
    return weightedCentroid(
      this.entries.map(({ sign, shape }) => ({
        sign,
        area: shape.area(),
        centroid: shape.centerOfGravity,
      })),
      this.config.degenerateAreaTolerance
    );
  }

  /**
   * Move the frame origin to the composite centroid: every direct member's
   * centroid is shifted by minus the composite centroid, in place.
   * Returns the shift that was applied.
   */
  updateCenterOfGravity(): Point2D {
    const cog = this.calculateCenterOfGravity();

    for (const { shape } of this.entries) {
      shape.setCenterOfGravity(shape.centerOfGravity.subtract(cog));
    }

    if (this.config.logOperations) {
      ConsoleService.log(`composite recentred by ${cog.toString()} over ${this.entries.length} members`);
    }

    return cog;
  }

  /** Ixx about the horizontal axis through the composite centroid */
  centroidalMomentOfInertiaX(): number {
    return removeParallelAxis(this.momentOfInertiaX(), this.area(), this.calculateCenterOfGravity().y);
  }

  /** Iyy about the vertical axis through the composite centroid */
  centroidalMomentOfInertiaY(): number {
    return removeParallelAxis(this.momentOfInertiaY(), this.area(), this.calculateCenterOfGravity().x);
  }

  /**
   * Copy of this composite turned a quarter turn about the origin.
   * Its x-axis moment equals this composite's y-axis moment.
   */
  rotated(): CompositeShape {
    const turned = new CompositeShape(this.config);

    for (const { sign, shape } of this.entries) {
      for (const part of shape.rotated().members()) {
        turned.push(combineSigns(sign, part.sign), part.shape);
      }
    }

    return turned;
  }
}
