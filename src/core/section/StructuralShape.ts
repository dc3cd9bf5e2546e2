/**
 * StructuralShape - primitive cross-sections
 *
 * Five closed-form families, each carrying the centroid of the section in a
 * shared reference frame:
 * - rod:       solid circle (radius)
 * - pipe:      hollow circle (outerRadius, thickness)
 * - rectangle: solid rectangle (width, height)
 * - boxBeam:   hollow rectangle (width, height, thickness)
 * - iBeam:     I-section (width, height, webThickness, flangeThickness)
 *
 * Moments of inertia are about the global axes through the frame origin,
 * i.e. they include the parallel axis term A * d² for the stored centroid.
 *
 * Only the rod and the rectangle have their own formulas. Pipe, box beam and
 * I-beam are expressed as composites of those two, and every y-axis moment is
 * the x-axis moment of the section turned a quarter turn.
 */

import { ConsoleService } from '../console/ConsoleService';
import { CompositeShape } from './CompositeShape';
import { Point2D } from './Geometry2D';
import { parallelAxis } from './ParallelAxis';
import { resolveSectionConfig, type ISectionConfig } from './SectionConfig';
import { InvalidGeometryError } from './SectionErrors';
import { findGeometryIssues, type ShapeDimensions, type ShapeKind } from './SectionSchemas';

export class StructuralShape {
  readonly dimensions: Readonly<ShapeDimensions>;
  private cog: Point2D;

  private constructor(
    dimensions: ShapeDimensions,
    centerOfGravity: Point2D,
    private readonly config: ISectionConfig
  ) {
    this.dimensions = Object.freeze({ ...dimensions });
    this.cog = centerOfGravity.clone();
  }

  /**
   * Build a shape from its dimensions. With `validateGeometry` on (the default)
   * dimensions that cannot form a real section throw InvalidGeometryError.
   */
  static create(
    dimensions: ShapeDimensions,
    centerOfGravity: Point2D = Point2D.origin(),
    config?: Partial<ISectionConfig>
  ): StructuralShape {
    const resolved = resolveSectionConfig(config);

    if (resolved.validateGeometry) {
      const issues = findGeometryIssues(dimensions);
      if (issues.length > 0) {
        const error = new InvalidGeometryError(dimensions, issues);
        if (resolved.logOperations) ConsoleService.error(error.message);
        throw error;
      }
    }

    const shape = new StructuralShape(dimensions, centerOfGravity, resolved);
    if (!resolved.validateGeometry && resolved.logOperations && shape.area() <= 0) {
      ConsoleService.warn(`unchecked ${dimensions.kind} has non-positive area ${shape.area()}`);
    }
    return shape;
  }

  static rod(radius: number, centerOfGravity?: Point2D, config?: Partial<ISectionConfig>): StructuralShape {
    return StructuralShape.create({ kind: 'rod', radius }, centerOfGravity, config);
  }

  static pipe(
    outerRadius: number,
    thickness: number,
    centerOfGravity?: Point2D,
    config?: Partial<ISectionConfig>
  ): StructuralShape {
    return StructuralShape.create({ kind: 'pipe', outerRadius, thickness }, centerOfGravity, config);
  }

  static rectangle(
    width: number,
    height: number,
    centerOfGravity?: Point2D,
    config?: Partial<ISectionConfig>
  ): StructuralShape {
    return StructuralShape.create({ kind: 'rectangle', width, height }, centerOfGravity, config);
  }

  static boxBeam(
    width: number,
    height: number,
    thickness: number,
    centerOfGravity?: Point2D,
    config?: Partial<ISectionConfig>
  ): StructuralShape {
    return StructuralShape.create({ kind: 'boxBeam', width, height, thickness }, centerOfGravity, config);
  }

  static iBeam(
    width: number,
    height: number,
    webThickness: number,
    flangeThickness: number,
    centerOfGravity?: Point2D,
    config?: Partial<ISectionConfig>
  ): StructuralShape {
    return StructuralShape.create(
      { kind: 'iBeam', width, height, webThickness, flangeThickness },
      centerOfGravity,
      config
    );
  }

  get kind(): ShapeKind {
    return this.dimensions.kind;
  }

  /** Copy of the stored centroid */
  get centerOfGravity(): Point2D {
    return this.cog.clone();
  }

  setCenterOfGravity(centerOfGravity: Point2D): void {
    this.cog = centerOfGravity.clone();
  }

  withCenterOfGravity(centerOfGravity: Point2D): StructuralShape {
    return new StructuralShape(this.dimensions, centerOfGravity, this.config);
  }

  clone(): StructuralShape {
    return this.withCenterOfGravity(this.cog);
  }

  // Parts of a decomposition may have zero size, so they skip validation
  private part(dimensions: ShapeDimensions, centerOfGravity: Point2D): StructuralShape {
    return new StructuralShape(dimensions, centerOfGravity, this.config);
  }

  area(): number {
    const d = this.dimensions;
    switch (d.kind) {
      case 'rod':
        return Math.PI * d.radius ** 2;
      case 'pipe':
        return Math.PI * (d.outerRadius ** 2 - (d.outerRadius - d.thickness) ** 2);
      case 'rectangle':
        return d.width * d.height;
      case 'boxBeam':
        return d.width * d.height - (d.width - 2 * d.thickness) * (d.height - 2 * d.thickness);
      case 'iBeam':
        return d.width * d.height - (d.height - 2 * d.flangeThickness) * (d.width - d.webThickness);
    }
  }

  /**
   * Express the section as a composite of rods and rectangles sharing this frame.
   * - pipe    = rod(R) - rod(R - t)
   * - boxBeam = rectangle(W, H) - rectangle(W - 2t, H - 2t)
   * - iBeam   = rectangle(W, H) - 2 * rectangle((W - tw) / 2, H - 2tf), voids at x ± (W + tw) / 4
   * Rods and rectangles decompose into themselves.
   */
  decompose(): CompositeShape {
    const d = this.dimensions;
    const composite = new CompositeShape(this.config);

    switch (d.kind) {
      case 'pipe':
        return composite
          .add(this.part({ kind: 'rod', radius: d.outerRadius }, this.cog))
          .sub(this.part({ kind: 'rod', radius: d.outerRadius - d.thickness }, this.cog));
      case 'boxBeam':
        return composite
          .add(this.part({ kind: 'rectangle', width: d.width, height: d.height }, this.cog))
          .sub(this.part({
            kind: 'rectangle',
            width: d.width - 2 * d.thickness,
            height: d.height - 2 * d.thickness,
          }, this.cog));
      case 'iBeam': {
        const voidWidth = (d.width - d.webThickness) / 2;
        const voidHeight = d.height - 2 * d.flangeThickness;
        const voidOffset = new Point2D((d.width + d.webThickness) / 4, 0);
        const voidShape = { kind: 'rectangle', width: voidWidth, height: voidHeight } as const;
        return composite
          .add(this.part({ kind: 'rectangle', width: d.width, height: d.height }, this.cog))
          .sub(this.part(voidShape, this.cog.subtract(voidOffset)))
          .sub(this.part(voidShape, this.cog.add(voidOffset)));
      }
      case 'rod':
      case 'rectangle':
        return composite.add(this);
    }
  }

  /**
   * The section turned a quarter turn about the frame origin, as a composite.
   * Widths and heights swap and the centroid maps (x, y) -> (-y, x).
   * An I-beam on its side is no longer an I-beam, so it turns its decomposition.
   */
  rotated(): CompositeShape {
    const d = this.dimensions;
    const cog = this.cog.rotate90();
    const composite = new CompositeShape(this.config);

    switch (d.kind) {
      case 'rod':
      case 'pipe':
        return composite.add(this.part(d, cog));
      case 'rectangle':
        return composite.add(this.part({ kind: 'rectangle', width: d.height, height: d.width }, cog));
      case 'boxBeam':
        return composite.add(this.part({ ...d, width: d.height, height: d.width }, cog));
      case 'iBeam':
        return this.decompose().rotated();
    }
  }

  /** Second moment of area about the global x-axis */
  momentOfInertiaX(): number {
    const d = this.dimensions;
    switch (d.kind) {
      case 'rod':
        return parallelAxis(Math.PI * d.radius ** 4 / 4, this.area(), this.cog.y);
      case 'rectangle':
        return parallelAxis(d.width * d.height ** 3 / 12, this.area(), this.cog.y);
      case 'pipe':
      case 'boxBeam':
      case 'iBeam':
        return this.decompose().momentOfInertiaX();
    }
  }

  /** Second moment of area about the global y-axis */
  momentOfInertiaY(): number {
    return this.rotated().momentOfInertiaX();
  }

  /** J = Ixx + Iyy about the frame origin */
  polarMomentOfInertia(): number {
    return this.momentOfInertiaX() + this.momentOfInertiaY();
  }

  centroidalMomentOfInertiaX(): number {
    return this.withCenterOfGravity(Point2D.origin()).momentOfInertiaX();
  }

  centroidalMomentOfInertiaY(): number {
    return this.withCenterOfGravity(Point2D.origin()).momentOfInertiaY();
  }

  /** Ixx about a horizontal axis at distance `offset` from the centroid */
  momentOfInertiaXAbout(offset: number): number {
    return parallelAxis(this.centroidalMomentOfInertiaX(), this.area(), offset);
  }

  /** Iyy about a vertical axis at distance `offset` from the centroid */
  momentOfInertiaYAbout(offset: number): number {
    return parallelAxis(this.centroidalMomentOfInertiaY(), this.area(), offset);
  }

  /** Distance from the centroid to the outermost fibre, measured along x and along y */
  extremeFiber(): { x: number; y: number } {
    const d = this.dimensions;
    switch (d.kind) {
      case 'rod':
        return { x: d.radius, y: d.radius };
      case 'pipe':
        return { x: d.outerRadius, y: d.outerRadius };
      case 'rectangle':
      case 'boxBeam':
      case 'iBeam':
        return { x: d.width / 2, y: d.height / 2 };
    }
  }

  /** Elastic section modulus for bending about the x-axis: Wx = Ixx_c / (H / 2) */
  sectionModulusX(): number {
    return this.centroidalMomentOfInertiaX() / this.extremeFiber().y;
  }

  /** Elastic section modulus for bending about the y-axis */
  sectionModulusY(): number {
    return this.centroidalMomentOfInertiaY() / this.extremeFiber().x;
  }

  radiusOfGyrationX(): number {
    return Math.sqrt(this.centroidalMomentOfInertiaX() / this.area());
  }

  radiusOfGyrationY(): number {
    return Math.sqrt(this.centroidalMomentOfInertiaY() / this.area());
  }
}
