/**
 * 2D coordinates for section centroids.
 * All shapes share one reference frame; its origin is where the global x- and y-axes cross.
 */

/** 2D Point */
export class Point2D {
  constructor(public x: number, public y: number) {}

  static origin(): Point2D {
    return new Point2D(0, 0);
  }

  add(other: Point2D): Point2D {
    return new Point2D(this.x + other.x, this.y + other.y);
  }

  subtract(other: Point2D): Point2D {
    return new Point2D(this.x - other.x, this.y - other.y);
  }

  scale(factor: number): Point2D {
    return new Point2D(this.x * factor, this.y * factor);
  }

  negate(): Point2D {
    return new Point2D(-this.x, -this.y);
  }

  /**
   * Quarter turn counter-clockwise about the origin: (x, y) -> (-y, x).
   * The new y-coordinate is the old x-coordinate, which is what lets
   * x-axis formulas serve for the y-axis.
   */
  rotate90(): Point2D {
    return new Point2D(-this.y, this.x);
  }

  clone(): Point2D {
    return new Point2D(this.x, this.y);
  }

  equals(other: Point2D, tolerance: number = 1e-9): boolean {
    return Math.abs(this.x - other.x) < tolerance && Math.abs(this.y - other.y) < tolerance;
  }

  toString(): string {
    return `(${this.x}, ${this.y})`;
  }
}
