import type { ShapeDimensions, ShapeKind } from './SectionSchemas';

/** Base class for failures raised by the section calculations */
export class SectionError extends Error {
  constructor(
    message: string,
    public details?: string
  ) {
    super(message);
    this.name = 'SectionError';
  }
}

/** Numeric parameters of a shape, without its kind tag */
export function shapeParameters(dimensions: ShapeDimensions): Record<string, number> {
  return Object.fromEntries(
    Object.entries(dimensions).filter((entry): entry is [string, number] => typeof entry[1] === 'number')
  );
}

function formatParameters(parameters: Record<string, number>): string {
  return Object.entries(parameters)
    .map(([key, value]) => `${key}=${value}`)
    .join(', ');
}

/** Thrown when a shape's dimensions cannot describe a real cross-section */
export class InvalidGeometryError extends SectionError {
  readonly kind: ShapeKind;
  readonly parameters: Record<string, number>;
  readonly issues: string[];

  constructor(dimensions: ShapeDimensions, issues: string[]) {
    super(
      `Invalid ${dimensions.kind} geometry (${formatParameters(shapeParameters(dimensions))}): ${issues.join('; ')}`,
      issues.join('\n')
    );
    this.name = 'InvalidGeometryError';
    this.kind = dimensions.kind;
    this.parameters = shapeParameters(dimensions);
    this.issues = issues;
  }
}

/** Thrown when a centroid is requested for a composite whose signed areas cancel out */
export class DegenerateCompositeError extends SectionError {
  constructor(
    public readonly netArea: number,
    public readonly grossArea: number
  ) {
    super(
      `Cannot locate the centroid of a composite with zero net area (net=${netArea}, gross=${grossArea})`
    );
    this.name = 'DegenerateCompositeError';
  }
}
