import { z } from 'zod';

const dimension = (name: string) =>
  z
    .number({ invalid_type_error: `${name} must be a number` })
    .finite(`${name} must be finite`);

const positiveDimension = (name: string) => dimension(name).positive(`${name} must be positive`);
const nonNegativeDimension = (name: string) => dimension(name).nonnegative(`${name} must not be negative`);

export const RodSchema = z.object({
  kind: z.literal('rod'),
  radius: positiveDimension('radius'),
});

export const PipeSchema = z.object({
  kind: z.literal('pipe'),
  outerRadius: positiveDimension('outerRadius'),
  thickness: positiveDimension('thickness'),
});

export const RectangleSchema = z.object({
  kind: z.literal('rectangle'),
  width: positiveDimension('width'),
  height: positiveDimension('height'),
});

export const BoxBeamSchema = z.object({
  kind: z.literal('boxBeam'),
  width: positiveDimension('width'),
  height: positiveDimension('height'),
  thickness: positiveDimension('thickness'),
});

export const IBeamSchema = z.object({
  kind: z.literal('iBeam'),
  width: positiveDimension('width'),
  height: positiveDimension('height'),
  webThickness: nonNegativeDimension('webThickness'),
  flangeThickness: nonNegativeDimension('flangeThickness'),
});

// Walls may consume their enclosing dimension exactly (a zero-size void), never exceed it.
// Pipe and box beam walls must be thicker than zero, or nothing is left of the section.
export const ShapeDimensionsSchema = z
  .discriminatedUnion('kind', [RodSchema, PipeSchema, RectangleSchema, BoxBeamSchema, IBeamSchema])
  .superRefine((dims, ctx) => {
    const fail = (path: string, message: string) =>
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: [path], message });

    switch (dims.kind) {
      case 'pipe':
        if (dims.thickness > dims.outerRadius) {
          fail('thickness', 'thickness must not exceed outerRadius');
        }
        break;
      case 'boxBeam':
        if (2 * dims.thickness > Math.min(dims.width, dims.height)) {
          fail('thickness', '2 * thickness must not exceed min(width, height)');
        }
        break;
      case 'iBeam':
        if (dims.webThickness > dims.width) {
          fail('webThickness', 'webThickness must not exceed width');
        }
        if (2 * dims.flangeThickness > dims.height) {
          fail('flangeThickness', '2 * flangeThickness must not exceed height');
        }
        if (dims.width * dims.height - (dims.height - 2 * dims.flangeThickness) * (dims.width - dims.webThickness) <= 0) {
          fail('flangeThickness', 'web and flanges must enclose a positive area');
        }
        break;
      default:
        break;
    }
  });

// TypeScript types inferred from Zod schemas
export type RodDimensions = z.infer<typeof RodSchema>;
export type PipeDimensions = z.infer<typeof PipeSchema>;
export type RectangleDimensions = z.infer<typeof RectangleSchema>;
export type BoxBeamDimensions = z.infer<typeof BoxBeamSchema>;
export type IBeamDimensions = z.infer<typeof IBeamSchema>;
export type ShapeDimensions = z.infer<typeof ShapeDimensionsSchema>;
export type ShapeKind = ShapeDimensions['kind'];

/**
 * List the constraints a set of dimensions violates.
 * An empty list means the dimensions describe a real cross-section.
 */
export function findGeometryIssues(dimensions: ShapeDimensions): string[] {
  const result = ShapeDimensionsSchema.safeParse(dimensions);
  return result.success ? [] : result.error.issues.map(issue => issue.message);
}
