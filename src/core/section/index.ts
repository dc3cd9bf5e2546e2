/**
 * Section Shapes Module
 *
 * Primitive cross-sections and signed composites built from them.
 */

export {
  StructuralShape,
} from './StructuralShape';

export {
  CompositeShape,
  type CompositeMember,
} from './CompositeShape';

export {
  Point2D,
} from './Geometry2D';

export {
  // Parallel axis and centroid helpers
  parallelAxis,
  removeParallelAxis,
  weightedCentroid,
  combineSigns,
  type Sign,
  type CentroidTerm,
} from './ParallelAxis';

export {
  calculateShapeProperties,
  type ShapePropertiesResult,
} from './ShapeProperties';

export {
  DEFAULT_SECTION_CONFIG,
  resolveSectionConfig,
  type ISectionConfig,
} from './SectionConfig';

export {
  SectionError,
  InvalidGeometryError,
  DegenerateCompositeError,
  shapeParameters,
} from './SectionErrors';

export {
  // Validation
  RodSchema,
  PipeSchema,
  RectangleSchema,
  BoxBeamSchema,
  IBeamSchema,
  ShapeDimensionsSchema,
  findGeometryIssues,

  // Types
  type RodDimensions,
  type PipeDimensions,
  type RectangleDimensions,
  type BoxBeamDimensions,
  type IBeamDimensions,
  type ShapeDimensions,
  type ShapeKind,
} from './SectionSchemas';
