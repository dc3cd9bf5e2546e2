/**
 * Section Configuration - calculation settings and defaults
 */

export interface ISectionConfig {
  /**
   * Reject dimensions that leave a negative void or a non-positive area when a shape is built.
   * Turn off to accept any numbers unchecked.
   */
  validateGeometry: boolean;

  /** Net area below this fraction of the gross (unsigned) area counts as zero when locating a centroid */
  degenerateAreaTolerance: number;

  /** Write rejected shapes and centroid shifts to the ConsoleService */
  logOperations: boolean;
}

export const DEFAULT_SECTION_CONFIG: ISectionConfig = {
  validateGeometry: true,
  degenerateAreaTolerance: 1e-12,
  logOperations: true,
};

export function resolveSectionConfig(overrides?: Partial<ISectionConfig>): ISectionConfig {
  return { ...DEFAULT_SECTION_CONFIG, ...overrides };
}
