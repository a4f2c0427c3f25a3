/**
 * Shared type definitions.
 */

export type {
  LogLevel,
  HeuristicThresholds,
  GenerationOptions,
  ResolvedGenerationOptions,
  ImageExporter,
  StyleExtractionOptions,
  CatalogOptions,
} from './options.js';
export {
  DEFAULT_HEURISTICS,
  DEFAULT_PICTURE_DIR,
  DEFAULT_GENERATION_OPTIONS,
  resolveGenerationOptions,
} from './options.js';

export type { Rect, Location } from './geometry.js';
export { rectArea, intervalOverlap, distance } from './geometry.js';

export type { PlaceholderType, PlaceholderReference, ShapeKind } from './elements.js';
export { PLACEHOLDER_TYPES, isPlaceholderType } from './elements.js';
