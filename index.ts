export * from './types/geometry';
export * from './types/survey';
export * from './core/errors/types';

export * from './core/coordinate-systems/types';
export {
  NATIONAL_GRIDS,
  createLocalFrame,
  determineUtmZone
} from './core/coordinate-systems/definitions';
export { TransformationCache } from './core/coordinate-systems/cache';
export {
  CoordinateTransformService,
  DEFAULT_CACHE_CAPACITY
} from './core/coordinate-systems/coordinate-transform-service';
export type {
  BatchTransformResult,
  CoordinateTransformServiceOptions,
  TransformError,
  TransformOutcome
} from './core/coordinate-systems/coordinate-transform-service';

export { SpatialFilter } from './core/selection/spatial-filter';
export { parseDrawnShape } from './core/selection/shape-parser';
export type { DrawnShapeFeature } from './core/selection/shape-parser';

export {
  BufferZoneGenerator,
  DEFAULT_CIRCLE_SEGMENTS,
  corridorToFeature
} from './core/buffer/buffer-zone-generator';
export type { BufferZoneGeneratorOptions, CorridorError } from './core/buffer/buffer-zone-generator';

export { SectionLineBuilder } from './core/section/section-line-builder';
export type { FitLineError } from './core/section/section-line-builder';
export { Projector } from './core/section/projector';
export {
  closestPointOnSegment,
  pointToSegmentDistance,
  projectOntoPolyline
} from './core/section/polyline-projection';
export type { PolylineProjectionError } from './core/section/polyline-projection';
export type { SegmentProjection } from './core/geometry/planar';

export { calculateMapBounds, calculateMapCenterAndZoom } from './core/map-view/map-view';
export type { MapBounds, MapView } from './core/map-view/map-view';

export { DEFAULT_BUFFER_METERS, loadEngineConfig } from './core/config/engine-config';
export type { EngineConfig } from './core/config/engine-config';

export { SectionEngine } from './core/section-engine';
export type { PointFailure, PreparedSurvey, SectionResult } from './core/section-engine';

export { LogManager } from './core/logging/log-manager';
export { logger } from './utils/logging/logger';
export type { LogLevel } from './core/logging/logLevelConfig';
