import {
  BufferPolygon,
  GeoPoint,
  PlanarPoint,
  PolylineProjection,
  Projection,
  SectionLine,
  ShapeDescriptor
} from '../types/geometry';
import { SurveyPoint, hasGeographic, hasProjected } from '../types/survey';
import { logger } from '../utils/logging/logger';
import { BufferZoneGenerator, CorridorError } from './buffer/buffer-zone-generator';
import { EngineConfig, loadEngineConfig } from './config/engine-config';
import { CoordinateTransformService, TransformError } from './coordinate-systems/coordinate-transform-service';
import { LocalFrame } from './coordinate-systems/types';
import {
  DegenerateInputError,
  InvalidCoordinateError,
  Result,
  err,
  ok
} from './errors/types';
import { FitLineError, SectionLineBuilder } from './section/section-line-builder';
import { PolylineProjectionError, projectOntoPolyline } from './section/polyline-projection';
import { Projector } from './section/projector';
import { SpatialFilter } from './selection/spatial-filter';

const SOURCE = 'SectionEngine';

export interface PointFailure {
  pointId: string;
  error: TransformError;
}

export interface PreparedSurvey {
  points: SurveyPoint[];
  /** Frame every projected coordinate in `points` is expressed in */
  frame: LocalFrame | null;
  failures: PointFailure[];
}

export interface SectionResult {
  /** Fitted line, oriented from the first input point towards the last */
  line: SectionLine;
  projections: Projection[];
}

/**
 * Entry point wiring coordinate conversion, selection, corridor building
 * and section projection around one shared transform service.
 */
export class SectionEngine {
  private readonly transformService: CoordinateTransformService;
  private readonly bufferZoneGenerator: BufferZoneGenerator;
  private readonly spatialFilter: SpatialFilter;
  private readonly lineBuilder = new SectionLineBuilder();
  private readonly projector = new Projector();

  constructor(
    private readonly config: EngineConfig,
    transformService?: CoordinateTransformService
  ) {
    this.transformService = transformService ?? new CoordinateTransformService({
      nationalGrid: config.nationalGrid,
      cacheCapacity: config.cacheCapacity
    });
    this.bufferZoneGenerator = new BufferZoneGenerator(this.transformService, {
      circleSegments: config.circleSegments
    });
    this.spatialFilter = new SpatialFilter(this.bufferZoneGenerator);
  }

  static fromEnvironment(env: Record<string, string | undefined> = process.env): SectionEngine {
    return new SectionEngine(loadEngineConfig(env));
  }

  public getConfig(): EngineConfig {
    return { ...this.config };
  }

  public getTransformService(): CoordinateTransformService {
    return this.transformService;
  }

  /**
   * Fills in geographic coordinates from the national grid where missing,
   * then projects located points that have no projected position yet into
   * the local frame of their centroid. Coordinates already set are kept.
   * Returns new point objects; inputs are not modified.
   */
  public prepareSurveyPoints(points: readonly SurveyPoint[]): PreparedSurvey {
    const failures: PointFailure[] = [];
    const needsGeographic = points.filter(point => !hasGeographic(point));
    const converted = this.transformService.transformBatch(
      'NationalGrid',
      'Geographic',
      needsGeographic.map(point => ({ x: point.gridX, y: point.gridY }))
    );

    const geographic = new Map<string, GeoPoint>();
    needsGeographic.forEach((point, index) => {
      const outcome = converted.results[index];
      if (outcome.ok) {
        geographic.set(point.id, { lat: outcome.value.y, lon: outcome.value.x });
      } else {
        failures.push({ pointId: point.id, error: outcome.error });
      }
    });

    const located: SurveyPoint[] = points.map(point => {
      if (hasGeographic(point)) return { ...point };
      const position = geographic.get(point.id);
      return position ? { ...point, geoLat: position.lat, geoLon: position.lon } : { ...point };
    });

    const withGeographic = located.filter(hasGeographic);
    const pending = withGeographic.filter(point => !hasProjected(point));
    const frameResult = this.transformService.resolveLocalFrame(
      'Geographic',
      withGeographic.map(point => ({ x: point.geoLon, y: point.geoLat }))
    );
    const frame = frameResult.ok ? frameResult.value : null;

    const projected = new Map<string, PlanarPoint>();
    if (frameResult.ok) {
      const projection = this.transformService.transformBatch(
        'Geographic',
        'LocalProjected',
        pending.map(point => ({ x: point.geoLon, y: point.geoLat })),
        frameResult.value
      );
      pending.forEach((point, index) => {
        const outcome = projection.results[index];
        if (outcome.ok) {
          projected.set(point.id, outcome.value);
        } else {
          failures.push({ pointId: point.id, error: outcome.error });
        }
      });
    } else if (pending.length > 0) {
      for (const point of pending) {
        failures.push({ pointId: point.id, error: frameResult.error });
      }
    }

    // Projected values already present are kept as they are
    const prepared = located.map(point => {
      if (hasProjected(point)) return point;
      const position = projected.get(point.id);
      return position ? { ...point, projX: position.x, projY: position.y } : point;
    });

    if (failures.length > 0) {
      logger.warn('Some survey points could not be located', {
        pointCount: points.length,
        failed: failures.length
      }, { source: SOURCE });
    }
    logger.info('Survey points prepared', {
      pointCount: points.length,
      frame: frame?.code ?? null
    }, { source: SOURCE });

    return { points: prepared, frame, failures };
  }

  public selectPointsInShape(points: readonly SurveyPoint[], shape: ShapeDescriptor): string[] {
    return this.spatialFilter.selectPointsInShape(points, shape);
  }

  public buildCorridor(
    polyline: readonly GeoPoint[],
    halfWidthMeters: number = this.config.defaultBufferMeters
  ): Result<BufferPolygon, CorridorError> {
    return this.bufferZoneGenerator.buildCorridor(polyline, halfWidthMeters);
  }

  /**
   * Fits a section line through the points' projected coordinates and
   * orders the points along it
   */
  public buildSection(points: readonly SurveyPoint[]): Result<SectionResult, FitLineError> {
    const positions: PlanarPoint[] = [];
    for (const point of points) {
      if (!hasProjected(point)) {
        return err(new InvalidCoordinateError(
          `Point ${point.id} has no projected coordinates`,
          { x: point.gridX, y: point.gridY },
          { pointId: point.id }
        ));
      }
      positions.push({ x: point.projX, y: point.projY });
    }

    if (positions.length < 2) {
      return err(new DegenerateInputError('Select at least two distinct points to build a section', {
        pointCount: positions.length
      }));
    }

    const fitted = this.lineBuilder.fitLine(positions);
    if (!fitted.ok) return fitted;

    const line = this.projector.orientLine(points, fitted.value);
    if (!line.ok) return line;

    const projections = this.projector.projectAndOrder(points, line.value);
    if (!projections.ok) return projections;

    logger.info('Section built', {
      pointCount: points.length,
      length: projections.value.length > 0
        ? projections.value[projections.value.length - 1].distanceAlongLine - projections.value[0].distanceAlongLine
        : 0
    }, { source: SOURCE });

    return ok({ line: line.value, projections: projections.value });
  }

  /**
   * Orders points by chainage along a drawn polyline. The points' projected
   * coordinates must be in `frame`, as returned by `prepareSurveyPoints`.
   */
  public projectAlongPolyline(
    points: readonly SurveyPoint[],
    vertices: readonly GeoPoint[],
    frame: LocalFrame,
    maxDistanceMeters?: number
  ): Result<PolylineProjection[], PolylineProjectionError | TransformError> {
    const { results } = this.transformService.transformBatch(
      'Geographic',
      'LocalProjected',
      vertices.map(vertex => ({ x: vertex.lon, y: vertex.lat })),
      frame
    );

    const polyline: PlanarPoint[] = [];
    for (const result of results) {
      if (!result.ok) return result;
      polyline.push(result.value);
    }

    return projectOntoPolyline(points, polyline, maxDistanceMeters);
  }
}
