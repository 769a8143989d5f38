import { PlanarPoint } from '../../types/geometry';
import { logger } from '../../utils/logging/logger';
import {
  InvalidCoordinateError,
  Result,
  TransformFailureError,
  createErrorDetails,
  err,
  ok
} from '../errors/types';
import { TransformationCache } from './cache';
import {
  GEOGRAPHIC_BOUNDS,
  NATIONAL_GRIDS,
  WEB_MERCATOR_BOUNDS,
  createLocalFrame,
  isValidGeographic,
  isWithinBounds
} from './definitions';
import { CoordinateTransformer } from './transformer';
import {
  CacheStats,
  CoordinateSystem,
  LocalFrame,
  NationalGridCode,
  NationalGridDefinition
} from './types';

const SOURCE = 'CoordinateTransformService';

export const DEFAULT_CACHE_CAPACITY = 2000;

export type TransformError = InvalidCoordinateError | TransformFailureError;
export type TransformOutcome = Result<PlanarPoint, TransformError>;

export interface BatchTransformResult {
  /** Local frame shared by every point of the batch, when LocalProjected is involved */
  frame: LocalFrame | null;
  /** One outcome per input point, same order */
  results: TransformOutcome[];
}

export interface CoordinateTransformServiceOptions {
  nationalGrid?: NationalGridCode | NationalGridDefinition;
  cacheCapacity?: number;
}

/**
 * Converts positions between the national grid, geographic (x = lon, y = lat),
 * a local UTM frame and Web Mercator. Owns its converters and a bounded
 * cache of recent results; inject one instance into every consumer.
 */
export class CoordinateTransformService {
  private readonly transformer: CoordinateTransformer;
  private readonly cache: TransformationCache;

  constructor(options: CoordinateTransformServiceOptions = {}) {
    const grid = options.nationalGrid ?? 'EPSG:27700';
    const nationalGrid = typeof grid === 'string' ? NATIONAL_GRIDS[grid] : grid;
    this.transformer = new CoordinateTransformer(nationalGrid);
    this.cache = new TransformationCache(options.cacheCapacity ?? DEFAULT_CACHE_CAPACITY);
  }

  public getNationalGrid(): NationalGridDefinition {
    return this.transformer.getNationalGrid();
  }

  /**
   * Transform a single position. A LocalProjected target without a frame
   * uses the UTM zone of the point itself.
   */
  public transformPoint(
    source: CoordinateSystem,
    target: CoordinateSystem,
    x: number,
    y: number,
    frame?: LocalFrame
  ): TransformOutcome {
    let activeFrame: LocalFrame | null = frame ?? null;
    if (!activeFrame && target === 'LocalProjected' && source !== 'LocalProjected') {
      const resolved = this.resolveLocalFrame(source, [{ x, y }]);
      if (!resolved.ok) return resolved;
      activeFrame = resolved.value;
    }
    return this.transformWithFrame(source, target, x, y, activeFrame);
  }

  /**
   * Transform many positions with one converter and one local frame.
   * Failures are reported per index; the batch always completes.
   */
  public transformBatch(
    source: CoordinateSystem,
    target: CoordinateSystem,
    points: readonly PlanarPoint[],
    frame?: LocalFrame
  ): BatchTransformResult {
    let activeFrame: LocalFrame | null = frame ?? null;
    const involvesLocal = source === 'LocalProjected' || target === 'LocalProjected';

    if (!activeFrame && target === 'LocalProjected' && source !== 'LocalProjected' && points.length > 0) {
      const resolved = this.resolveLocalFrame(source, points);
      if (!resolved.ok) {
        logger.warn('Could not derive a local frame for batch', {
          pointCount: points.length,
          source,
          error: resolved.error.message
        }, { source: SOURCE });
        return { frame: null, results: points.map(() => resolved) };
      }
      activeFrame = resolved.value;
    }

    const results = points.map(point => this.transformWithFrame(source, target, point.x, point.y, activeFrame));
    const failed = results.filter(result => !result.ok).length;

    if (failed > 0) {
      logger.warn('Batch transformation finished with failures', {
        source,
        target,
        frame: activeFrame?.code,
        pointCount: points.length,
        failed
      }, { source: SOURCE });
    } else {
      logger.debug('Batch transformation complete', {
        source,
        target,
        frame: activeFrame?.code,
        pointCount: points.length
      }, { source: SOURCE });
    }

    return { frame: involvesLocal ? activeFrame : null, results };
  }

  /**
   * Local frame for a set of points: the UTM zone of their centroid,
   * ignoring points that are not valid in the source system.
   */
  public resolveLocalFrame(
    source: CoordinateSystem,
    points: readonly PlanarPoint[]
  ): Result<LocalFrame, TransformError> {
    if (source === 'LocalProjected') {
      return err(new TransformFailureError(
        'Cannot derive a local frame from local projected coordinates',
        source,
        'LocalProjected'
      ));
    }

    const valid = points.filter(point => this.validateInput(source, point.x, point.y) === null);
    if (valid.length === 0) {
      return err(new InvalidCoordinateError(
        'No valid coordinates to derive a local frame from',
        points[0] ?? { x: Number.NaN, y: Number.NaN },
        { source, pointCount: points.length }
      ));
    }

    const centroid = {
      x: valid.reduce((sum, point) => sum + point.x, 0) / valid.length,
      y: valid.reduce((sum, point) => sum + point.y, 0) / valid.length
    };

    const geographic = source === 'Geographic'
      ? ok(centroid)
      : this.transformWithFrame(source, 'Geographic', centroid.x, centroid.y, null);
    if (!geographic.ok) return geographic;

    return ok(createLocalFrame(geographic.value.x, geographic.value.y));
  }

  public getCacheStats(): CacheStats {
    return this.cache.getStats();
  }

  public getConverterCount(): number {
    return this.transformer.getConverterCount();
  }

  public clearCache(): void {
    this.cache.clear();
    this.transformer.clear();
  }

  private transformWithFrame(
    source: CoordinateSystem,
    target: CoordinateSystem,
    x: number,
    y: number,
    frame: LocalFrame | null
  ): TransformOutcome {
    const inputError = this.validateInput(source, x, y);
    if (inputError) {
      return err(inputError);
    }

    if (source === target) {
      return ok({ x, y });
    }

    const fromDefinition = this.transformer.resolveDefinition(source, frame);
    const toDefinition = this.transformer.resolveDefinition(target, frame);
    if (fromDefinition === null || toDefinition === null) {
      return err(new TransformFailureError(
        `A local frame is required to transform ${source} to ${target}`,
        source,
        target
      ));
    }

    const key = { from: source, to: target, frameCode: frame?.code ?? null, x, y };
    const cached = this.cache.get(key);
    if (cached) {
      return ok(cached);
    }

    let output: number[];
    try {
      output = this.transformer.getConverter(fromDefinition, toDefinition).forward([x, y]);
    } catch (error) {
      logger.error('Error transforming coordinates', {
        source,
        target,
        coordinates: { x, y },
        error: error instanceof Error ? error.message : String(error)
      }, { source: SOURCE });
      return err(new TransformFailureError(
        `Transformation ${source} -> ${target} failed`,
        source,
        target,
        { coordinates: { x, y }, ...createErrorDetails(error) }
      ));
    }

    const [outX, outY] = output;
    if (outX === undefined || outY === undefined || !Number.isFinite(outX) || !Number.isFinite(outY)) {
      return err(new TransformFailureError(
        `Transformation ${source} -> ${target} produced a non-finite result`,
        source,
        target,
        { coordinates: { x, y }, result: output }
      ));
    }

    if (target === 'Geographic' && !isWithinBounds(outX, outY, GEOGRAPHIC_BOUNDS)) {
      return err(new InvalidCoordinateError(
        'Transformed position is outside geographic bounds',
        { x: outX, y: outY },
        { source, target, input: { x, y } }
      ));
    }

    const result = { x: outX, y: outY };
    this.cache.set(key, result);
    return ok(result);
  }

  private validateInput(system: CoordinateSystem, x: number, y: number): InvalidCoordinateError | null {
    if (!Number.isFinite(x) || !Number.isFinite(y)) {
      return new InvalidCoordinateError('Coordinates must be finite numbers', { x, y }, { system });
    }

    switch (system) {
      case 'Geographic':
        return isValidGeographic(x, y)
          ? null
          : new InvalidCoordinateError('Latitude must be within [-90, 90] and longitude within [-180, 180]', { x, y }, { system });
      case 'NationalGrid': {
        const grid = this.transformer.getNationalGrid();
        return isWithinBounds(x, y, grid.bounds)
          ? null
          : new InvalidCoordinateError(`Coordinates are outside the ${grid.name} extent`, { x, y }, {
            system,
            bounds: grid.bounds
          });
      }
      case 'WebMercator':
        return isWithinBounds(x, y, WEB_MERCATOR_BOUNDS)
          ? null
          : new InvalidCoordinateError('Coordinates are outside the Web Mercator extent', { x, y }, { system });
      case 'LocalProjected':
        return null;
    }
  }
}
