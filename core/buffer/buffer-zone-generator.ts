import { Feature, Polygon, Position } from 'geojson';
import { featureCollection, polygon } from '@turf/helpers';
import union from '@turf/union';
import { BufferPolygon, GeoPoint, PlanarPoint } from '../../types/geometry';
import { logger } from '../../utils/logging/logger';
import {
  CoordinateTransformService,
  TransformError
} from '../coordinate-systems/coordinate-transform-service';
import { LocalFrame } from '../coordinate-systems/types';
import {
  DegenerateInputError,
  InvalidBufferWidthError,
  createErrorDetails,
  Result,
  TransformFailureError,
  err,
  ok
} from '../errors/types';
import {
  closeRing,
  dedupeConsecutive,
  distance,
  pointToSegmentDistance,
  signedRingArea
} from '../geometry/planar';

const SOURCE = 'BufferZoneGenerator';

export const DEFAULT_CIRCLE_SEGMENTS = 32;

export type CorridorError = InvalidBufferWidthError | DegenerateInputError | TransformError;

export interface BufferZoneGeneratorOptions {
  /** Sides of the polygon standing in for the disc at each vertex */
  circleSegments?: number;
}

function toPosition(point: PlanarPoint): Position {
  return [point.x, point.y];
}

function toPlanar(position: Position): PlanarPoint {
  return { x: position[0], y: position[1] };
}

/**
 * Builds a corridor of constant real-world half-width around a polyline.
 *
 * Work happens in one local UTM frame chosen from the polyline centroid:
 * every segment contributes a rectangle offset along its unit normal and
 * every vertex a disc, and the union of those pieces is the corridor. The
 * discs give round joins and caps, so the corridor is at least
 * `halfWidthMeters` wide everywhere along the line, and a polyline whose
 * vertices all coincide yields a disc.
 */
export class BufferZoneGenerator {
  private readonly circleSegments: number;

  constructor(
    private readonly transformService: CoordinateTransformService,
    options: BufferZoneGeneratorOptions = {}
  ) {
    this.circleSegments = Math.max(8, Math.floor(options.circleSegments ?? DEFAULT_CIRCLE_SEGMENTS));
  }

  public buildCorridor(polyline: readonly GeoPoint[], halfWidthMeters: number): Result<BufferPolygon, CorridorError> {
    if (!Number.isFinite(halfWidthMeters) || halfWidthMeters <= 0) {
      return err(new InvalidBufferWidthError(halfWidthMeters));
    }
    if (polyline.length === 0) {
      return err(new DegenerateInputError('A corridor needs at least one polyline vertex', { vertexCount: 0 }));
    }

    const line = this.projectPolyline(polyline);
    if (!line.ok) return line;
    const { frame, vertices: projected } = line.value;

    const ring = this.buildProjectedRing(projected, halfWidthMeters);
    if (!ring.ok) return ring;

    const back = this.transformService.transformBatch('LocalProjected', 'Geographic', ring.value, frame);
    const vertices: GeoPoint[] = [];
    for (const result of back.results) {
      if (!result.ok) return err(result.error);
      vertices.push({ lat: result.value.y, lon: result.value.x });
    }

    logger.debug('Corridor built', {
      polylineVertices: polyline.length,
      corridorVertices: vertices.length,
      halfWidthMeters,
      frame: frame.code
    }, { source: SOURCE });

    return ok({ vertices, halfWidthMeters });
  }

  /**
   * Metric distance from each point to the polyline, measured in the same
   * local frame `buildCorridor` uses. Points that cannot be projected get
   * `Infinity`.
   */
  public distancesToPolyline(
    polyline: readonly GeoPoint[],
    points: readonly GeoPoint[]
  ): Result<number[], CorridorError> {
    if (polyline.length === 0) {
      return err(new DegenerateInputError('A polyline needs at least one vertex', { vertexCount: 0 }));
    }

    const line = this.projectPolyline(polyline);
    if (!line.ok) return line;
    const { frame, vertices } = line.value;

    const { results } = this.transformService.transformBatch(
      'Geographic',
      'LocalProjected',
      points.map(point => ({ x: point.lon, y: point.lat })),
      frame
    );

    return ok(results.map(result => {
      if (!result.ok) return Number.POSITIVE_INFINITY;
      if (vertices.length === 1) return distance(result.value, vertices[0]);
      let best = Number.POSITIVE_INFINITY;
      for (let i = 1; i < vertices.length; i++) {
        best = Math.min(best, pointToSegmentDistance(result.value, vertices[i - 1], vertices[i]));
      }
      return best;
    }));
  }

  /**
   * Corridor ring in the local frame, closed
   */
  public buildProjectedRing(
    vertices: readonly PlanarPoint[],
    halfWidthMeters: number
  ): Result<PlanarPoint[], DegenerateInputError> {
    if (vertices.length === 0) {
      return err(new DegenerateInputError('A corridor needs at least one polyline vertex', { vertexCount: 0 }));
    }

    const pieces: Position[][] = vertices.map(vertex => this.discRing(vertex, halfWidthMeters));
    for (let i = 1; i < vertices.length; i++) {
      pieces.push(this.segmentRing(vertices[i - 1], vertices[i], halfWidthMeters));
    }

    if (pieces.length === 1) {
      return ok(pieces[0].map(toPlanar));
    }

    let merged: ReturnType<typeof union>;
    try {
      merged = union(featureCollection(pieces.map(ring => polygon([ring]))));
    } catch (error) {
      logger.error('Corridor union failed', { pieceCount: pieces.length, error }, { source: SOURCE });
      return err(new DegenerateInputError('Corridor pieces could not be merged', {
        pieceCount: pieces.length,
        ...createErrorDetails(error)
      }));
    }
    if (!merged) {
      return err(new DegenerateInputError('Corridor pieces did not produce an area', { pieceCount: pieces.length }));
    }

    const outerRings = merged.geometry.type === 'Polygon'
      ? [merged.geometry.coordinates[0]]
      : merged.geometry.coordinates.map(part => part[0]);

    let best: PlanarPoint[] = [];
    let bestArea = -1;
    for (const ring of outerRings) {
      const planar = ring.map(toPlanar);
      const area = Math.abs(signedRingArea(planar));
      if (area > bestArea) {
        best = planar;
        bestArea = area;
      }
    }

    if (outerRings.length > 1) {
      logger.warn('Corridor union split into several parts; keeping the largest', {
        partCount: outerRings.length
      }, { source: SOURCE });
    }

    return ok(closeRing(best));
  }

  private projectPolyline(
    polyline: readonly GeoPoint[]
  ): Result<{ frame: LocalFrame; vertices: PlanarPoint[] }, TransformError> {
    const { frame, results } = this.transformService.transformBatch(
      'Geographic',
      'LocalProjected',
      polyline.map(vertex => ({ x: vertex.lon, y: vertex.lat }))
    );

    const projected: PlanarPoint[] = [];
    for (const result of results) {
      if (!result.ok) {
        logger.warn('Polyline vertex could not be projected', { error: result.error.message }, { source: SOURCE });
        return err(result.error);
      }
      projected.push(result.value);
    }
    if (!frame) {
      return err(new TransformFailureError('No local frame for corridor', 'Geographic', 'LocalProjected'));
    }

    return ok({ frame, vertices: dedupeConsecutive(projected) });
  }

  /**
   * Regular polygon circumscribing the disc, so its edges stay at least
   * `radius` from the centre
   */
  private discRing(center: PlanarPoint, radius: number): Position[] {
    const n = this.circleSegments;
    const outer = radius / Math.cos(Math.PI / n);
    const ring: Position[] = [];
    for (let k = 0; k < n; k++) {
      const angle = (2 * Math.PI * k) / n;
      ring.push([center.x + outer * Math.cos(angle), center.y + outer * Math.sin(angle)]);
    }
    ring.push([...ring[0]]);
    return ring;
  }

  private segmentRing(start: PlanarPoint, end: PlanarPoint, halfWidth: number): Position[] {
    const length = Math.hypot(end.x - start.x, end.y - start.y);
    const nx = (-(end.y - start.y) / length) * halfWidth;
    const ny = ((end.x - start.x) / length) * halfWidth;
    const corners = [
      { x: start.x + nx, y: start.y + ny },
      { x: end.x + nx, y: end.y + ny },
      { x: end.x - nx, y: end.y - ny },
      { x: start.x - nx, y: start.y - ny }
    ];
    return closeRing(corners).map(toPosition);
  }
}

/**
 * GeoJSON polygon for drawing the corridor on a map
 */
export function corridorToFeature(corridor: BufferPolygon): Feature<Polygon, { halfWidthMeters: number }> {
  const ring = closeRing(corridor.vertices.map(vertex => ({ x: vertex.lon, y: vertex.lat }))).map(toPosition);
  return polygon([ring], { halfWidthMeters: corridor.halfWidthMeters });
}
