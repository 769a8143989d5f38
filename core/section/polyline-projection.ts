import sortBy from 'lodash/sortBy';
import { PlanarPoint, PolylineProjection } from '../../types/geometry';
import { SurveyPoint, hasProjected } from '../../types/survey';
import { logger } from '../../utils/logging/logger';
import {
  DegenerateInputError,
  InvalidCoordinateError,
  Result,
  err,
  ok
} from '../errors/types';
import { closestPointOnSegment, dedupeConsecutive, distance, isFinitePoint } from '../geometry/planar';

export { closestPointOnSegment, pointToSegmentDistance } from '../geometry/planar';

const SOURCE = 'PolylineProjection';

export type PolylineProjectionError = DegenerateInputError | InvalidCoordinateError;

interface PolylineLocation {
  distanceAlong: number;
  distanceTo: number;
}

/**
 * Nearest location on the polyline. On equal distances the earlier
 * segment wins.
 */
function locateOnPolyline(point: PlanarPoint, vertices: readonly PlanarPoint[], offsets: readonly number[]): PolylineLocation {
  let best: PolylineLocation = { distanceAlong: 0, distanceTo: Number.POSITIVE_INFINITY };
  for (let i = 1; i < vertices.length; i++) {
    const start = vertices[i - 1];
    const end = vertices[i];
    const nearest = closestPointOnSegment(point, start, end);
    if (nearest.distance < best.distanceTo) {
      best = {
        distanceAlong: offsets[i - 1] + nearest.t * distance(start, end),
        distanceTo: nearest.distance
      };
    }
  }
  return best;
}

function cumulativeLengths(vertices: readonly PlanarPoint[]): number[] {
  const offsets = [0];
  for (let i = 1; i < vertices.length; i++) {
    offsets.push(offsets[i - 1] + distance(vertices[i - 1], vertices[i]));
  }
  return offsets;
}

/**
 * Chainage of each point along a polyline in the local projected frame,
 * ordered from the polyline's first vertex. Points farther than
 * `maxDistanceMeters` from the line are left out when a limit is given.
 */
export function projectOntoPolyline(
  points: readonly SurveyPoint[],
  polyline: readonly PlanarPoint[],
  maxDistanceMeters?: number
): Result<PolylineProjection[], PolylineProjectionError> {
  if (!polyline.every(isFinitePoint)) {
    const invalid = polyline.find(vertex => !isFinitePoint(vertex)) ?? { x: Number.NaN, y: Number.NaN };
    return err(new InvalidCoordinateError('Polyline vertices must be finite', invalid));
  }

  const vertices = dedupeConsecutive(polyline);
  if (vertices.length < 2) {
    return err(new DegenerateInputError('A polyline section needs at least two distinct vertices', {
      vertexCount: vertices.length
    }));
  }

  const offsets = cumulativeLengths(vertices);
  const projections: PolylineProjection[] = [];
  let excluded = 0;

  for (const point of points) {
    if (!hasProjected(point) || !Number.isFinite(point.projX) || !Number.isFinite(point.projY)) {
      return err(new InvalidCoordinateError(
        `Point ${point.id} has no usable projected coordinates`,
        { x: point.projX ?? Number.NaN, y: point.projY ?? Number.NaN },
        { pointId: point.id }
      ));
    }

    const location = locateOnPolyline({ x: point.projX, y: point.projY }, vertices, offsets);
    if (maxDistanceMeters !== undefined && location.distanceTo > maxDistanceMeters) {
      excluded++;
      continue;
    }
    projections.push({
      pointId: point.id,
      distanceAlongPolyline: location.distanceAlong,
      distanceToPolyline: location.distanceTo
    });
  }

  logger.debug('Points projected onto polyline', {
    polylineLength: offsets[offsets.length - 1],
    projected: projections.length,
    excluded
  }, { source: SOURCE });

  return ok(sortBy(projections, projection => projection.distanceAlongPolyline));
}
