import sortBy from 'lodash/sortBy';
import { PlanarPoint, Projection, SectionLine } from '../../types/geometry';
import { ProjectedSurveyPoint, SurveyPoint, hasProjected } from '../../types/survey';
import { logger } from '../../utils/logging/logger';
import { InvalidCoordinateError, Result, err, ok } from '../errors/types';
import { dot, subtract } from '../geometry/planar';

const SOURCE = 'Projector';

// Distances are kept to the micrometre; closer values order as ties
const DISTANCE_SCALE = 1e6;

function roundDistance(value: number): number {
  // `+ 0` folds -0 into 0
  return Math.round(value * DISTANCE_SCALE) / DISTANCE_SCALE + 0;
}

function projectedPosition(point: ProjectedSurveyPoint): PlanarPoint {
  return { x: point.projX, y: point.projY };
}

function collectProjected(points: readonly SurveyPoint[]): Result<ProjectedSurveyPoint[], InvalidCoordinateError> {
  const projected: ProjectedSurveyPoint[] = [];
  for (const point of points) {
    if (!hasProjected(point)) {
      return err(new InvalidCoordinateError(
        `Point ${point.id} has no projected coordinates`,
        { x: point.gridX, y: point.gridY },
        { pointId: point.id }
      ));
    }
    if (!Number.isFinite(point.projX) || !Number.isFinite(point.projY)) {
      return err(new InvalidCoordinateError(
        `Point ${point.id} has non-finite projected coordinates`,
        { x: point.projX, y: point.projY },
        { pointId: point.id }
      ));
    }
    projected.push(point);
  }
  return ok(projected);
}

function along(point: PlanarPoint, line: SectionLine): number {
  return dot(subtract(point, { x: line.originX, y: line.originY }), { x: line.directionX, y: line.directionY });
}

function flipped(line: SectionLine): SectionLine {
  return {
    originX: line.originX,
    originY: line.originY,
    directionX: -line.directionX + 0,
    directionY: -line.directionY + 0
  };
}

/**
 * Projects points onto a section line and orders them along it
 */
export class Projector {
  /**
   * Line whose direction runs from the first input point towards the last.
   * The fitted direction is only defined up to sign; this keeps the order
   * the user picked the points in.
   */
  public orientLine(points: readonly SurveyPoint[], line: SectionLine): Result<SectionLine, InvalidCoordinateError> {
    const projected = collectProjected(points);
    if (!projected.ok) return projected;
    return ok(this.orient(projected.value, line));
  }

  public projectAndOrder(points: readonly SurveyPoint[], line: SectionLine): Result<Projection[], InvalidCoordinateError> {
    const collected = collectProjected(points);
    if (!collected.ok) {
      logger.warn('Cannot project points', { error: collected.error.message }, { source: SOURCE });
      return collected;
    }

    const projected = collected.value;
    const oriented = this.orient(projected, line);
    const origin = { x: oriented.originX, y: oriented.originY };
    const direction = { x: oriented.directionX, y: oriented.directionY };
    const normal = { x: -direction.y, y: direction.x };

    const projections: Projection[] = projected.map(point => {
      const offset = subtract(projectedPosition(point), origin);
      return {
        pointId: point.id,
        distanceAlongLine: roundDistance(dot(offset, direction)),
        perpendicularOffset: dot(offset, normal) + 0
      };
    });

    // sortBy is stable, so ties keep their input order
    const ordered = sortBy(projections, projection => projection.distanceAlongLine);

    logger.debug('Points projected onto section line', {
      pointCount: ordered.length,
      flipped: oriented.directionX !== line.directionX || oriented.directionY !== line.directionY
    }, { source: SOURCE });

    return ok(ordered);
  }

  private orient(points: readonly ProjectedSurveyPoint[], line: SectionLine): SectionLine {
    if (points.length < 2) return line;
    const first = along(projectedPosition(points[0]), line);
    const last = along(projectedPosition(points[points.length - 1]), line);
    return roundDistance(first) > roundDistance(last) ? flipped(line) : line;
  }
}
