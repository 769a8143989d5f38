import meanBy from 'lodash/meanBy';
import { PlanarPoint, SectionLine } from '../../types/geometry';
import { logger } from '../../utils/logging/logger';
import {
  DegenerateInputError,
  InvalidCoordinateError,
  Result,
  err,
  ok
} from '../errors/types';
import { isFinitePoint } from '../geometry/planar';

const SOURCE = 'SectionLineBuilder';

// Total variance (m²) at or below which the cluster is treated as one point
const DEGENERATE_VARIANCE = 1e-12;

export type FitLineError = DegenerateInputError | InvalidCoordinateError;

export interface CovarianceMatrix {
  xx: number;
  xy: number;
  yy: number;
}

function covariance(points: readonly PlanarPoint[], centroid: PlanarPoint): CovarianceMatrix {
  let xx = 0;
  let xy = 0;
  let yy = 0;
  for (const point of points) {
    const dx = point.x - centroid.x;
    const dy = point.y - centroid.y;
    xx += dx * dx;
    xy += dx * dy;
    yy += dy * dy;
  }
  const n = points.length;
  return { xx: xx / n, xy: xy / n, yy: yy / n };
}

/**
 * Unit eigenvector of the largest eigenvalue of a symmetric 2x2 matrix.
 * Sign is canonical: x > 0, or y > 0 when x is zero.
 */
export function dominantEigenvector({ xx, xy, yy }: CovarianceMatrix): PlanarPoint {
  const halfTrace = (xx + yy) / 2;
  const radius = Math.hypot((xx - yy) / 2, xy);
  const lambda = halfTrace + radius;

  let vx: number;
  let vy: number;
  if (xy === 0) {
    [vx, vy] = xx >= yy ? [1, 0] : [0, 1];
  } else {
    // Two algebraically equivalent forms; take the better-conditioned one
    const a = { x: lambda - yy, y: xy };
    const b = { x: xy, y: lambda - xx };
    const pick = Math.hypot(a.x, a.y) >= Math.hypot(b.x, b.y) ? a : b;
    vx = pick.x;
    vy = pick.y;
  }

  const length = Math.hypot(vx, vy);
  vx /= length;
  vy /= length;

  if (vx < 0 || (vx === 0 && vy < 0)) {
    vx = -vx;
    vy = -vy;
  }
  return { x: vx + 0, y: vy + 0 };
}

/**
 * Fits the principal axis (direction of maximum variance) through a
 * cluster of projected points.
 */
export class SectionLineBuilder {
  public fitLine(points: readonly PlanarPoint[]): Result<SectionLine, FitLineError> {
    if (points.length < 2) {
      return err(new DegenerateInputError('Select at least two distinct points to fit a section line', {
        pointCount: points.length
      }));
    }

    const invalid = points.find(point => !isFinitePoint(point));
    if (invalid) {
      return err(new InvalidCoordinateError('Section line points must be finite', invalid));
    }

    const centroid = { x: meanBy(points, 'x'), y: meanBy(points, 'y') };
    const matrix = covariance(points, centroid);

    if (matrix.xx + matrix.yy <= DEGENERATE_VARIANCE) {
      logger.debug('All section points coincide', { pointCount: points.length, centroid }, { source: SOURCE });
      return err(new DegenerateInputError('Select at least two distinct points to fit a section line', {
        pointCount: points.length,
        distinctPoints: 1
      }));
    }

    const direction = dominantEigenvector(matrix);

    logger.debug('Section line fitted', {
      pointCount: points.length,
      origin: centroid,
      direction
    }, { source: SOURCE });

    return ok({
      originX: centroid.x,
      originY: centroid.y,
      directionX: direction.x,
      directionY: direction.y
    });
  }
}
