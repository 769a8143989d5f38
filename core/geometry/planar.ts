// Planar vector helpers shared by the corridor, filter and section modules.

import { PlanarPoint } from '../../types/geometry';

export function subtract(a: PlanarPoint, b: PlanarPoint): PlanarPoint {
  return { x: a.x - b.x, y: a.y - b.y };
}

export function dot(a: PlanarPoint, b: PlanarPoint): number {
  return a.x * b.x + a.y * b.y;
}

export function distance(a: PlanarPoint, b: PlanarPoint): number {
  return Math.hypot(a.x - b.x, a.y - b.y);
}

export function isFinitePoint(point: PlanarPoint): boolean {
  return Number.isFinite(point.x) && Number.isFinite(point.y);
}

export function samePoint(a: PlanarPoint, b: PlanarPoint): boolean {
  return a.x === b.x && a.y === b.y;
}

/**
 * Drop consecutive repeated vertices
 */
export function dedupeConsecutive(points: readonly PlanarPoint[]): PlanarPoint[] {
  const result: PlanarPoint[] = [];
  for (const point of points) {
    const previous = result[result.length - 1];
    if (!previous || !samePoint(previous, point)) {
      result.push(point);
    }
  }
  return result;
}

/**
 * Ring with its first vertex repeated at the end
 */
export function closeRing(points: readonly PlanarPoint[]): PlanarPoint[] {
  if (points.length === 0) return [];
  const first = points[0];
  const last = points[points.length - 1];
  return samePoint(first, last) ? [...points] : [...points, { ...first }];
}

/**
 * Signed shoelace area; positive for counter-clockwise rings
 */
export function signedRingArea(ring: readonly PlanarPoint[]): number {
  let area = 0;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    area += (ring[j].x * ring[i].y) - (ring[i].x * ring[j].y);
  }
  return area / 2;
}

/**
 * Crossing-number test. Edges are half-open in y, so a point on a shared
 * edge is claimed by exactly one side; results depend only on the inputs.
 * The ring may be open or closed.
 */
export function isPointInRing(point: PlanarPoint, ring: readonly PlanarPoint[]): boolean {
  let inside = false;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    const a = ring[i];
    const b = ring[j];
    if ((a.y > point.y) !== (b.y > point.y)) {
      const crossingX = a.x + ((point.y - a.y) / (b.y - a.y)) * (b.x - a.x);
      if (point.x < crossingX) {
        inside = !inside;
      }
    }
  }
  return inside;
}

export interface SegmentProjection {
  point: PlanarPoint;
  /** Position along the segment clamped to [0, 1] */
  t: number;
  distance: number;
}

/**
 * Closest point on segment [start, end] to `point`
 */
export function closestPointOnSegment(point: PlanarPoint, start: PlanarPoint, end: PlanarPoint): SegmentProjection {
  const dx = end.x - start.x;
  const dy = end.y - start.y;
  const lengthSq = dx * dx + dy * dy;

  if (lengthSq === 0) {
    return { point: { ...start }, t: 0, distance: distance(point, start) };
  }

  const t = Math.max(0, Math.min(1, ((point.x - start.x) * dx + (point.y - start.y) * dy) / lengthSq));
  const projected = { x: start.x + t * dx, y: start.y + t * dy };
  return { point: projected, t, distance: distance(point, projected) };
}

export function pointToSegmentDistance(point: PlanarPoint, start: PlanarPoint, end: PlanarPoint): number {
  return closestPointOnSegment(point, start, end).distance;
}

/**
 * Shortest distance from a point to the edges of a ring
 */
export function distanceToRingBoundary(point: PlanarPoint, ring: readonly PlanarPoint[]): number {
  let best = Number.POSITIVE_INFINITY;
  for (let i = 0, j = ring.length - 1; i < ring.length; j = i++) {
    best = Math.min(best, pointToSegmentDistance(point, ring[j], ring[i]));
  }
  return best;
}
