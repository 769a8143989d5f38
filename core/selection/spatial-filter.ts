import kinks from '@turf/kinks';
import { polygon } from '@turf/helpers';
import { Bounds, GeoPoint, PlanarPoint, ShapeDescriptor } from '../../types/geometry';
import { GeolocatedSurveyPoint, SurveyPoint, hasGeographic } from '../../types/survey';
import { logger } from '../../utils/logging/logger';
import { BufferZoneGenerator } from '../buffer/buffer-zone-generator';
import { closeRing, dedupeConsecutive, isFinitePoint, isPointInRing, samePoint } from '../geometry/planar';

const SOURCE = 'SpatialFilter';

// Shapes are tested with x = lon, y = lat
function toPlanar(point: GeoPoint): PlanarPoint {
  return { x: point.lon, y: point.lat };
}

function ringBounds(ring: readonly PlanarPoint[]): Bounds {
  return ring.reduce<Bounds>((bounds, point) => ({
    minX: Math.min(bounds.minX, point.x),
    minY: Math.min(bounds.minY, point.y),
    maxX: Math.max(bounds.maxX, point.x),
    maxY: Math.max(bounds.maxY, point.y)
  }), {
    minX: Number.POSITIVE_INFINITY,
    minY: Number.POSITIVE_INFINITY,
    maxX: Number.NEGATIVE_INFINITY,
    maxY: Number.NEGATIVE_INFINITY
  });
}

function inBounds(point: PlanarPoint, bounds: Bounds): boolean {
  return point.x >= bounds.minX && point.x <= bounds.maxX && point.y >= bounds.minY && point.y <= bounds.maxY;
}

/**
 * Selects the survey points inside the current selection shape.
 * Degenerate or malformed shapes select nothing.
 */
export class SpatialFilter {
  constructor(private readonly bufferZoneGenerator: BufferZoneGenerator) {}

  public selectPointsInShape(points: readonly SurveyPoint[], shape: ShapeDescriptor): string[] {
    const located = points.filter(hasGeographic);
    if (located.length < points.length) {
      logger.debug('Skipping points without geographic coordinates', {
        skipped: points.length - located.length
      }, { source: SOURCE });
    }

    const selected = this.selectLocated(located, shape);

    logger.debug('Selection complete', {
      shape: shape.kind,
      candidates: located.length,
      selected: selected.length
    }, { source: SOURCE });

    return selected;
  }

  private selectLocated(points: readonly GeolocatedSurveyPoint[], shape: ShapeDescriptor): string[] {
    switch (shape.kind) {
      case 'Polygon':
        return this.selectInPolygon(points, shape.vertices);
      case 'Rectangle':
        return this.selectInRectangle(points, shape.corners);
      case 'Polyline': {
        const corridor = this.bufferZoneGenerator.buildCorridor(shape.vertices, shape.halfWidthMeters);
        if (!corridor.ok) {
          logger.warn('Polyline corridor unavailable; nothing selected', {
            code: corridor.error.code,
            message: corridor.error.message
          }, { source: SOURCE });
          return [];
        }
        return this.selectNearPolyline(points, shape.vertices, shape.halfWidthMeters, corridor.value.vertices);
      }
      default: {
        const unknownShape: never = shape;
        logger.warn('Unknown shape descriptor; nothing selected', { shape: unknownShape }, { source: SOURCE });
        return [];
      }
    }
  }

  private selectInPolygon(points: readonly GeolocatedSurveyPoint[], vertices: readonly GeoPoint[]): string[] {
    const open = dedupeConsecutive(vertices.map(toPlanar));
    if (!open.every(isFinitePoint)) {
      logger.warn('Polygon has non-finite vertices; nothing selected', undefined, { source: SOURCE });
      return [];
    }
    if (open.length > 1 && samePoint(open[0], open[open.length - 1])) {
      open.pop();
    }
    if (open.length < 3) {
      logger.debug('Polygon has fewer than 3 distinct vertices; nothing selected', {
        vertexCount: open.length
      }, { source: SOURCE });
      return [];
    }

    const ring = closeRing(open);
    this.warnOnSelfIntersection(ring);

    const bounds = ringBounds(ring);
    return points
      .filter(point => {
        const position = { x: point.geoLon, y: point.geoLat };
        return inBounds(position, bounds) && isPointInRing(position, ring);
      })
      .map(point => point.id);
  }

  // The corridor ring has no holes, so a closed loop would also take in
  // everything it encloses; candidates are confirmed by their distance
  private selectNearPolyline(
    points: readonly GeolocatedSurveyPoint[],
    polyline: readonly GeoPoint[],
    halfWidthMeters: number,
    corridor: readonly GeoPoint[]
  ): string[] {
    const candidateIds = new Set(this.selectInPolygon(points, corridor));
    const candidates = points.filter(point => candidateIds.has(point.id));
    const distances = this.bufferZoneGenerator.distancesToPolyline(
      polyline,
      candidates.map(point => ({ lat: point.geoLat, lon: point.geoLon }))
    );
    if (!distances.ok) {
      logger.warn('Distances to polyline unavailable; nothing selected', {
        code: distances.error.code,
        message: distances.error.message
      }, { source: SOURCE });
      return [];
    }

    return candidates
      .filter((_, index) => distances.value[index] <= halfWidthMeters)
      .map(point => point.id);
  }

  private selectInRectangle(
    points: readonly GeolocatedSurveyPoint[],
    corners: readonly [GeoPoint, GeoPoint]
  ): string[] {
    const [first, second] = corners;
    if (![first.lat, first.lon, second.lat, second.lon].every(Number.isFinite)) {
      logger.warn('Rectangle has non-finite corners; nothing selected', { corners }, { source: SOURCE });
      return [];
    }

    const bounds: Bounds = {
      minX: Math.min(first.lon, second.lon),
      minY: Math.min(first.lat, second.lat),
      maxX: Math.max(first.lon, second.lon),
      maxY: Math.max(first.lat, second.lat)
    };

    return points
      .filter(point => inBounds({ x: point.geoLon, y: point.geoLat }, bounds))
      .map(point => point.id);
  }

  // The even-odd rule still applies; the warning helps explain surprising selections
  private warnOnSelfIntersection(ring: readonly PlanarPoint[]): void {
    const crossings = kinks(polygon([ring.map(point => [point.x, point.y])]));
    if (crossings.features.length > 0) {
      logger.warn('Selection polygon intersects itself', {
        intersections: crossings.features.length
      }, { source: SOURCE });
    }
  }
}
