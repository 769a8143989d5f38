import { z } from 'zod';
import {
  GeoPoint,
  ShapeDescriptor,
  polygonShape,
  polylineShape,
  rectangleShape
} from '../../types/geometry';
import { logger } from '../../utils/logging/logger';

const SOURCE = 'ShapeParser';

const positionSchema = z.array(z.number().finite()).min(2);

const propertiesSchema = z
  .object({
    shape: z.string().optional(),
    bufferMeters: z.number().positive().finite().optional()
  })
  .passthrough()
  .nullable()
  .optional();

const geometrySchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('Polygon'), coordinates: z.array(z.array(positionSchema)).min(1) }),
  z.object({ type: z.literal('Rectangle'), coordinates: z.array(z.array(positionSchema)).min(1) }),
  z.object({ type: z.literal('LineString'), coordinates: z.array(positionSchema).min(1) })
]);

const featureSchema = z.object({
  type: z.literal('Feature'),
  geometry: geometrySchema,
  properties: propertiesSchema
});

const drawnShapeSchema = z.union([
  featureSchema,
  z.object({
    type: z.literal('FeatureCollection'),
    features: z.array(featureSchema).min(1)
  })
]);

export type DrawnShapeFeature = z.infer<typeof featureSchema>;

// GeoJSON positions are [lon, lat]
function toGeoPoint(position: number[]): GeoPoint {
  return { lon: position[0], lat: position[1] };
}

function boundingCorners(ring: GeoPoint[]): [GeoPoint, GeoPoint] {
  const lats = ring.map(point => point.lat);
  const lons = ring.map(point => point.lon);
  return [
    { lat: Math.min(...lats), lon: Math.min(...lons) },
    { lat: Math.max(...lats), lon: Math.max(...lons) }
  ];
}

/**
 * Converts the GeoJSON emitted by a map drawing control into a shape
 * descriptor. Only the first feature of a collection is used, since a new
 * drawing replaces the previous selection. Returns null for anything that
 * is not a polygon, rectangle or line.
 */
export function parseDrawnShape(input: unknown, defaultHalfWidthMeters: number): ShapeDescriptor | null {
  const parsed = drawnShapeSchema.safeParse(input);
  if (!parsed.success) {
    logger.warn('Drawn shape is not a supported GeoJSON feature', {
      issues: parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`)
    }, { source: SOURCE });
    return null;
  }

  const feature = parsed.data.type === 'FeatureCollection' ? parsed.data.features[0] : parsed.data;
  return featureToShape(feature, defaultHalfWidthMeters);
}

function featureToShape(feature: DrawnShapeFeature, defaultHalfWidthMeters: number): ShapeDescriptor | null {
  const { geometry } = feature;
  const bufferMeters = feature.properties?.bufferMeters;
  const shapeHint = feature.properties?.shape;

  switch (geometry.type) {
    case 'LineString':
      return polylineShape(
        geometry.coordinates.map(toGeoPoint),
        bufferMeters ?? defaultHalfWidthMeters
      );
    case 'Rectangle': {
      const ring = geometry.coordinates[0].map(toGeoPoint);
      if (ring.length === 0) return null;
      const [first, second] = boundingCorners(ring);
      return rectangleShape(first, second);
    }
    case 'Polygon': {
      const ring = geometry.coordinates[0].map(toGeoPoint);
      if (shapeHint?.toLowerCase() === 'rectangle' && ring.length > 0) {
        const [first, second] = boundingCorners(ring);
        return rectangleShape(first, second);
      }
      return polygonShape(ring);
    }
  }
}
