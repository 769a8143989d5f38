/**
 * Geographic position; `lat` and `lon` in decimal degrees (WGS84)
 */
export interface GeoPoint {
  lat: number;
  lon: number;
}

/**
 * Position in a planar system (grid eastings/northings or local projected meters)
 */
export interface PlanarPoint {
  x: number;
  y: number;
}

export interface Bounds {
  minX: number;
  minY: number;
  maxX: number;
  maxY: number;
}

export interface PolygonShape {
  readonly kind: 'Polygon';
  readonly vertices: readonly GeoPoint[];
}

export interface RectangleShape {
  readonly kind: 'Rectangle';
  readonly corners: readonly [GeoPoint, GeoPoint];
}

export interface PolylineShape {
  readonly kind: 'Polyline';
  readonly vertices: readonly GeoPoint[];
  readonly halfWidthMeters: number;
}

/**
 * The most recent selection drawn by the user
 */
export type ShapeDescriptor = PolygonShape | RectangleShape | PolylineShape;

/**
 * Corridor around a polyline as a closed ring (first vertex repeated last)
 */
export interface BufferPolygon {
  readonly vertices: readonly GeoPoint[];
  readonly halfWidthMeters: number;
}

/**
 * Best-fit line in the local projected frame; direction is a unit vector
 */
export interface SectionLine {
  readonly originX: number;
  readonly originY: number;
  readonly directionX: number;
  readonly directionY: number;
}

export interface Projection {
  pointId: string;
  distanceAlongLine: number;
  perpendicularOffset: number;
}

export interface PolylineProjection {
  pointId: string;
  distanceAlongPolyline: number;
  distanceToPolyline: number;
}

export function polygonShape(vertices: readonly GeoPoint[]): PolygonShape {
  return { kind: 'Polygon', vertices: [...vertices] };
}

export function rectangleShape(first: GeoPoint, second: GeoPoint): RectangleShape {
  return { kind: 'Rectangle', corners: [{ ...first }, { ...second }] };
}

export function polylineShape(vertices: readonly GeoPoint[], halfWidthMeters: number): PolylineShape {
  return { kind: 'Polyline', vertices: [...vertices], halfWidthMeters };
}
