import bbox from '@turf/bbox';
import { multiPoint } from '@turf/helpers';
import meanBy from 'lodash/meanBy';
import { GeoPoint } from '../../types/geometry';

export interface MapBounds {
  north: number;
  south: number;
  east: number;
  west: number;
}

export interface MapView {
  center: GeoPoint;
  zoom: number;
}

const BOUNDS_PADDING_DEGREES = 0.01;

const DEFAULT_UK_BOUNDS: MapBounds = { north: 52, south: 50, east: 1, west: -2 };

const DEFAULT_MAP_VIEW: MapView = { center: { lat: 51.5, lon: -0.1 }, zoom: 6 };

const SINGLE_POINT_ZOOM = 15;

// Largest coordinate spread (degrees) first
const ZOOM_STEPS: ReadonlyArray<{ minSpread: number; zoom: number }> = [
  { minSpread: 2, zoom: 6 },
  { minSpread: 1, zoom: 7 },
  { minSpread: 0.5, zoom: 8 },
  { minSpread: 0.1, zoom: 10 },
  { minSpread: 0.05, zoom: 12 }
];

const CLOSE_ZOOM = 14;

function validPoints(points: readonly GeoPoint[]): GeoPoint[] {
  return points.filter(point => Number.isFinite(point.lat) && Number.isFinite(point.lon));
}

function extent(points: readonly GeoPoint[]): [number, number, number, number] {
  const [west, south, east, north] = bbox(multiPoint(points.map(point => [point.lon, point.lat])));
  return [west, south, east, north];
}

/**
 * Padded bounds around the given points
 */
export function calculateMapBounds(points: readonly GeoPoint[]): MapBounds {
  const valid = validPoints(points);
  if (valid.length === 0) {
    return { ...DEFAULT_UK_BOUNDS };
  }

  const [west, south, east, north] = extent(valid);
  return {
    north: north + BOUNDS_PADDING_DEGREES,
    south: south - BOUNDS_PADDING_DEGREES,
    east: east + BOUNDS_PADDING_DEGREES,
    west: west - BOUNDS_PADDING_DEGREES
  };
}

/**
 * Mean position of the points and a zoom level that fits their spread
 */
export function calculateMapCenterAndZoom(points: readonly GeoPoint[]): MapView {
  const valid = validPoints(points);
  if (valid.length === 0) {
    return { center: { ...DEFAULT_MAP_VIEW.center }, zoom: DEFAULT_MAP_VIEW.zoom };
  }
  if (valid.length === 1) {
    return { center: { lat: valid[0].lat, lon: valid[0].lon }, zoom: SINGLE_POINT_ZOOM };
  }

  const [west, south, east, north] = extent(valid);
  const spread = Math.max(north - south, east - west);
  const step = ZOOM_STEPS.find(candidate => spread > candidate.minSpread);

  return {
    center: { lat: meanBy(valid, 'lat'), lon: meanBy(valid, 'lon') },
    zoom: step ? step.zoom : CLOSE_ZOOM
  };
}
