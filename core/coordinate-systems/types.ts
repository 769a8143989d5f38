import { Bounds } from '../../types/geometry';

export const COORDINATE_SYSTEMS = {
  NATIONAL_GRID: 'NationalGrid',
  GEOGRAPHIC: 'Geographic',
  LOCAL_PROJECTED: 'LocalProjected',
  WEB_MERCATOR: 'WebMercator',
} as const;

export type CoordinateSystem = typeof COORDINATE_SYSTEMS[keyof typeof COORDINATE_SYSTEMS];

export function isCoordinateSystem(value: string): value is CoordinateSystem {
  return Object.values(COORDINATE_SYSTEMS).some(system => system === value);
}

export type NationalGridCode = 'EPSG:27700' | 'EPSG:2056';

export interface NationalGridDefinition {
  code: NationalGridCode;
  name: string;
  proj4def: string;
  bounds: Bounds;
}

/**
 * UTM zone used as the metric frame for one geometric operation
 */
export interface LocalFrame {
  code: string;
  zone: number;
  hemisphere: 'north' | 'south';
  proj4def: string;
}

export interface CacheStats {
  size: number;
  capacity: number;
  hits: number;
  misses: number;
  evictions: number;
}
