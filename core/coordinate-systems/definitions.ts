import { Bounds } from '../../types/geometry';
import { NationalGridCode, NationalGridDefinition, LocalFrame } from './types';

export const NATIONAL_GRIDS: Record<NationalGridCode, NationalGridDefinition> = {
  'EPSG:27700': {
    code: 'EPSG:27700',
    name: 'British National Grid',
    proj4def: '+proj=tmerc +lat_0=49 +lon_0=-2 +k=0.9996012717 +x_0=400000 +y_0=-100000 +ellps=airy +towgs84=446.448,-125.157,542.06,0.15,0.247,0.842,-20.489 +units=m +no_defs',
    bounds: { minX: 0, minY: 0, maxX: 800000, maxY: 1400000 }
  },
  'EPSG:2056': {
    code: 'EPSG:2056',
    name: 'Swiss LV95',
    proj4def: '+proj=somerc +lat_0=46.95240555555556 +lon_0=7.439583333333333 +k_0=1 +x_0=2600000 +y_0=1200000 +ellps=bessel +towgs84=674.374,15.056,405.346,0,0,0,0 +units=m +no_defs',
    bounds: { minX: 2450000, minY: 1050000, maxX: 2850000, maxY: 1350000 }
  }
};

export const GEOGRAPHIC_DEFINITION = '+proj=longlat +datum=WGS84 +no_defs';
export const WEB_MERCATOR_DEFINITION = '+proj=merc +a=6378137 +b=6378137 +lat_ts=0 +lon_0=0 +x_0=0 +y_0=0 +k=1 +units=m +nadgrids=@null +no_defs';

export const GEOGRAPHIC_BOUNDS: Bounds = { minX: -180, minY: -90, maxX: 180, maxY: 90 };
export const WEB_MERCATOR_BOUNDS: Bounds = {
  minX: -20037508.34, minY: -20048966.10, maxX: 20037508.34, maxY: 20048966.10
};

export function isWithinBounds(x: number, y: number, bounds: Bounds): boolean {
  return x >= bounds.minX && x <= bounds.maxX && y >= bounds.minY && y <= bounds.maxY;
}

export function isValidGeographic(lon: number, lat: number): boolean {
  return Number.isFinite(lon) && Number.isFinite(lat) && isWithinBounds(lon, lat, GEOGRAPHIC_BOUNDS);
}

/**
 * UTM zone for a geographic position. Longitude 180 falls in zone 60.
 */
export function determineUtmZone(lon: number): number {
  const zone = Math.floor((lon + 180) / 6) + 1;
  return Math.min(Math.max(zone, 1), 60);
}

export function createLocalFrame(lon: number, lat: number): LocalFrame {
  const zone = determineUtmZone(lon);
  const hemisphere = lat < 0 ? 'south' : 'north';
  const epsg = (hemisphere === 'north' ? 32600 : 32700) + zone;
  return {
    code: `EPSG:${epsg}`,
    zone,
    hemisphere,
    proj4def: `+proj=utm +zone=${zone}${hemisphere === 'south' ? ' +south' : ''} +datum=WGS84 +units=m +no_defs`
  };
}
