/**
 * Borehole location as loaded from survey data. Grid coordinates are national
 * grid eastings/northings; geographic and projected fields are derived.
 */
export interface SurveyPoint {
  readonly id: string;
  readonly gridX: number;
  readonly gridY: number;
  readonly geoLat: number | null;
  readonly geoLon: number | null;
  readonly projX: number | null;
  readonly projY: number | null;
}

export type GeolocatedSurveyPoint = SurveyPoint & { readonly geoLat: number; readonly geoLon: number };
export type ProjectedSurveyPoint = SurveyPoint & { readonly projX: number; readonly projY: number };

export function createSurveyPoint(id: string, gridX: number, gridY: number): SurveyPoint {
  return { id, gridX, gridY, geoLat: null, geoLon: null, projX: null, projY: null };
}

export function hasGeographic(point: SurveyPoint): point is GeolocatedSurveyPoint {
  return point.geoLat !== null && point.geoLon !== null;
}

export function hasProjected(point: SurveyPoint): point is ProjectedSurveyPoint {
  return point.projX !== null && point.projY !== null;
}
