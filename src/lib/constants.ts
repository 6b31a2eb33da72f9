/**
 * Sample-data constants and coordinate helpers
 *
 * The sample monitors sit along the southern shore of Lake Michigan,
 * inside UTM zone 16 (central meridian -87°).
 */

/** Datum label carried by every monitor row */
export const DEFAULT_DATUM = 'WGS84';

/** UTM zone of the chemistry sample easting/northing columns */
export const SAMPLE_UTM_ZONE = 16;

/** Conversion factor: degrees to radians */
export const DEG_TO_RAD = Math.PI / 180;

/**
 * Check that a latitude is a finite number within [-90, 90]
 */
export function isValidLatitude(lat: number): boolean {
  return Number.isFinite(lat) && lat >= -90 && lat <= 90;
}

/**
 * Check that a longitude is a finite number within [-180, 180]
 */
export function isValidLongitude(lng: number): boolean {
  return Number.isFinite(lng) && lng >= -180 && lng <= 180;
}

/**
 * Clamp a value between min and max
 */
export function clamp(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}
