/**
 * Coordinate System Utilities
 *
 * Converts between WGS84 geographic coordinates and UTM projected
 * coordinates. All projection math is delegated to proj4.
 *
 * COORDINATE SYSTEMS:
 * - WGS84: [longitude, latitude] in degrees - used by GeoJSON and the maps
 * - UTM: { easting, northing } in metres - used by the chemistry sample table
 *   - zones are 6° wide, numbered 1..60 eastward from 180°W
 *   - southern hemisphere northings carry a 10,000 km false northing (+south)
 */

import proj4 from 'proj4';
import { SAMPLE_UTM_ZONE, clamp } from '@/lib/constants';
import type {
  ChemistrySample,
  Hemisphere,
  LngLat,
  ProjectedSample,
  UTMCoordinates,
} from '@/types';

/** Geographic longitude/latitude on the WGS84 ellipsoid */
export const WGS84_LONGLAT = '+proj=longlat +datum=WGS84 +no_defs';

/**
 * Build the proj4 definition string for a UTM zone.
 *
 * @example
 * ```ts
 * utmProjection(16); // '+proj=utm +zone=16 +datum=WGS84 +units=m +no_defs'
 * ```
 */
export function utmProjection(zone: number, hemisphere: Hemisphere = 'north'): string {
  if (!Number.isInteger(zone) || zone < 1 || zone > 60) {
    throw new Error(`Invalid UTM zone: ${zone} (expected an integer from 1 to 60)`);
  }
  const south = hemisphere === 'south' ? ' +south' : '';
  return `+proj=utm +zone=${zone}${south} +datum=WGS84 +units=m +no_defs`;
}

/**
 * UTM zone number containing a longitude.
 * 180° is folded into zone 60 rather than wrapping to zone 61.
 */
export function utmZoneForLongitude(lng: number): number {
  if (!Number.isFinite(lng)) {
    throw new Error(`Invalid longitude: ${lng}`);
  }
  return clamp(Math.floor((lng + 180) / 6) + 1, 1, 60);
}

function assertFinitePair(a: number, b: number, what: string): void {
  if (!Number.isFinite(a) || !Number.isFinite(b)) {
    throw new Error(`Invalid ${what}: [${a}, ${b}]`);
  }
}

/**
 * Convert UTM easting/northing to WGS84.
 *
 * @param coords - Easting and northing in metres
 * @param zone - UTM zone number (default: the sample zone, 16)
 * @param hemisphere - Hemisphere of the zone
 * @returns [lng, lat] in degrees
 */
export function utmToLngLat(
  coords: UTMCoordinates,
  zone: number = SAMPLE_UTM_ZONE,
  hemisphere: Hemisphere = 'north'
): LngLat {
  assertFinitePair(coords.easting, coords.northing, 'UTM coordinates');
  const [lng, lat] = proj4(utmProjection(zone, hemisphere), WGS84_LONGLAT, [
    coords.easting,
    coords.northing,
  ]);
  return [lng, lat];
}

/**
 * Convert WGS84 to UTM easting/northing.
 *
 * @param coords - [lng, lat] in degrees
 * @param zone - UTM zone number (default: the sample zone, 16)
 * @param hemisphere - Hemisphere of the zone
 */
export function lngLatToUtm(
  coords: LngLat,
  zone: number = SAMPLE_UTM_ZONE,
  hemisphere: Hemisphere = 'north'
): UTMCoordinates {
  assertFinitePair(coords[0], coords[1], 'WGS84 coordinates');
  const [easting, northing] = proj4(WGS84_LONGLAT, utmProjection(zone, hemisphere), [
    coords[0],
    coords[1],
  ]);
  return { easting, northing };
}

/**
 * Reproject chemistry samples from UTM to WGS84.
 * Rows keep their order and every original field; `lng` and `lat` are added.
 */
export function reprojectSamples(
  samples: readonly ChemistrySample[],
  zone: number = SAMPLE_UTM_ZONE,
  hemisphere: Hemisphere = 'north'
): ProjectedSample[] {
  // Build the converter once for the whole table
  const converter = proj4(utmProjection(zone, hemisphere), WGS84_LONGLAT);

  return samples.map((sample) => {
    assertFinitePair(sample.easting, sample.northing, `UTM coordinates for ${sample.sampleId}`);
    const [lng, lat] = converter.forward([sample.easting, sample.northing]);
    return { ...sample, lng, lat };
  });
}
