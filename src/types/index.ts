// ============================================================================
// COORDINATE SYSTEM REFERENCE
// ============================================================================
/**
 * Two coordinate systems appear in the sample data:
 *
 * GEOGRAPHIC (WGS84 degrees):
 *   - longitude: degrees east of prime meridian (negative in the Americas, e.g. -87.3047°)
 *   - latitude: degrees north of equator (e.g. 41.6067° for Gary, Indiana)
 *   - GeoJSON and MapLibre order: [longitude, latitude]
 *   - the monitor table stores them as separate `lat` / `long` columns
 *
 * UTM (metres, zone 16 north):
 *   - easting: metres east, with 500,000 m on the central meridian (-87°)
 *   - northing: metres north of the equator
 *   - used by the chemistry sample table only
 */

// ============================================================================
// Coordinate Types
// ============================================================================

/** WGS84 coordinates [longitude, latitude] in degrees */
export type LngLat = [lng: number, lat: number];

/** Projected UTM coordinates in metres */
export interface UTMCoordinates {
	easting: number;
	northing: number;
}

export type Hemisphere = 'north' | 'south';

/** Geographic bounding box in degrees */
export interface GeoBounds {
	minLng: number;
	maxLng: number;
	minLat: number;
	maxLat: number;
}

// ============================================================================
// Sample Tables
// ============================================================================

/** One row of the monitor location table */
export interface MonitorSite {
	id: number;
	/** Latitude in decimal degrees */
	lat: number;
	/** Longitude in decimal degrees */
	long: number;
	/** Coordinate reference system label, constant across rows */
	datum: string;
	name: string;
}

/** One row of the chemistry measurement table (UTM zone 16N positions) */
export interface ChemistrySample {
	sampleId: string;
	site: string;
	/** ISO date (YYYY-MM-DD) */
	date: string;
	analyte: string;
	value: number;
	units: string;
	easting: number;
	northing: number;
}

/** A chemistry sample with its reprojected geographic position */
export interface ProjectedSample extends ChemistrySample {
	lng: number;
	lat: number;
}

// ============================================================================
// Map Types
// ============================================================================

/** A marker to draw on a static map */
export interface MapPoint {
	lng: number;
	lat: number;
	label?: string;
}

/** One boundary name, or several drawn together */
export type RegionSelector = string | readonly string[];

/** Properties written on each monitor feature */
export interface MonitorProperties {
	id: number;
	name: string;
	datum: string;
}

/** Properties written on each reprojected sample feature */
export interface SampleProperties {
	sampleId: string;
	site: string;
	date: string;
	analyte: string;
	value: number;
	units: string;
	easting: number;
	northing: number;
}

/** Properties of a boundary outline */
export interface BoundaryProperties {
	name: string;
}
