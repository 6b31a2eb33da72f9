/**
 * Application configuration
 *
 * Centralized settings for the map scripts
 */

import { tmpdir } from "os";
import { join } from "path";
import { fileURLToPath } from "url";

/** Project root (two levels above src/lib) */
const PROJECT_ROOT = fileURLToPath(new URL("../..", import.meta.url));

/**
 * Read an environment variable, treating an empty string as unset
 */
function readEnv(name: string): string | undefined {
	const value = process.env[name];
	return value === undefined || value === "" ? undefined : value;
}

/**
 * Output directory for rendered maps.
 * Set MAPS_OUTPUT_DIR to write somewhere other than ./output
 */
const OUTPUT_DIR = readEnv("MAPS_OUTPUT_DIR") ?? join(PROJECT_ROOT, "output");

/** Directory for intermediate files such as the GeoJSON handed to the web map */
const TMP_DIR = readEnv("MAPS_TMP_DIR") ?? tmpdir();

/**
 * Resolve a path inside the sample data directory
 *
 * @param fileName - File name relative to data/ (e.g. "monitors.json")
 */
function getDataPath(fileName: string): string {
	return join(PROJECT_ROOT, "data", fileName);
}

export const CONFIG = {
	/** Filesystem locations */
	paths: {
		root: PROJECT_ROOT,
		output: OUTPUT_DIR,
		tmp: TMP_DIR,
	},

	/** Sample tables */
	data: {
		monitors: getDataPath("monitors.json"),
		chemistry: getDataPath("chemistry.json"),
		/** Simplified state outlines for the static map */
		boundaries: getDataPath("boundaries.json"),
	},

	/** Static SVG map defaults */
	staticMap: {
		width: 800,
		height: 600,
		/** Margin around the drawn extent in pixels */
		padding: 40,
		/** Extra title band above the map in pixels */
		titleHeight: 36,
		boundaryFill: "#f2efe9",
		boundaryStroke: "#555555",
		markerRadius: 5,
		markerFill: "#d7301f",
		markerStroke: "#ffffff",
		labelColor: "#222222",
		fontFamily: "Helvetica, Arial, sans-serif",
		fontSize: 12,
		titleFontSize: 18,
	},

	/** Google Charts map widget */
	hostedMap: {
		loaderUrl: "https://www.gstatic.com/charts/loader.js",
		/** Optional Maps API key; the widget still loads without one in development mode */
		apiKey: readEnv("GOOGLE_MAPS_API_KEY"),
		mapType: "normal",
		showTip: true,
	},

	/** MapLibre GeoJSON web map */
	webMap: {
		maplibreVersion: readEnv("MAPLIBRE_VERSION") ?? "4.7.1",
		/** Glyph server for label fonts */
		glyphs: "https://demotiles.maplibre.org/font/{fontstack}/{range}.pbf",
		fontStack: ["Open Sans Regular"],
		/** Padding in pixels when fitting the view to the data */
		fitPadding: 48,
		maxZoom: 14,
	},

	/** Intermediate and output file names */
	files: {
		staticMap: "monitors-static.svg",
		hostedMap: "monitors-hosted.html",
		monitorsGeoJson: "monitors.geojson",
		webMap: "monitors-webmap.html",
		samplesGeoJson: "chemistry-samples.geojson",
		samplesMap: "chemistry-samples.svg",
	},
} as const;

/** Type for the config object */
export type Config = typeof CONFIG;

/**
 * Resolve a file name inside the output directory
 *
 * @param fileName - Bare file name (e.g. "monitors-static.svg")
 * @param outputDir - Override for CONFIG.paths.output
 */
export function resolveOutputPath(fileName: string, outputDir: string = CONFIG.paths.output): string {
	return join(outputDir, fileName);
}
