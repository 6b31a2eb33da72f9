/**
 * Convert the monitor table to GeoJSON and render it on a MapLibre web map
 *
 * Run: npm run map:geojson [-- --no-open]
 *
 * The GeoJSON goes to MAPS_TMP_DIR (default: the OS temp dir), the page to
 * MAPS_OUTPUT_DIR. The page then opens in the default browser unless
 * --no-open is passed or MAPS_NO_OPEN is set.
 */

import { pathToFileURL } from "url";
import { runGeoJsonMapDemo } from "@/demos";
import { openInBrowser, shouldOpenBrowser } from "@/lib/browser";
import { formatBytes } from "@/utils";

async function main() {
	console.log("📍 Rendering GeoJSON web map\n");

	const { geojson, page } = await runGeoJsonMapDemo();

	console.log(`   ✅ GeoJSON: ${geojson.path} (${formatBytes(geojson.bytes)})`);
	console.log(`   ✅ Page:    ${page.path} (${formatBytes(page.bytes)})`);

	const url = pathToFileURL(page.path).href;
	if (!shouldOpenBrowser(process.argv.slice(2))) {
		console.log(`\n✨ Open ${url}`);
		return;
	}

	try {
		await openInBrowser(page.path);
		console.log(`\n🌐 Opened ${url}`);
	} catch (error) {
		// The page is written either way
		console.warn(`\n⚠️  Could not open a browser (${error instanceof Error ? error.message : String(error)})`);
		console.log(`✨ Open ${url}`);
	}
}

main().catch((error: unknown) => {
	console.error("❌ GeoJSON map failed:", error);
	process.exit(1);
});
