/**
 * Reproject the chemistry samples from UTM to WGS84 and plot them
 *
 * Run: npm run map:reproject -- [zone]
 * The zone defaults to 16 (the zone the sample table was surveyed in).
 */

import { runReprojectionDemo } from "@/demos";
import { SAMPLE_UTM_ZONE } from "@/lib/constants";
import { formatBytes } from "@/utils";

function parseZone(arg: string | undefined): number {
	if (arg === undefined) return SAMPLE_UTM_ZONE;
	const zone = Number(arg);
	if (!Number.isInteger(zone)) {
		throw new Error(`Invalid UTM zone argument: "${arg}"`);
	}
	return zone;
}

async function main() {
	const zone = parseZone(process.argv[2]);
	console.log(`🧭 Reprojecting chemistry samples (UTM zone ${zone}N → WGS84)\n`);

	const { samples, geojson, map } = await runReprojectionDemo({ zone });

	console.log("Sample   Easting    Northing     Longitude     Latitude");
	console.log("─".repeat(60));
	for (const s of samples) {
		console.log(
			`${s.sampleId.padEnd(8)} ${String(s.easting).padEnd(10)} ${String(s.northing).padEnd(12)} ${s.lng.toFixed(6).padEnd(13)} ${s.lat.toFixed(6)}`
		);
	}
	console.log("─".repeat(60));
	console.log(`\n   ✅ ${geojson.path} (${formatBytes(geojson.bytes)})`);
	console.log(`   ✅ ${map.path} (${formatBytes(map.bytes)})`);
}

main().catch((error: unknown) => {
	console.error("❌ Reprojection failed:", error);
	process.exit(1);
});
