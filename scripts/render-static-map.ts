/**
 * Render the monitor locations over state outlines as an SVG
 *
 * Run: npm run map:static -- [region ...]
 * Example: npm run map:static -- indiana illinois
 *
 * Writes to MAPS_OUTPUT_DIR (default ./output).
 */

import { runStaticMapDemo } from "@/demos";
import { formatBytes } from "@/utils";

async function main() {
	const regions = process.argv.slice(2);
	console.log("🗺️  Rendering static monitor map\n");

	const artifact = await runStaticMapDemo({
		region: regions.length > 0 ? regions : undefined,
	});

	console.log(`   ✅ ${artifact.path} (${formatBytes(artifact.bytes)})`);
}

main().catch((error: unknown) => {
	console.error("❌ Static map failed:", error);
	process.exit(1);
});
