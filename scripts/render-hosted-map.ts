/**
 * Render the monitor locations with the Google Charts map widget
 *
 * Run: npm run map:hosted
 * Optional: GOOGLE_MAPS_API_KEY in the environment
 *
 * The page loads the widget from Google when opened in a browser.
 */

import { runHostedMapDemo } from "@/demos";
import { CONFIG } from "@/lib/config";
import { formatBytes } from "@/utils";

async function main() {
	console.log("🌐 Building hosted map widget page\n");

	if (!CONFIG.hostedMap.apiKey) {
		console.warn(
			"⚠️  GOOGLE_MAPS_API_KEY not set; the widget will show a development-only watermark\n"
		);
	}

	const { rows, page } = await runHostedMapDemo();

	console.log("LatLong                      Tip");
	console.log("─".repeat(60));
	for (const row of rows) {
		console.log(`${row.LatLong.padEnd(28)} ${row.Tip}`);
	}
	console.log("─".repeat(60));
	console.log(`\n   ✅ ${page.path} (${formatBytes(page.bytes)})`);
}

main().catch((error: unknown) => {
	console.error("❌ Hosted map failed:", error);
	process.exit(1);
});
