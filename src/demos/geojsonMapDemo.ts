/**
 * GeoJSON web map section: monitor table → GeoJSON file → MapLibre page.
 */

import { join } from 'path';
import { CONFIG, resolveOutputPath } from '@/lib/config';
import { loadMonitors } from '@/lib/data';
import { monitorsToFeatureCollection, writeGeoJson } from '@/lib/geojson';
import { renderGeoJsonMapFromFile } from '@/maps/geojsonMap';
import { writeArtifact, type Artifact } from '@/lib/files';

export interface GeoJsonMapDemoOptions {
  outputDir?: string;
  /** Where the intermediate GeoJSON file goes */
  tmpDir?: string;
}

export interface GeoJsonMapDemoResult {
  geojson: Artifact;
  page: Artifact;
}

export async function runGeoJsonMapDemo(options: GeoJsonMapDemoOptions = {}): Promise<GeoJsonMapDemoResult> {
  const { outputDir = CONFIG.paths.output, tmpDir = CONFIG.paths.tmp } = options;

  const monitors = await loadMonitors();
  const geojson = await writeGeoJson(
    monitorsToFeatureCollection(monitors),
    join(tmpDir, CONFIG.files.monitorsGeoJson)
  );

  const html = await renderGeoJsonMapFromFile(geojson.path, { title: 'Air-quality monitors' });
  const page = await writeArtifact(resolveOutputPath(CONFIG.files.webMap, outputDir), html);

  return { geojson, page };
}
