/**
 * Reprojection section: chemistry samples in UTM zone 16 → WGS84, then plotted.
 */

import { CONFIG, resolveOutputPath } from '@/lib/config';
import { SAMPLE_UTM_ZONE } from '@/lib/constants';
import { reprojectSamples } from '@/lib/coordinateSystem';
import { loadBoundaries, loadChemistrySamples } from '@/lib/data';
import { samplesToFeatureCollection, writeGeoJson } from '@/lib/geojson';
import { renderStaticMap } from '@/maps/staticMap';
import type { MapPoint, ProjectedSample, RegionSelector } from '@/types';
import { writeArtifact, type Artifact } from '@/lib/files';

export interface ReprojectionDemoOptions {
  outputDir?: string;
  zone?: number;
  region?: RegionSelector;
}

export interface ReprojectionDemoResult {
  samples: ProjectedSample[];
  geojson: Artifact;
  map: Artifact;
}

/**
 * One marker per sampling site; several analytes are often measured at the same spot
 */
function siteMarkers(samples: readonly ProjectedSample[]): MapPoint[] {
  const bySite = new Map<string, MapPoint>();
  for (const sample of samples) {
    if (!bySite.has(sample.site)) {
      bySite.set(sample.site, { lng: sample.lng, lat: sample.lat, label: sample.site });
    }
  }
  return [...bySite.values()];
}

export async function runReprojectionDemo(options: ReprojectionDemoOptions = {}): Promise<ReprojectionDemoResult> {
  const { outputDir = CONFIG.paths.output, zone = SAMPLE_UTM_ZONE, region = 'indiana' } = options;

  const [rows, boundaries] = await Promise.all([loadChemistrySamples(), loadBoundaries()]);
  const samples = reprojectSamples(rows, zone);

  const geojson = await writeGeoJson(
    samplesToFeatureCollection(samples),
    resolveOutputPath(CONFIG.files.samplesGeoJson, outputDir)
  );

  const svg = renderStaticMap(boundaries, {
    region,
    points: siteMarkers(samples),
    labels: true,
    title: `Chemistry samples (UTM zone ${zone} → WGS84)`,
  });
  const map = await writeArtifact(resolveOutputPath(CONFIG.files.samplesMap, outputDir), svg);

  return { samples, geojson, map };
}
