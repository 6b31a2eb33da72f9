/**
 * Static map section: state outlines with the monitors overlaid.
 */

import { CONFIG, resolveOutputPath } from '@/lib/config';
import { loadBoundaries, loadMonitors } from '@/lib/data';
import { renderStaticMap } from '@/maps/staticMap';
import type { RegionSelector } from '@/types';
import { writeArtifact, type Artifact } from '@/lib/files';

export interface StaticMapDemoOptions {
  outputDir?: string;
  region?: RegionSelector;
  labels?: boolean;
  title?: string;
}

export async function runStaticMapDemo(options: StaticMapDemoOptions = {}): Promise<Artifact> {
  const {
    outputDir = CONFIG.paths.output,
    region = 'indiana',
    labels = true,
    title = 'Air-quality monitors',
  } = options;

  const [monitors, boundaries] = await Promise.all([loadMonitors(), loadBoundaries()]);

  const svg = renderStaticMap(boundaries, {
    region,
    labels,
    title,
    points: monitors.map((m) => ({ lng: m.long, lat: m.lat, label: m.name })),
  });

  return writeArtifact(resolveOutputPath(CONFIG.files.staticMap, outputDir), svg);
}
