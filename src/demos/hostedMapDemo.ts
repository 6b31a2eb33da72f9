/**
 * Hosted widget section: "lat:long" table rendered by the Google Charts map.
 */

import { CONFIG, resolveOutputPath } from '@/lib/config';
import { loadMonitors } from '@/lib/data';
import { buildHostedMapTable, renderHostedMapHtml, type HostedMapRow } from '@/maps/hostedMap';
import { writeArtifact, type Artifact } from '@/lib/files';

export interface HostedMapDemoOptions {
  outputDir?: string;
  apiKey?: string;
}

export interface HostedMapDemoResult {
  rows: HostedMapRow[];
  page: Artifact;
}

export async function runHostedMapDemo(options: HostedMapDemoOptions = {}): Promise<HostedMapDemoResult> {
  const { outputDir = CONFIG.paths.output, apiKey = CONFIG.hostedMap.apiKey } = options;

  const monitors = await loadMonitors();
  const rows = buildHostedMapTable(monitors);
  const html = renderHostedMapHtml(rows, { title: 'Air-quality monitors', apiKey });

  const page = await writeArtifact(resolveOutputPath(CONFIG.files.hostedMap, outputDir), html);
  return { rows, page };
}
