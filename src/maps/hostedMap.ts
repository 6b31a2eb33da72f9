/**
 * Hosted Map Widget
 *
 * Builds the two-column table the Google Charts map widget takes
 * ("lat:long" location + tooltip) and wraps it in a standalone HTML page.
 * The page loads the charts loader from Google; nothing is fetched here.
 */

import { CONFIG } from '@/lib/config';
import type { MonitorSite } from '@/types';
import { escapeXml, serializeForScript } from '@/utils';

/** One row of the widget table */
export interface HostedMapRow {
  /** "lat:long" in decimal degrees */
  LatLong: string;
  /** Tooltip text shown when a marker is selected */
  Tip: string;
}

export type HostedMapType = 'normal' | 'terrain' | 'satellite' | 'hybrid';

export interface HostedMapOptions {
  title?: string;
  mapType?: HostedMapType;
  /** Show the tooltip on marker click */
  showTip?: boolean;
  /** Initial zoom; the widget fits all markers when omitted */
  zoomLevel?: number;
  /** Maps API key passed to the charts loader */
  apiKey?: string;
  loaderUrl?: string;
}

/**
 * Combine latitude and longitude into the widget's location field.
 * Values are written exactly as given: no rounding, latitude first.
 *
 * @example
 * ```ts
 * toLatLongField(41.60668, -87.304729); // "41.60668:-87.304729"
 * ```
 */
export function toLatLongField(lat: number, lng: number): string {
  return `${lat}:${lng}`;
}

/**
 * Build the widget table from monitor rows
 *
 * @param monitors - Monitor table
 * @param tip - Tooltip for each row (default: the site name)
 */
export function buildHostedMapTable(
  monitors: readonly MonitorSite[],
  tip: (monitor: MonitorSite) => string = (monitor) => monitor.name
): HostedMapRow[] {
  return monitors.map((monitor) => ({
    LatLong: toLatLongField(monitor.lat, monitor.long),
    Tip: tip(monitor),
  }));
}

/**
 * Render a standalone HTML page that draws the table with google.visualization.Map
 */
export function renderHostedMapHtml(rows: readonly HostedMapRow[], options: HostedMapOptions = {}): string {
  const {
    title = 'Monitor locations',
    mapType = CONFIG.hostedMap.mapType,
    showTip = CONFIG.hostedMap.showTip,
    zoomLevel,
    apiKey = CONFIG.hostedMap.apiKey,
    loaderUrl = CONFIG.hostedMap.loaderUrl,
  } = options;

  const loadOptions: Record<string, unknown> = { packages: ['map'] };
  if (apiKey) loadOptions.mapsApiKey = apiKey;

  const chartOptions: Record<string, unknown> = { mapType, showTooltip: showTip, showInfoWindow: showTip };
  if (zoomLevel !== undefined) chartOptions.zoomLevel = zoomLevel;

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>${escapeXml(title)}</title>
  <script src="${escapeXml(loaderUrl)}"></script>
  <style>
    html, body { margin: 0; height: 100%; font-family: ${CONFIG.staticMap.fontFamily}; }
    h1 { margin: 0; padding: 12px 16px; font-size: 18px; }
    #map { position: absolute; top: 48px; right: 0; bottom: 0; left: 0; }
  </style>
</head>
<body>
  <h1>${escapeXml(title)}</h1>
  <div id="map"></div>
  <script>
    const rows = ${serializeForScript(rows)};
    const chartOptions = ${serializeForScript(chartOptions)};
    google.charts.load('current', ${serializeForScript(loadOptions)});
    google.charts.setOnLoadCallback(function () {
      const table = [['Lat', 'Long', 'Tip']];
      rows.forEach(function (row) {
        const parts = row.LatLong.split(':');
        table.push([Number(parts[0]), Number(parts[1]), row.Tip]);
      });
      const data = google.visualization.arrayToDataTable(table);
      new google.visualization.Map(document.getElementById('map')).draw(data, chartOptions);
    });
  </script>
</body>
</html>
`;
}
