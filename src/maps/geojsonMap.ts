/**
 * GeoJSON Web Map
 *
 * Renders a FeatureCollection as an interactive MapLibre page: raster base
 * map, a circle per point, optional labels and a popup listing the clicked
 * feature's properties. The style is checked against the MapLibre style spec
 * before it is written.
 */

import { bbox } from '@turf/bbox';
import { validateStyleMin, type StyleSpecification } from '@maplibre/maplibre-gl-style-spec';
import type { FeatureCollection } from 'geojson';
import { CONFIG } from '@/lib/config';
import { locatedFeatures, readFeatureCollection } from '@/lib/geojson';
import { createBaseMapLayer, createPointsLayers, type MapTileProviderId } from '@/layers';
import { escapeXml, serializeForScript } from '@/utils';

/** Source id of the data points in the generated style */
export const DATA_SOURCE_ID = 'points';

export interface MapStyleOptions {
  provider?: MapTileProviderId;
  /** Property used for labels; no labels when omitted */
  labelField?: string;
  glyphs?: string;
}

export interface GeoJsonMapOptions extends MapStyleOptions {
  title?: string;
  maplibreVersion?: string;
}

/** [[west, south], [east, north]] */
export type LngLatBounds = [[number, number], [number, number]];

/**
 * Build and validate the MapLibre style for a collection
 *
 * @throws Error listing every style validation message
 */
export function buildMapStyle(collection: FeatureCollection, options: MapStyleOptions = {}): StyleSpecification {
  const { provider, labelField, glyphs = CONFIG.webMap.glyphs } = options;
  const basemap = createBaseMapLayer({ provider });

  const style: StyleSpecification = {
    version: 8,
    glyphs,
    sources: {
      [basemap.sourceId]: basemap.source,
      [DATA_SOURCE_ID]: { type: 'geojson', data: collection },
    },
    layers: [basemap.layer, ...createPointsLayers({ sourceId: DATA_SOURCE_ID, labelField })],
  };

  const errors = validateStyleMin(style);
  if (errors.length > 0) {
    throw new Error(`Invalid map style: ${errors.map((e) => e.message).join('; ')}`);
  }

  return style;
}

/**
 * Bounds of a collection, or null when it has no features
 */
export function collectionBounds(collection: FeatureCollection): LngLatBounds | null {
  if (collection.features.length === 0) return null;
  const [west, south, east, north] = bbox(collection);
  return [
    [west, south],
    [east, north],
  ];
}

/**
 * Render a standalone HTML page showing the collection on a MapLibre map
 */
export function renderGeoJsonMapHtml(collection: FeatureCollection, options: GeoJsonMapOptions = {}): string {
  const { title = 'Monitor locations', maplibreVersion = CONFIG.webMap.maplibreVersion, ...styleOptions } = options;
  const style = buildMapStyle(collection, { ...styleOptions, labelField: styleOptions.labelField ?? 'name' });
  const bounds = collectionBounds(collection);
  const cdn = `https://unpkg.com/maplibre-gl@${encodeURIComponent(maplibreVersion)}/dist`;

  const mapOptions: Record<string, unknown> = { container: 'map', style };
  if (bounds) {
    mapOptions.bounds = bounds;
    mapOptions.fitBoundsOptions = { padding: CONFIG.webMap.fitPadding, maxZoom: CONFIG.webMap.maxZoom };
  } else {
    mapOptions.center = [0, 0];
    mapOptions.zoom = 1;
  }

  return `<!DOCTYPE html>
<html lang="en">
<head>
  <meta charset="utf-8">
  <title>${escapeXml(title)}</title>
  <link rel="stylesheet" href="${cdn}/maplibre-gl.css">
  <script src="${cdn}/maplibre-gl.js"></script>
  <style>
    html, body { margin: 0; height: 100%; font-family: ${CONFIG.staticMap.fontFamily}; }
    #map { position: absolute; inset: 0; }
    .popup-table td { padding: 0 6px 0 0; font-size: 12px; }
  </style>
</head>
<body>
  <div id="map"></div>
  <script>
    const map = new maplibregl.Map(${serializeForScript(mapOptions)});
    map.addControl(new maplibregl.NavigationControl());
    map.on('click', ${serializeForScript(`${DATA_SOURCE_ID}-circles`)}, function (e) {
      const feature = e.features && e.features[0];
      if (!feature) return;
      const table = document.createElement('table');
      table.className = 'popup-table';
      Object.entries(feature.properties).forEach(function (entry) {
        const row = table.insertRow();
        row.insertCell().textContent = entry[0];
        row.insertCell().textContent = String(entry[1]);
      });
      new maplibregl.Popup().setLngLat(feature.geometry.coordinates).setDOMContent(table).addTo(map);
    });
  </script>
</body>
</html>
`;
}

/**
 * Read a GeoJSON file from disk and render it as a web map page.
 * Features with a null geometry have no location and are left off the map.
 */
export async function renderGeoJsonMapFromFile(filePath: string, options: GeoJsonMapOptions = {}): Promise<string> {
  const collection = await readFeatureCollection(filePath);
  return renderGeoJsonMapHtml(locatedFeatures(collection), options);
}
