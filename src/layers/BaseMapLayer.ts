/**
 * Base Map Layer Factory
 *
 * Creates the MapLibre raster source and layer drawn under the data points.
 */

import type { RasterLayerSpecification, RasterSourceSpecification } from '@maplibre/maplibre-gl-style-spec';

/** OpenStreetMap tile URL template */
const OSM_TILE_URL = 'https://tile.openstreetmap.org/{z}/{x}/{y}.png';

/** CartoDB Voyager - Modern, clean style with good detail (free tier) */
const CARTO_VOYAGER_URL = 'https://basemaps.cartocdn.com/rastertiles/voyager/{z}/{x}/{y}@2x.png';

/** CartoDB Positron - Minimalist light gray style (free tier) */
const CARTO_POSITRON_URL = 'https://basemaps.cartocdn.com/light_all/{z}/{x}/{y}@2x.png';

/** CartoDB Dark Matter - Dark theme (free tier) */
const CARTO_DARK_URL = 'https://basemaps.cartocdn.com/dark_all/{z}/{x}/{y}@2x.png';

const OSM_ATTRIBUTION = '&copy; OpenStreetMap contributors';
const CARTO_ATTRIBUTION = `${OSM_ATTRIBUTION} &copy; CARTO`;

/**
 * Map tile provider configuration
 */
export interface MapTileProvider {
  /** Display name */
  name: string;
  /** Tile URL template */
  url: string;
  attribution: string;
}

/**
 * Available map tile providers
 */
export const MAP_TILE_PROVIDERS = {
  voyager: {
    name: 'CartoDB Voyager',
    url: CARTO_VOYAGER_URL,
    attribution: CARTO_ATTRIBUTION,
  },
  positron: {
    name: 'CartoDB Light',
    url: CARTO_POSITRON_URL,
    attribution: CARTO_ATTRIBUTION,
  },
  dark: {
    name: 'CartoDB Dark',
    url: CARTO_DARK_URL,
    attribution: CARTO_ATTRIBUTION,
  },
  osm: {
    name: 'OpenStreetMap',
    url: OSM_TILE_URL,
    attribution: OSM_ATTRIBUTION,
  },
} as const satisfies Record<string, MapTileProvider>;

/** Map tile provider ID type */
export type MapTileProviderId = keyof typeof MAP_TILE_PROVIDERS;

export interface BaseMapLayerConfig {
  id?: string;
  provider?: MapTileProviderId;
  /** Maximum zoom level served by the provider */
  maxZoom?: number;
  /** Layer opacity */
  opacity?: number;
}

export interface BaseMapLayer {
  sourceId: string;
  source: RasterSourceSpecification;
  layer: RasterLayerSpecification;
}

/**
 * Create the raster base map source and layer
 */
export function createBaseMapLayer(config: BaseMapLayerConfig = {}): BaseMapLayer {
  const { id = 'basemap', provider = 'voyager', maxZoom = 19, opacity = 1 } = config;
  const tiles = MAP_TILE_PROVIDERS[provider];

  return {
    sourceId: id,
    source: {
      type: 'raster',
      tiles: [tiles.url],
      tileSize: 256,
      maxzoom: maxZoom,
      attribution: tiles.attribution,
    },
    layer: {
      id,
      type: 'raster',
      source: id,
      paint: { 'raster-opacity': opacity },
    },
  };
}
