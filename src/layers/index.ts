/**
 * Layer Factories
 *
 * Exports all MapLibre layer factory functions.
 */

// Base map tiles
export {
	createBaseMapLayer,
	MAP_TILE_PROVIDERS,
	type BaseMapLayer,
	type BaseMapLayerConfig,
	type MapTileProvider,
	type MapTileProviderId,
} from "./BaseMapLayer";

// Data points
export {
	createPointsLayers,
	type PointsLayerConfig,
	type PointsLayers,
} from "./PointsLayer";
