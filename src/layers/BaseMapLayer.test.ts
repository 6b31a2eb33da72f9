import { describe, it, expect } from 'vitest';
import { createBaseMapLayer, MAP_TILE_PROVIDERS } from './BaseMapLayer';

describe('createBaseMapLayer', () => {
  it('should default to CartoDB Voyager raster tiles', () => {
    const { sourceId, source, layer } = createBaseMapLayer();

    expect(sourceId).toBe('basemap');
    expect(source).toEqual({
      type: 'raster',
      tiles: ['https://basemaps.cartocdn.com/rastertiles/voyager/{z}/{x}/{y}@2x.png'],
      tileSize: 256,
      maxzoom: 19,
      attribution: '&copy; OpenStreetMap contributors &copy; CARTO',
    });
    expect(layer).toEqual({
      id: 'basemap',
      type: 'raster',
      source: 'basemap',
      paint: { 'raster-opacity': 1 },
    });
  });

  it('should switch provider and id', () => {
    const { source, layer } = createBaseMapLayer({ id: 'tiles', provider: 'osm', opacity: 0.6 });

    expect(source.tiles).toEqual([MAP_TILE_PROVIDERS.osm.url]);
    expect(source.attribution).toBe('&copy; OpenStreetMap contributors');
    expect(layer.source).toBe('tiles');
    expect(layer.paint).toEqual({ 'raster-opacity': 0.6 });
  });

  it('should use z/x/y templates for every provider', () => {
    for (const provider of Object.values(MAP_TILE_PROVIDERS)) {
      expect(provider.url).toContain('{z}/{x}/{y}');
      expect(provider.url.startsWith('https://')).toBe(true);
    }
  });
});
