import { describe, it, expect } from 'vitest';
import { createPointsLayers } from './PointsLayer';

describe('createPointsLayers', () => {
  it('should create only a circle layer without a label field', () => {
    const layers = createPointsLayers({ sourceId: 'monitors' });

    expect(layers).toHaveLength(1);
    expect(layers[0]).toMatchObject({
      id: 'monitors-circles',
      type: 'circle',
      source: 'monitors',
      paint: { 'circle-radius': 5, 'circle-color': '#d7301f' },
    });
  });

  it('should add a label layer reading the given property', () => {
    const layers = createPointsLayers({ sourceId: 'monitors', labelField: 'name', textSize: 11 });

    expect(layers).toHaveLength(2);
    expect(layers[1]).toMatchObject({
      id: 'monitors-labels',
      type: 'symbol',
      source: 'monitors',
      layout: {
        'text-field': ['get', 'name'],
        'text-font': ['Open Sans Regular'],
        'text-size': 11,
        'text-anchor': 'top',
      },
    });
  });

  it('should apply colour overrides', () => {
    const [circles] = createPointsLayers({ sourceId: 's', circleColor: '#00ff00', circleRadius: 7 });
    expect(circles.paint).toMatchObject({ 'circle-color': '#00ff00', 'circle-radius': 7 });
  });
});
