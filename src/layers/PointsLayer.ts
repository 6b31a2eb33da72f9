/**
 * Points Layer Factory
 *
 * Creates MapLibre layers for a GeoJSON point source: a circle per feature
 * and, optionally, a text label read from one of its properties.
 */

import type { CircleLayerSpecification, SymbolLayerSpecification } from '@maplibre/maplibre-gl-style-spec';
import { CONFIG } from '@/lib/config';

export interface PointsLayerConfig {
  /** GeoJSON source the layers read from */
  sourceId: string;
  /** Property shown as a label; no label layer when omitted */
  labelField?: string;
  circleColor?: string;
  circleRadius?: number;
  strokeColor?: string;
  fontStack?: readonly string[];
  textSize?: number;
}

export type PointsLayers = [CircleLayerSpecification] | [CircleLayerSpecification, SymbolLayerSpecification];

/**
 * Create circle (and label) layers for a point source.
 * Layer ids are `<sourceId>-circles` and `<sourceId>-labels`.
 */
export function createPointsLayers(config: PointsLayerConfig): PointsLayers {
  const {
    sourceId,
    labelField,
    circleColor = CONFIG.staticMap.markerFill,
    circleRadius = CONFIG.staticMap.markerRadius,
    strokeColor = '#333333',
    fontStack = CONFIG.webMap.fontStack,
    textSize = CONFIG.staticMap.fontSize,
  } = config;

  const circles: CircleLayerSpecification = {
    id: `${sourceId}-circles`,
    type: 'circle',
    source: sourceId,
    paint: {
      'circle-radius': circleRadius,
      'circle-color': circleColor,
      'circle-opacity': 0.85,
      'circle-stroke-width': 1,
      'circle-stroke-color': strokeColor,
    },
  };

  if (!labelField) {
    return [circles];
  }

  const labels: SymbolLayerSpecification = {
    id: `${sourceId}-labels`,
    type: 'symbol',
    source: sourceId,
    layout: {
      'text-field': ['get', labelField],
      'text-font': [...fontStack],
      'text-size': textSize,
      'text-offset': [0, 1.2],
      'text-anchor': 'top',
    },
    paint: {
      'text-color': CONFIG.staticMap.labelColor,
      'text-halo-color': '#ffffff',
      'text-halo-width': 1,
    },
  };

  return [circles, labels];
}
