/**
 * Static Map Renderer
 *
 * Draws selected boundary outlines as a background, then overlays point
 * markers, optional text labels and an optional title. Output is an SVG
 * document string.
 *
 * Layer order (bottom to top): background, boundaries, markers, labels, title.
 */

import { bbox } from '@turf/bbox';
import { featureCollection, point } from '@turf/helpers';
import type { Feature, Position } from 'geojson';
import { CONFIG } from '@/lib/config';
import { selectRegions, type BoundaryFeature, type BoundaryIndex } from '@/lib/data';
import { createMapFrame, type MapFrame } from '@/lib/mapFrame';
import type { GeoBounds, MapPoint, RegionSelector } from '@/types';
import { escapeXml, formatPixel } from '@/utils';

/** Colours, sizes and font of the static map */
export interface StaticMapStyle {
  boundaryFill: string;
  boundaryStroke: string;
  markerRadius: number;
  markerFill: string;
  markerStroke: string;
  labelColor: string;
  fontFamily: string;
  fontSize: number;
  titleFontSize: number;
  titleHeight: number;
}

export interface StaticMapOptions {
  /** Boundary name or list of names to draw */
  region: RegionSelector;
  points: readonly MapPoint[];
  /** Draw each point's label next to its marker */
  labels?: boolean;
  title?: string;
  width?: number;
  height?: number;
  padding?: number;
  style?: Partial<StaticMapStyle>;
}

const DEFAULT_STYLE: StaticMapStyle = {
  boundaryFill: CONFIG.staticMap.boundaryFill,
  boundaryStroke: CONFIG.staticMap.boundaryStroke,
  markerRadius: CONFIG.staticMap.markerRadius,
  markerFill: CONFIG.staticMap.markerFill,
  markerStroke: CONFIG.staticMap.markerStroke,
  labelColor: CONFIG.staticMap.labelColor,
  fontFamily: CONFIG.staticMap.fontFamily,
  fontSize: CONFIG.staticMap.fontSize,
  titleFontSize: CONFIG.staticMap.titleFontSize,
  titleHeight: CONFIG.staticMap.titleHeight,
};

/**
 * Overlay the defined overrides on the defaults; an explicit `undefined` keeps the default
 */
function mergeStyle(overrides: Partial<StaticMapStyle> = {}): StaticMapStyle {
  return {
    boundaryFill: overrides.boundaryFill ?? DEFAULT_STYLE.boundaryFill,
    boundaryStroke: overrides.boundaryStroke ?? DEFAULT_STYLE.boundaryStroke,
    markerRadius: overrides.markerRadius ?? DEFAULT_STYLE.markerRadius,
    markerFill: overrides.markerFill ?? DEFAULT_STYLE.markerFill,
    markerStroke: overrides.markerStroke ?? DEFAULT_STYLE.markerStroke,
    labelColor: overrides.labelColor ?? DEFAULT_STYLE.labelColor,
    fontFamily: overrides.fontFamily ?? DEFAULT_STYLE.fontFamily,
    fontSize: overrides.fontSize ?? DEFAULT_STYLE.fontSize,
    titleFontSize: overrides.titleFontSize ?? DEFAULT_STYLE.titleFontSize,
    titleHeight: overrides.titleHeight ?? DEFAULT_STYLE.titleHeight,
  };
}

/**
 * Extent covering both the outlines and the points
 */
function extentOf(regions: readonly BoundaryFeature[], points: readonly MapPoint[]): GeoBounds {
  const features: Feature[] = [...regions, ...points.map((p) => point([p.lng, p.lat]))];
  const [minLng, minLat, maxLng, maxLat] = bbox(featureCollection(features));
  return { minLng, maxLng, minLat, maxLat };
}

function ringToPath(ring: readonly Position[], frame: MapFrame): string {
  const commands = ring.map((position, i) => {
    const [x, y] = frame.project(position);
    return `${i === 0 ? 'M' : 'L'}${formatPixel(x)},${formatPixel(y)}`;
  });
  return `${commands.join(' ')} Z`;
}

function boundaryToPath(feature: BoundaryFeature, frame: MapFrame): string {
  const { geometry } = feature;
  const polygons = geometry.type === 'MultiPolygon' ? geometry.coordinates : [geometry.coordinates];
  return polygons.flatMap((rings) => rings.map((ring) => ringToPath(ring, frame))).join(' ');
}

/**
 * Render a static map as an SVG document
 *
 * @param boundaries - Loaded boundary outlines
 * @param options - Region selection, points and drawing options
 * @throws Error when the region selector names an unknown region
 */
export function renderStaticMap(boundaries: BoundaryIndex, options: StaticMapOptions): string {
  const {
    region,
    points,
    labels = false,
    title,
    width = CONFIG.staticMap.width,
    height = CONFIG.staticMap.height,
    padding = CONFIG.staticMap.padding,
  } = options;
  const style = mergeStyle(options.style);

  const regions = selectRegions(boundaries, region);
  const top = title ? style.titleHeight : 0;
  const frame = createMapFrame(extentOf(regions, points), { width, height, padding, top });

  const lines: string[] = [
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">`,
    `  <rect width="${width}" height="${height}" fill="#ffffff"/>`,
    `  <g class="boundaries" fill="${style.boundaryFill}" stroke="${style.boundaryStroke}" stroke-width="1">`,
  ];

  for (const feature of regions) {
    lines.push(
      `    <path data-region="${escapeXml(feature.properties.name)}" d="${boundaryToPath(feature, frame)}"/>`
    );
  }
  lines.push('  </g>');

  lines.push(`  <g class="markers" fill="${style.markerFill}" stroke="${style.markerStroke}" stroke-width="1">`);
  for (const p of points) {
    const [x, y] = frame.project([p.lng, p.lat]);
    lines.push(`    <circle cx="${formatPixel(x)}" cy="${formatPixel(y)}" r="${style.markerRadius}"/>`);
  }
  lines.push('  </g>');

  if (labels) {
    lines.push(
      `  <g class="labels" fill="${style.labelColor}" font-family="${escapeXml(style.fontFamily)}" font-size="${style.fontSize}">`
    );
    for (const p of points) {
      if (!p.label) continue;
      const [x, y] = frame.project([p.lng, p.lat]);
      // Label sits right of the marker, roughly centred on it vertically
      const labelX = x + style.markerRadius + 3;
      const labelY = y + style.fontSize / 3;
      lines.push(`    <text x="${formatPixel(labelX)}" y="${formatPixel(labelY)}">${escapeXml(p.label)}</text>`);
    }
    lines.push('  </g>');
  }

  if (title) {
    lines.push(
      `  <text class="title" x="${formatPixel(width / 2)}" y="${formatPixel(padding + style.titleFontSize)}" text-anchor="middle" font-family="${escapeXml(style.fontFamily)}" font-size="${style.titleFontSize}" font-weight="bold">${escapeXml(title)}</text>`
    );
  }

  lines.push('</svg>');
  return `${lines.join('\n')}\n`;
}
