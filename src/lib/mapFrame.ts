/**
 * Map Frame
 *
 * Fits a geographic extent into a pixel canvas for the static map.
 *
 * PROJECTION:
 * - Equirectangular with a cos(midLat) correction on longitude, so a degree of
 *   longitude is drawn shorter than a degree of latitude away from the equator.
 *   Good enough for state-sized extents.
 * - Pixel y grows downward: north is at the top.
 * - The content keeps its aspect ratio and is centred inside the padding.
 */

import { DEG_TO_RAD } from '@/lib/constants';
import type { GeoBounds } from '@/types';

export interface MapFrameOptions {
  width: number;
  height: number;
  /** Margin on every side in pixels */
  padding: number;
  /** Extra band reserved above the map (for a title) in pixels */
  top?: number;
}

export interface MapFrame {
  width: number;
  height: number;
  /** Pixels per degree of latitude */
  scale: number;
  /** Project [lng, lat] to [x, y] pixels */
  project(coords: readonly number[]): [x: number, y: number];
}

/**
 * Create a frame that fits `bounds` into the canvas
 *
 * @example
 * ```ts
 * const frame = createMapFrame(bounds, { width: 800, height: 600, padding: 40 });
 * const [x, y] = frame.project([-87.3, 41.6]);
 * ```
 */
export function createMapFrame(bounds: GeoBounds, options: MapFrameOptions): MapFrame {
  const { width, height, padding, top = 0 } = options;
  const innerWidth = width - padding * 2;
  const innerHeight = height - padding * 2 - top;

  if (innerWidth <= 0 || innerHeight <= 0) {
    throw new Error(`Map canvas ${width}x${height} is too small for padding ${padding}`);
  }

  const midLat = (bounds.minLat + bounds.maxLat) / 2;
  const kx = Math.cos(midLat * DEG_TO_RAD);
  const spanX = (bounds.maxLng - bounds.minLng) * kx;
  const spanY = bounds.maxLat - bounds.minLat;

  // A zero span (single point, or points on one meridian/parallel) does not constrain the scale
  const candidates: number[] = [];
  if (spanX > 0) candidates.push(innerWidth / spanX);
  if (spanY > 0) candidates.push(innerHeight / spanY);
  const scale = candidates.length > 0 ? Math.min(...candidates) : 1;

  const offsetX = padding + (innerWidth - spanX * scale) / 2;
  const offsetY = padding + top + (innerHeight - spanY * scale) / 2;

  return {
    width,
    height,
    scale,
    project(coords) {
      const [lng, lat] = coords;
      return [offsetX + (lng - bounds.minLng) * kx * scale, offsetY + (bounds.maxLat - lat) * scale];
    },
  };
}
