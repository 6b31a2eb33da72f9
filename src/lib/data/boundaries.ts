/**
 * Boundary Outline Loader
 *
 * Loads simplified administrative outlines and selects them by name for the
 * static map. Names match case-insensitively ("Indiana" == "indiana").
 */

import type { Feature, MultiPolygon, Polygon } from 'geojson';
import { CONFIG } from '@/lib/config';
import type { BoundaryProperties, RegionSelector } from '@/types';
import { isRecord, readJsonFile } from './readJson';

export type BoundaryFeature = Feature<Polygon | MultiPolygon, BoundaryProperties>;

/** Boundary outlines keyed by lower-case name */
export type BoundaryIndex = ReadonlyMap<string, BoundaryFeature>;

function normalizeName(name: string): string {
  return name.trim().toLowerCase();
}

function isPolygonal(geometry: unknown): geometry is Polygon | MultiPolygon {
  if (!isRecord(geometry) || !Array.isArray(geometry.coordinates)) return false;
  return geometry.type === 'Polygon' || geometry.type === 'MultiPolygon';
}

function toBoundaryFeature(value: unknown, index: number): BoundaryFeature {
  if (!isRecord(value) || !isRecord(value.properties)) {
    throw new Error(`Boundary feature ${index}: missing properties`);
  }
  const { name } = value.properties;
  if (typeof name !== 'string' || name.trim() === '') {
    throw new Error(`Boundary feature ${index}: missing name`);
  }
  if (!isPolygonal(value.geometry)) {
    throw new Error(`Boundary feature ${index} (${name}): expected Polygon or MultiPolygon geometry`);
  }

  return {
    type: 'Feature',
    properties: { name: normalizeName(name) },
    geometry: value.geometry,
  };
}

/**
 * Load boundary outlines
 *
 * @param filePath - GeoJSON FeatureCollection (default: data/boundaries.json)
 */
export async function loadBoundaries(filePath: string = CONFIG.data.boundaries): Promise<BoundaryIndex> {
  const data = await readJsonFile(filePath, 'boundary file');

  if (!isRecord(data) || !Array.isArray(data.features)) {
    throw new Error('Invalid GeoJSON: missing features array');
  }

  const index = new Map<string, BoundaryFeature>();
  data.features.forEach((value, i) => {
    const feature = toBoundaryFeature(value, i);
    index.set(feature.properties.name, feature);
  });

  return index;
}

/**
 * Pick the outlines named by a region selector, in selector order
 *
 * @throws Error for an empty selector or an unknown name
 */
export function selectRegions(boundaries: BoundaryIndex, selector: RegionSelector): BoundaryFeature[] {
  const names: readonly string[] = typeof selector === 'string' ? [selector] : selector;

  if (names.length === 0) {
    throw new Error('No region selected');
  }

  return names.map((name) => {
    const feature = boundaries.get(normalizeName(name));
    if (!feature) {
      throw new Error(`Unknown region: "${name}"`);
    }
    return feature;
  });
}
