/**
 * GeoJSON conversion
 *
 * Turns the sample tables into FeatureCollections and moves them through the
 * filesystem for the web map. Coordinates are always [lng, lat].
 */

import { featureCollection, point } from '@turf/helpers';
import type { Feature, FeatureCollection, Geometry, Point } from 'geojson';
import { isRecord, readJsonFile } from '@/lib/data/readJson';
import { writeArtifact, type Artifact } from '@/lib/files';
import type { MonitorProperties, MonitorSite, ProjectedSample, SampleProperties } from '@/types';

export type MonitorCollection = FeatureCollection<Point, MonitorProperties>;
export type SampleCollection = FeatureCollection<Point, SampleProperties>;
/** A collection read from disk, where unlocated features carry `geometry: null` */
export type LoadedCollection = FeatureCollection<Geometry | null>;

/**
 * Convert monitor rows to point features (feature id = monitor id)
 */
export function monitorsToFeatureCollection(monitors: readonly MonitorSite[]): MonitorCollection {
  return featureCollection(
    monitors.map((m) =>
      point<MonitorProperties>(
        [m.long, m.lat],
        { id: m.id, name: m.name, datum: m.datum },
        { id: m.id }
      )
    )
  );
}

/**
 * Convert reprojected chemistry samples to point features
 */
export function samplesToFeatureCollection(samples: readonly ProjectedSample[]): SampleCollection {
  return featureCollection(
    samples.map(({ lng, lat, ...properties }) =>
      point<SampleProperties>([lng, lat], properties, { id: properties.sampleId })
    )
  );
}

/**
 * Write a FeatureCollection as pretty-printed JSON, creating parent directories
 */
export async function writeGeoJson(
  collection: FeatureCollection,
  filePath: string
): Promise<Artifact> {
  return writeArtifact(filePath, `${JSON.stringify(collection, null, 2)}\n`);
}

/** `geometry: null` is an unlocated feature and still valid GeoJSON */
function isFeature(value: unknown): value is Feature<Geometry | null> {
  return (
    isRecord(value) &&
    value.type === 'Feature' &&
    (value.geometry === null || (isRecord(value.geometry) && typeof value.geometry.type === 'string'))
  );
}

/**
 * Read a FeatureCollection back from disk.
 * Only the envelope is checked: `type`, the `features` array and each feature's geometry type (or a null geometry).
 */
export async function readFeatureCollection(filePath: string): Promise<LoadedCollection> {
  const data = await readJsonFile(filePath, 'GeoJSON file');

  if (!isRecord(data) || data.type !== 'FeatureCollection') {
    throw new Error(`Invalid GeoJSON in ${filePath}: expected a FeatureCollection`);
  }
  if (!Array.isArray(data.features)) {
    throw new Error('Invalid GeoJSON: missing features array');
  }

  const features: Feature<Geometry | null>[] = [];
  data.features.forEach((value: unknown, index: number) => {
    if (!isFeature(value)) {
      throw new Error(`Invalid GeoJSON in ${filePath}: feature ${index} is not a Feature`);
    }
    features.push(value);
  });

  return { type: 'FeatureCollection', features };
}

/**
 * Keep only the features that have a location
 */
export function locatedFeatures(collection: LoadedCollection): FeatureCollection {
  const features: Feature[] = [];
  for (const feature of collection.features) {
    const { geometry } = feature;
    if (geometry !== null) {
      features.push({ ...feature, geometry });
    }
  }
  return { type: 'FeatureCollection', features };
}
