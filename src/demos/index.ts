/**
 * Demonstration sections
 */

export { runStaticMapDemo, type StaticMapDemoOptions } from './staticMapDemo';
export { runHostedMapDemo, type HostedMapDemoOptions, type HostedMapDemoResult } from './hostedMapDemo';
export { runGeoJsonMapDemo, type GeoJsonMapDemoOptions, type GeoJsonMapDemoResult } from './geojsonMapDemo';
export {
  runReprojectionDemo,
  type ReprojectionDemoOptions,
  type ReprojectionDemoResult,
} from './reprojectionDemo';
export type { Artifact } from '@/lib/files';
