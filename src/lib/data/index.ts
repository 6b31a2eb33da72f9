/**
 * Data Loaders
 *
 * Exports all data loading utilities.
 */

export { loadMonitors, validateMonitor } from './monitors';

export { loadChemistrySamples, validateChemistrySample } from './chemistry';

export {
  loadBoundaries,
  selectRegions,
  type BoundaryFeature,
  type BoundaryIndex,
} from './boundaries';
