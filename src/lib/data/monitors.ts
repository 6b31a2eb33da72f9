/**
 * Monitor Table Loader
 *
 * Loads the monitor location table and checks every row before it is plotted.
 */

import { CONFIG } from '@/lib/config';
import { isValidLatitude, isValidLongitude } from '@/lib/constants';
import type { MonitorSite } from '@/types';
import { isRecord, readJsonFile, requireNumber, requireString } from './readJson';

/**
 * Validate one raw row of the monitor table
 *
 * @param row - Parsed JSON value
 * @param index - Row position, used in error messages
 */
export function validateMonitor(row: unknown, index: number): MonitorSite {
  const where = `Monitor row ${index}`;
  if (!isRecord(row)) {
    throw new Error(`${where}: expected an object`);
  }

  const id = requireNumber(row, 'id', where);
  if (!Number.isInteger(id)) {
    throw new Error(`${where}: field "id" must be an integer`);
  }

  const lat = requireNumber(row, 'lat', where);
  if (!isValidLatitude(lat)) {
    throw new Error(`${where}: latitude ${lat} is outside [-90, 90]`);
  }

  const long = requireNumber(row, 'long', where);
  if (!isValidLongitude(long)) {
    throw new Error(`${where}: longitude ${long} is outside [-180, 180]`);
  }

  return {
    id,
    lat,
    long,
    datum: requireString(row, 'datum', where),
    name: requireString(row, 'name', where),
  };
}

/**
 * Load the monitor location table
 *
 * @param filePath - JSON array of monitor rows (default: data/monitors.json)
 */
export async function loadMonitors(filePath: string = CONFIG.data.monitors): Promise<MonitorSite[]> {
  const data = await readJsonFile(filePath, 'monitor table');

  if (!Array.isArray(data)) {
    throw new Error('Invalid monitor table: expected an array of rows');
  }

  const monitors = data.map((row, index) => validateMonitor(row, index));

  const datums = new Set(monitors.map((m) => m.datum));
  if (datums.size > 1) {
    throw new Error(`Invalid monitor table: mixed datums (${[...datums].join(', ')})`);
  }

  return monitors;
}
