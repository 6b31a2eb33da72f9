/**
 * Chemistry Sample Loader
 *
 * Rows carry UTM zone 16N easting/northing and are handed to the
 * reprojection step unchanged.
 */

import { CONFIG } from '@/lib/config';
import type { ChemistrySample } from '@/types';
import { isRecord, readJsonFile, requireNumber, requireString } from './readJson';

export function validateChemistrySample(row: unknown, index: number): ChemistrySample {
  const where = `Chemistry row ${index}`;
  if (!isRecord(row)) {
    throw new Error(`${where}: expected an object`);
  }

  return {
    sampleId: requireString(row, 'sampleId', where),
    site: requireString(row, 'site', where),
    date: requireString(row, 'date', where),
    analyte: requireString(row, 'analyte', where),
    value: requireNumber(row, 'value', where),
    units: requireString(row, 'units', where),
    easting: requireNumber(row, 'easting', where),
    northing: requireNumber(row, 'northing', where),
  };
}

/**
 * Load the chemistry measurement table
 *
 * @param filePath - JSON array of sample rows (default: data/chemistry.json)
 */
export async function loadChemistrySamples(
  filePath: string = CONFIG.data.chemistry
): Promise<ChemistrySample[]> {
  const data = await readJsonFile(filePath, 'chemistry table');

  if (!Array.isArray(data)) {
    throw new Error('Invalid chemistry table: expected an array of rows');
  }

  return data.map((row, index) => validateChemistrySample(row, index));
}
