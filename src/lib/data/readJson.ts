/**
 * Shared JSON file reading for the data loaders
 */

import { readFile } from 'fs/promises';

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read and parse a JSON file
 *
 * @param filePath - Path to the file
 * @param label - Name used in error messages (e.g. "monitor table")
 */
export async function readJsonFile(filePath: string, label: string): Promise<unknown> {
  const text = await readFile(filePath, 'utf8');

  try {
    return JSON.parse(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON in ${label} (${filePath}): ${reason}`);
  }
}

/**
 * Read a field that must be a finite number
 */
export function requireNumber(row: JsonRecord, field: string, where: string): number {
  const value = row[field];
  if (typeof value !== 'number' || !Number.isFinite(value)) {
    throw new Error(`${where}: field "${field}" must be a finite number`);
  }
  return value;
}

/**
 * Read a field that must be a non-empty string
 */
export function requireString(row: JsonRecord, field: string, where: string): string {
  const value = row[field];
  if (typeof value !== 'string' || value.trim() === '') {
    throw new Error(`${where}: field "${field}" must be a non-empty string`);
  }
  return value;
}
