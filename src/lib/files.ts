import { mkdir, writeFile } from 'fs/promises';
import { dirname } from 'path';

/** A file written to disk */
export interface Artifact {
  path: string;
  bytes: number;
}

/**
 * Write a UTF-8 text file, creating parent directories
 */
export async function writeArtifact(filePath: string, content: string): Promise<Artifact> {
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, content, 'utf8');
  return { path: filePath, bytes: Buffer.byteLength(content, 'utf8') };
}
