/**
 * Browser launching for rendered pages
 *
 * Pass --no-open or set MAPS_NO_OPEN to skip the launch on headless machines.
 */

import open from 'open';
import { pathToFileURL } from 'url';

/** Opens a URL in the user's default browser */
export type Opener = (target: string) => Promise<unknown>;

/**
 * Whether a script should launch the browser
 *
 * @param argv - Script arguments (process.argv without node and the script path)
 */
export function shouldOpenBrowser(argv: readonly string[], env: NodeJS.ProcessEnv = process.env): boolean {
  if (argv.includes('--no-open')) return false;
  const flag = env.MAPS_NO_OPEN;
  return flag === undefined || flag === '';
}

/**
 * Open a local file in the default browser
 *
 * @returns The file:// URL that was opened
 */
export async function openInBrowser(filePath: string, opener: Opener = open): Promise<string> {
  const url = pathToFileURL(filePath).href;
  await opener(url);
  return url;
}
