import { describe, it, expect, vi } from 'vitest';
import { pathToFileURL } from 'url';
import { join } from 'path';
import { tmpdir } from 'os';
import { openInBrowser, shouldOpenBrowser } from './browser';

describe('shouldOpenBrowser', () => {
  it('should open by default', () => {
    expect(shouldOpenBrowser([], {})).toBe(true);
  });

  it('should skip the launch with --no-open', () => {
    expect(shouldOpenBrowser(['--no-open'], {})).toBe(false);
  });

  it('should skip the launch when MAPS_NO_OPEN is set', () => {
    expect(shouldOpenBrowser([], { MAPS_NO_OPEN: '1' })).toBe(false);
  });

  it('should treat an empty MAPS_NO_OPEN as unset', () => {
    expect(shouldOpenBrowser([], { MAPS_NO_OPEN: '' })).toBe(true);
  });
});

describe('openInBrowser', () => {
  it('should hand the page to the opener as a file:// URL', async () => {
    const opener = vi.fn(async (_target: string) => undefined);
    const page = join(tmpdir(), 'maps', 'monitors-webmap.html');

    const url = await openInBrowser(page, opener);

    expect(url).toBe(pathToFileURL(page).href);
    expect(url.startsWith('file://')).toBe(true);
    expect(opener).toHaveBeenCalledTimes(1);
    expect(opener).toHaveBeenCalledWith(url);
  });

  it('should propagate a launch failure', async () => {
    const opener = vi.fn(async () => {
      throw new Error('no browser');
    });

    await expect(openInBrowser(join(tmpdir(), 'page.html'), opener)).rejects.toThrow('no browser');
  });
});
