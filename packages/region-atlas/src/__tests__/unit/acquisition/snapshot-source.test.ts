/**
 * Snapshot Source Tests
 *
 * Live fetches go through a stubbed fetch.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { readFile, readdir, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  cachePathFor,
  loadSnapshot,
  refreshCache,
} from '../../../acquisition/snapshot-source.js';
import { listingUrl } from '../../../core/constants.js';
import { SourceUnavailableError } from '../../../core/errors.js';
import { HTTPClient } from '../../../core/http-client.js';
import { createTempDir, removeTempDir, spanListing, writeFixtureFile } from '../../utils/fixtures.js';

const HTML = spanListing([{ code: 110000, name: '北京市', level: 1 }]);

const GB_META = '<meta charset="gb2312">';
// <meta charset="gb2312">北京 as served in GB2312
const GB_PAGE = Buffer.concat([Buffer.from(GB_META, 'ascii'), Buffer.from([0xb1, 0xb1, 0xbe, 0xa9])]);

function htmlResponse(body: string): Response {
  return new Response(body, { status: 200, headers: { 'content-type': 'text/html; charset=utf-8' } });
}

describe('snapshot-source', () => {
  let cacheDir: string;
  const client = new HTTPClient({ maxRetries: 0 });

  beforeEach(async () => {
    cacheDir = await createTempDir();
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    await removeTempDir(cacheDir);
  });

  it('should name cache files by release', () => {
    expect(cachePathFor('/cache', '2014-10-31')).toBe('/cache/2014-10-31.html');
  });

  it('should read the cached copy in cached mode', async () => {
    const location = cachePathFor(cacheDir, '2015-09-30');
    await writeFixtureFile(location, HTML);

    await expect(
      loadSnapshot({ version: '2015-09-30', cached: true, cacheDir, client })
    ).resolves.toMatchObject({ version: '2015-09-30', html: HTML, origin: 'cache', location });
  });

  it('should decode a cached page by its meta charset', async () => {
    await writeFile(cachePathFor(cacheDir, '2015-09-30'), GB_PAGE);

    const snapshot = await loadSnapshot({ version: '2015-09-30', cached: true, cacheDir, client });

    expect(snapshot.html).toBe(`${GB_META}北京`);
  });

  it('should cache the bytes as served', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn().mockResolvedValue(
        new Response(GB_PAGE, { status: 200, headers: { 'content-type': 'text/html; charset=gb2312' } })
      )
    );

    const snapshot = await loadSnapshot({ version: '2015-09-30', cached: false, cacheDir, client });

    expect(snapshot.html).toBe(`${GB_META}北京`);
    await expect(readFile(cachePathFor(cacheDir, '2015-09-30'))).resolves.toEqual(GB_PAGE);
  });

  it('should fail in cached mode when no copy exists', async () => {
    const location = cachePathFor(cacheDir, '2015-09-30');

    await expect(
      loadSnapshot({ version: '2015-09-30', cached: true, cacheDir, client })
    ).rejects.toThrow(
      new SourceUnavailableError(
        `No cached listing for 2015-09-30 at ${location}; run refresh-cache first`,
        location
      )
    );
  });

  it('should download in live mode and keep a cached copy', async () => {
    const fetchMock = vi.fn().mockResolvedValue(htmlResponse(HTML));
    vi.stubGlobal('fetch', fetchMock);

    const snapshot = await loadSnapshot({ version: '2015-09-30', cached: false, cacheDir, client });

    expect(snapshot).toMatchObject({
      version: '2015-09-30',
      html: HTML,
      origin: 'live',
      location: listingUrl('2015-09-30'),
    });
    expect(fetchMock).toHaveBeenCalledWith(listingUrl('2015-09-30'), expect.anything());
    await expect(readFile(cachePathFor(cacheDir, '2015-09-30'), 'utf-8')).resolves.toBe(HTML);
  });

  it('should report a failed download as an unavailable source', async () => {
    vi.stubGlobal('fetch', vi.fn().mockResolvedValue(new Response('gone', { status: 404 })));

    await expect(
      loadSnapshot({ version: '2015-09-30', cached: false, cacheDir, client })
    ).rejects.toBeInstanceOf(SourceUnavailableError);
    await expect(readdir(cacheDir)).resolves.toEqual([]);
  });

  it('should refresh each requested release in order', async () => {
    const fetchMock = vi.fn().mockImplementation((url: string) => Promise.resolve(htmlResponse(`<p>${url}</p>`)));
    vi.stubGlobal('fetch', fetchMock);

    const written = await refreshCache({ versions: ['2014-10-31', '2013-08-31'], cacheDir, client });

    expect(written).toEqual([
      join(cacheDir, '2014-10-31.html'),
      join(cacheDir, '2013-08-31.html'),
    ]);
    await expect(readFile(join(cacheDir, '2013-08-31.html'), 'utf-8')).resolves.toBe(
      `<p>${listingUrl('2013-08-31')}</p>`
    );
  });
});
