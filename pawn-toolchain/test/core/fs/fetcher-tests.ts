// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { rejects, strict } from 'assert';
import { readdir, readFile } from 'fs/promises';
import { join } from 'path';
import { FetchError } from '../../../util/exceptions';
import { SuiteLocal } from '../SuiteLocal';

const url = 'https://downloads.example.test/pawnc-1.0.0-linux.tar.gz';
const filename = 'pawnc-1.0.0-linux.tar.gz';

describe('Fetcher', () => {
  const local = new SuiteLocal();
  const fetcher = local.session.fetcher;
  after(local.after.bind(local));

  afterEach(() => {
    local.http.responses.clear();
  });

  it('downloads into the cache and reports progress', async () => {
    const chunks = [Buffer.from('first chunk,'), Buffer.from('second chunk')];
    local.http.responses.set(url, { chunks });

    const progress = new Array<[number, number | undefined]>();
    const started = new Array<string>();
    const completed = new Array<string>();
    const path = await fetcher.fetch(url, filename, {
      events: {
        downloadStart: (_url, destination) => started.push(destination),
        downloadProgress: (_url, transferred, total) => progress.push([transferred, total]),
        downloadComplete: (_url, destination) => completed.push(destination)
      }
    });

    strict.equal(path, join(local.cacheFolder, filename));
    strict.equal(await readFile(path, 'utf8'), 'first chunk,second chunk');
    strict.deepEqual(progress, [[12, 24], [24, 24]]);
    strict.deepEqual(started, [path]);
    strict.deepEqual(completed, [path]);
    strict.deepEqual(local.http.requests, [url]);
  });

  it('reports an unknown size as undefined', async () => {
    local.http.responses.set(url, { chunks: [Buffer.from('abc')], unknownLength: true });
    const totals = new Array<number | undefined>();
    await fetcher.fetch(url, filename, { events: { downloadProgress: (_url, _transferred, total) => totals.push(total) } });
    strict.deepEqual(totals, [undefined]);
  });

  it('fails on error statuses without touching the cache', async () => {
    const missing = 'https://downloads.example.test/missing.zip';
    await rejects(fetcher.fetch(missing, 'missing.zip'), (e: unknown) =>
      e instanceof FetchError &&
      e.statusCode === 404 &&
      e.url === missing &&
      e.message === `Failed to download '${missing}': the server responded with HTTP 404`);
    strict.equal(await local.session.cache.has('missing.zip'), false);
  });

  it('fails when the connection cannot be made', async () => {
    const refused = new Error('connect ECONNREFUSED 127.0.0.1:443');
    local.http.connectError = refused;
    await rejects(fetcher.fetch(url, 'refused.tar.gz'), (e: unknown) =>
      e instanceof FetchError && e.cause === refused && e.statusCode === undefined);
  });

  it('leaves no cache entry when the download is interrupted', async () => {
    local.http.responses.set(url, { chunks: [Buffer.from('partial')], failAfterChunks: new Error('socket hang up') });
    await rejects(fetcher.fetch(url, 'interrupted.tar.gz'), (e: unknown) =>
      e instanceof FetchError &&
      e.message === `The download of '${url}' was interrupted after 7 bytes: socket hang up`);
    strict.equal(await local.session.cache.has('interrupted.tar.gz'), false);
    strict.deepEqual(await readdir(local.cacheFolder), [filename]);
  });

  it('does not start when already cancelled', async () => {
    const controller = new AbortController();
    controller.abort();
    const before = local.http.requests.length;
    await rejects(fetcher.fetch(url, filename, { signal: controller.signal }), { name: 'AbortError' });
    strict.equal(local.http.requests.length, before);
  });
});
