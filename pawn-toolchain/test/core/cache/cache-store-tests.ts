// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { rejects, strict } from 'assert';
import { readdir, readFile, writeFile } from 'fs/promises';
import { join } from 'path';
import { Readable } from 'stream';
import { CacheStore } from '../../../cache/cache-store';
import { CacheError, ConfigurationError, CorruptCacheError, InvalidArchiveError, MissingMemberError } from '../../../util/exceptions';
import { compilerArchive } from '../archives';
import { SuiteLocal } from '../SuiteLocal';

const filename = 'pawnc-3.10.10-linux.tar.gz';
const paths = new Map([
  ['pawnc-3.10.10-linux/bin/pawncc', 'pawncc'],
  ['pawnc-3.10.10-linux/lib/libpawnc.so', 'libpawnc.so'],
]);

function interrupted(first: Buffer, error: Error) {
  return Readable.from((async function* () {
    yield first;
    throw error;
  })());
}

describe('CacheStore', () => {
  const local = new SuiteLocal();
  const cache = local.session.cache;
  let archive: Buffer;
  after(local.after.bind(local));

  before(async () => {
    archive = await compilerArchive('linux', '3.10.10');
  });

  it('uses the configured folder', () => {
    strict.equal(cache.folder, local.cacheFolder);
    strict.equal(cache.pathOf(filename), join(local.cacheFolder, filename));
  });

  it('rejects file names that are paths', () => {
    strict.throws(() => cache.pathOf('../escape.zip'), ConfigurationError);
    strict.throws(() => cache.pathOf('nested\\file.zip'), ConfigurationError);
    strict.throws(() => cache.pathOf(''), ConfigurationError);
  });

  it('reports a miss without creating anything', async () => {
    strict.equal(await cache.has(filename), false);
    strict.deepEqual(await cache.satisfy(filename, local.path('miss'), 'tar.gz', paths), { status: 'miss' });
    strict.deepEqual(await cache.entries(), []);
  });

  it('stores a stream under the file name', async () => {
    const path = await cache.store(filename, Readable.from([archive]));
    strict.equal(path, join(local.cacheFolder, filename));
    strict.ok(await cache.has(filename));
    strict.ok((await readFile(path)).equals(archive));
    // nothing but the entry is left in the folder
    strict.deepEqual(await readdir(local.cacheFolder), [filename]);
  });

  it('installs from a hit', async () => {
    const destination = local.path('hit');
    const lookup = await cache.satisfy(filename, destination, 'tar.gz', paths);
    strict.deepEqual(lookup, {
      status: 'hit',
      path: join(local.cacheFolder, filename),
      files: [join(destination, 'pawncc'), join(destination, 'libpawnc.so')]
    });
    strict.equal(await readFile(join(destination, 'pawncc'), 'utf8'), 'pawncc 3.10.10 linux');
  });

  it('reports an undecodable entry as corrupt', async () => {
    await cache.store('garbage.tar.gz', Readable.from([Buffer.from('definitely not gzip')]));
    const lookup = await cache.satisfy('garbage.tar.gz', local.path('corrupt'), 'tar.gz', paths);
    strict.equal(lookup.status, 'corrupt');
    if (lookup.status === 'corrupt') {
      strict.equal(lookup.path, join(local.cacheFolder, 'garbage.tar.gz'));
      strict.ok(lookup.error instanceof CorruptCacheError);
      strict.ok(lookup.error instanceof CacheError);
      strict.ok(lookup.error.cause instanceof InvalidArchiveError);
    }
  });

  it('reports an entry without the mapped members as corrupt', async () => {
    const lookup = await cache.satisfy(filename, local.path('wrong-members'), 'tar.gz', new Map([['pawnc-3.10.10-linux/bin/pawnruns', 'pawnruns']]));
    strict.equal(lookup.status, 'corrupt');
    if (lookup.status === 'corrupt') {
      strict.ok(lookup.error.cause instanceof MissingMemberError);
    }
  });

  it('leaves no entry when the source fails', async () => {
    const failure = new Error('connection reset');
    await rejects(cache.store('interrupted.tar.gz', interrupted(archive.subarray(0, 10), failure)), (e: unknown) => e === failure);
    strict.equal(await cache.has('interrupted.tar.gz'), false);
    strict.deepEqual((await readdir(local.cacheFolder)).sort(), ['garbage.tar.gz', filename].sort());
  });

  it('keeps the previous entry when a replacement fails', async () => {
    await rejects(cache.store(filename, interrupted(Buffer.from('new'), new Error('timeout'))), { message: 'timeout' });
    strict.ok((await readFile(cache.pathOf(filename))).equals(archive));
  });

  it('replaces an entry', async () => {
    await cache.store('garbage.tar.gz', Readable.from([archive]));
    strict.ok((await readFile(cache.pathOf('garbage.tar.gz'))).equals(archive));
  });

  it('stops writing when cancelled', async () => {
    const controller = new AbortController();
    const source = Readable.from((async function* () {
      yield Buffer.from('first');
      controller.abort();
      yield Buffer.from('second');
    })());
    await rejects(cache.store('cancelled.tar.gz', source, { signal: controller.signal }), { name: 'AbortError' });
    strict.equal(await cache.has('cancelled.tar.gz'), false);
  });

  it('lists complete entries only', async () => {
    await writeFile(join(local.cacheFolder, `.${filename}.0123456789ab.partial`), 'in flight');
    const entries = await cache.entries();
    strict.deepEqual(entries.map(each => each.filename), ['garbage.tar.gz', filename]);
    strict.equal(entries[1].size, archive.length);
    strict.equal(entries[1].path, join(local.cacheFolder, filename));
    strict.ok(entries[1].modified instanceof Date);
  });

  it('removes one entry', async () => {
    await cache.remove('garbage.tar.gz');
    strict.equal(await cache.has('garbage.tar.gz'), false);
    strict.ok(await cache.has(filename));
  });

  it('clears every entry', async () => {
    await cache.clear();
    strict.deepEqual(await readdir(local.cacheFolder), []);
    strict.deepEqual(await cache.entries(), []);
  });

  it('treats an unreadable cache as an error rather than a miss', async function () {
    if (process.platform === 'win32') {
      this.skip();
    }
    // a file where the cache folder should be
    const blocked = local.path('blocked-cache');
    await writeFile(blocked, 'not a folder');
    const store = new CacheStore(local.session, blocked);
    await rejects(store.has(filename), CacheError);
    await rejects(store.store(filename, Readable.from([archive])), CacheError);
  });

  it('creates the cache folder on first store', async () => {
    const store = new CacheStore(local.session, local.path('fresh', 'cache'));
    await store.store(filename, Readable.from([archive]));
    strict.deepEqual(await readdir(local.path('fresh', 'cache')), [filename]);
  });
});
