// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { randomBytes } from 'crypto';
import { createWriteStream } from 'fs';
import { mkdir, readdir, rename, rm, stat } from 'fs/promises';
import { join } from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import type { ExtractionKind, UnpackOptions } from '../archivers/unpacker';
import { unpackerFor } from '../archivers/unpackers';
import { i } from '../i18n';
import type { Session } from '../session';
import { CacheError, ConfigurationError, CorruptCacheError, errorCode, ExtractionError, messageOf } from '../util/exceptions';

/** suffix of in-flight downloads; they are never reported as cache entries */
const partialSuffix = '.partial';

/** The outcome of trying to install from the cache. */
export type CacheLookup =
  | { readonly status: 'miss' }
  | { readonly status: 'hit', readonly path: string, readonly files: Array<string> }
  | { readonly status: 'corrupt', readonly path: string, readonly error: CorruptCacheError };

export interface CacheEntry {
  readonly filename: string;
  readonly path: string;
  readonly size: number;
  readonly modified: Date;
}

/**
 * A folder of downloaded archives, keyed by file name.
 *
 * Entries only ever appear by renaming a completely written temporary file,
 * so readers see a whole file or none.
 */
export class CacheStore {
  constructor(private readonly session: Session, readonly folder: string) {
  }

  /** The path of the entry for a file name. */
  pathOf(filename: string): string {
    if (!filename || filename === '.' || filename === '..' || /[\\/]/.test(filename)) {
      throw new ConfigurationError(i`'${filename}' is not a valid cache file name`);
    }
    return join(this.folder, filename);
  }

  /** Checks for the entry without reading it. */
  async has(filename: string): Promise<boolean> {
    const path = this.pathOf(filename);
    try {
      return (await stat(path)).isFile();
    } catch (e) {
      if (errorCode(e) === 'ENOENT') {
        return false;
      }
      throw new CacheError(path, i`Unable to access the cache entry '${path}': ${messageOf(e)}`, { cause: e });
    }
  }

  /**
   * Installs the mapped members from the cached archive, if there is one.
   *
   * A file that cannot be decoded, or that lacks a mapped member, is reported as corrupt rather than thrown.
   * @throws CacheError when the cache or the destination cannot be read or written
   */
  async satisfy(filename: string, destination: string, extraction: ExtractionKind, paths: ReadonlyMap<string, string>, options: UnpackOptions = {}): Promise<CacheLookup> {
    if (!await this.has(filename)) {
      this.session.channels.debug(`Cache miss for '${filename}' in ${this.folder}`);
      return { status: 'miss' };
    }

    const path = this.pathOf(filename);
    try {
      const files = await unpackerFor(this.session, extraction).unpack(path, destination, paths, options);
      this.session.channels.debug(`Cache hit for '${filename}', installed ${files.length} files to ${destination}`);
      return { status: 'hit', path, files };
    } catch (e) {
      if (options.signal?.aborted) {
        throw e;
      }
      if (e instanceof ExtractionError && e.code !== 'IO_FAILED') {
        return { status: 'corrupt', path, error: new CorruptCacheError(path, i`The cached file '${path}' is unusable: ${e.message}`, { cause: e }) };
      }
      throw new CacheError(path, i`Failed to install from the cached file '${path}': ${messageOf(e)}`, { cause: e });
    }
  }

  /**
   * Writes a stream to the entry for a file name.
   *
   * The data goes to a temporary file in the cache folder which is renamed into place once complete;
   * on failure or cancellation the temporary file is removed and the previous entry (if any) is untouched.
   * Errors raised by the source stream are rethrown as they are.
   *
   * @returns the path of the entry
   */
  async store(filename: string, source: Readable, options: { signal?: AbortSignal } = {}): Promise<string> {
    const path = this.pathOf(filename);
    const temp = join(this.folder, `.${filename}.${randomBytes(6).toString('hex')}${partialSuffix}`);

    try {
      await mkdir(this.folder, { recursive: true });
    } catch (e) {
      source.destroy();
      throw new CacheError(this.folder, i`Unable to create the cache folder '${this.folder}': ${messageOf(e)}`, { cause: e });
    }

    try {
      await pipeline(source, createWriteStream(temp, { flags: 'wx' }), { signal: options.signal });
      await rename(temp, path);
    } catch (e) {
      await this.discard(temp);
      if (errorCode(e) && !options.signal?.aborted && !source.errored) {
        throw new CacheError(path, i`Failed to write the cache entry '${path}': ${messageOf(e)}`, { cause: e });
      }
      throw e;
    }

    this.session.channels.debug(`Stored '${filename}' in ${this.folder}`);
    return path;
  }

  /** Lists the complete entries of the cache. */
  async entries(): Promise<Array<CacheEntry>> {
    let names: Array<string>;
    try {
      names = (await readdir(this.folder, { withFileTypes: true })).filter(each => each.isFile()).map(each => each.name);
    } catch (e) {
      if (errorCode(e) === 'ENOENT') {
        return [];
      }
      throw new CacheError(this.folder, i`Unable to read the cache folder '${this.folder}': ${messageOf(e)}`, { cause: e });
    }

    const result = new Array<CacheEntry>();
    for (const filename of names.sort()) {
      if (filename.startsWith('.') && filename.endsWith(partialSuffix)) {
        continue;
      }
      const path = join(this.folder, filename);
      const info = await stat(path);
      result.push({ filename, path, size: info.size, modified: info.mtime });
    }
    return result;
  }

  /** Removes one entry, if it exists. */
  async remove(filename: string): Promise<void> {
    await rm(this.pathOf(filename), { force: true });
  }

  /** Removes every entry and leaves an empty cache folder. */
  async clear(): Promise<void> {
    await rm(this.folder, { recursive: true, force: true });
    await mkdir(this.folder, { recursive: true });
  }

  private async discard(temp: string) {
    try {
      await rm(temp, { force: true });
    } catch (e) {
      this.session.channels.debug(`Unable to remove '${temp}': ${messageOf(e)}`);
    }
  }
}
