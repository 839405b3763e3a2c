// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { resolve } from 'path';
import { getCacheFolder } from './cache/cache-folder';
import { CacheStore } from './cache/cache-store';
import { hostPlatform } from './catalog/platforms';
import { Fetcher } from './fs/fetcher';
import { GotHttpClient, type HttpClient } from './fs/https';
import { Channels, Stopwatch } from './util/channels';

export type SessionSettings = {
  /** the folder package definitions are looked up in; defaults to the process's working directory */
  readonly currentDirectory?: string;
  /** the download cache; defaults to $PAWN_TOOLCHAIN_CACHE or the user cache location */
  readonly cacheFolder?: string;
  /** the platform to acquire for; defaults to the host platform */
  readonly platform?: string;
  /** replaces the got-based HTTP client */
  readonly httpClient?: HttpClient;
}

/**
 * The Session class is used to hold a reference to the
 * message channels,
 * the cache and the HTTP client,
 * and any other 'global' data that should be kept.
 */
export class Session {
  /** @internal */
  readonly stopwatch = new Stopwatch();
  readonly channels = new Channels(this.stopwatch);
  readonly currentDirectory: string;
  readonly cache: CacheStore;
  readonly fetcher: Fetcher;

  constructor(public readonly settings: SessionSettings = {}) {
    this.currentDirectory = resolve(settings.currentDirectory ?? process.cwd());
    this.cache = new CacheStore(this, getCacheFolder(settings.cacheFolder));
    this.fetcher = new Fetcher(this, this.cache, settings.httpClient ?? new GotHttpClient());
  }

  /** The platform acquisitions default to. */
  get platform(): string {
    return this.settings.platform ?? hostPlatform();
  }
}
