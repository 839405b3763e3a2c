// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { Readable } from 'stream';
import type { CacheStore } from '../cache/cache-store';
import { i } from '../i18n';
import type { DownloadEvents } from '../interfaces/events';
import type { Session } from '../session';
import { FetchError, messageOf } from '../util/exceptions';
import type { HttpClient, HttpResponse } from './https';

export interface FetchOptions {
  signal?: AbortSignal;
  events?: Partial<DownloadEvents>;
}

/** Re-yields the body, reporting progress and turning transport failures into FetchErrors. */
async function* track(url: string, body: Readable, onProgress: (transferred: number) => void): AsyncGenerator<Uint8Array> {
  let transferred = 0;
  try {
    for await (const chunk of body) {
      if (chunk instanceof Uint8Array) {
        transferred += chunk.byteLength;
        onProgress(transferred);
        yield chunk;
      }
    }
  } catch (e) {
    throw new FetchError(url, i`The download of '${url}' was interrupted after ${transferred} bytes: ${messageOf(e)}`, { cause: e });
  }
}

/** Downloads artifacts straight into the cache. */
export class Fetcher {
  constructor(private readonly session: Session, private readonly cache: CacheStore, private readonly client: HttpClient) {
  }

  /**
   * Downloads a URL into the cache entry for a file name.
   *
   * @returns the path of the cache entry
   * @throws FetchError for transport failures, non-2xx responses and failures writing the entry
   */
  async fetch(url: string, filename: string, options: FetchOptions = {}): Promise<string> {
    const { signal, events } = options;
    signal?.throwIfAborted();
    const destination = this.cache.pathOf(filename);
    this.session.channels.debug(`Attempting to download file '${filename}' from ${url}`);
    events?.downloadStart?.(url, destination);

    let response: HttpResponse;
    try {
      response = await this.client.open(url, { signal });
    } catch (e) {
      throw signal?.aborted ? e : new FetchError(url, i`Failed to download '${url}': ${messageOf(e)}`, { cause: e });
    }

    const { statusCode, contentLength, body } = response;
    if (statusCode < 200 || statusCode >= 300) {
      body.destroy();
      throw new FetchError(url, i`Failed to download '${url}': the server responded with HTTP ${statusCode}`, { statusCode });
    }

    const source = Readable.from(track(url, body, transferred => events?.downloadProgress?.(url, transferred, contentLength)));
    try {
      await this.cache.store(filename, source, { signal });
    } catch (e) {
      body.destroy();
      if (e instanceof FetchError || signal?.aborted) {
        throw e;
      }
      throw new FetchError(url, i`Failed to save the download of '${url}': ${messageOf(e)}`, { cause: e, statusCode });
    }

    this.session.channels.debug(`Downloaded '${url}' to ${destination}`);
    events?.downloadComplete?.(url, destination);
    return destination;
  }
}
