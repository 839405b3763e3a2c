// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import got, { type Response } from 'got';
import type { Readable } from 'stream';
import { networkTimeout, userAgent } from '../constants';

export interface HttpResponse {
  statusCode: number;
  /** undefined when the server does not send a content-length */
  contentLength: number | undefined;
  /** the response body; the caller must consume or destroy it */
  body: Readable;
}

/** The HTTP GET used to download artifacts. */
export interface HttpClient {
  /** Resolves once the response headers have arrived; status codes are not treated as errors. */
  open(url: string, options?: { signal?: AbortSignal }): Promise<HttpResponse>;
}

function contentLength(response: Response): number | undefined {
  const length = Number.parseInt(response.headers['content-length'] ?? '', 10);
  return Number.isNaN(length) ? undefined : length;
}

/** HttpClient over got streams. Redirects are followed; nothing is retried. */
export class GotHttpClient implements HttpClient {
  constructor(private readonly timeout = networkTimeout) {
  }

  async open(url: string, options?: { signal?: AbortSignal }): Promise<HttpResponse> {
    const signal = options?.signal;
    signal?.throwIfAborted();

    const stream = got.stream(url, {
      throwHttpErrors: false,
      retry: 0,
      timeout: { connect: this.timeout, response: this.timeout, socket: this.timeout },
      headers: { 'user-agent': userAgent }
    });

    if (signal) {
      const onAbort = () => stream.destroy(signal.reason);
      signal.addEventListener('abort', onAbort, { once: true });
      stream.once('close', () => signal.removeEventListener('abort', onAbort));
    }

    return new Promise<HttpResponse>((resolve, reject) => {
      stream.once('response', (response: Response) => {
        resolve({ statusCode: response.statusCode, contentLength: contentLength(response), body: stream });
      });
      stream.once('error', reject);
    });
  }
}
