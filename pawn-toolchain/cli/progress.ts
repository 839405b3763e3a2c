// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { SingleBar } from 'cli-progress';
import { i } from '../i18n';
import type { AcquireEvents, FileEntry } from '../interfaces/events';
import type { Channels } from '../util/channels';

export interface ProgressRenderer extends Partial<AcquireEvents> {
  stop(): void;
}

/** percent of the download done, or undefined when the size is unknown */
export function percentOf(transferredBytes: number, totalBytes: number | undefined): number | undefined {
  if (!totalBytes) {
    return undefined;
  }
  return Math.min(100, Math.floor(transferredBytes * 100 / totalBytes));
}

class TtyProgressRenderer implements ProgressRenderer {
  readonly #bar = new SingleBar({
    clearOnComplete: true,
    hideCursor: true,
    barCompleteChar: '*',
    barIncompleteChar: ' ',
    etaBuffer: 40,
    format: '{bar} {percentage}% {suffix}'
  });
  #started = false;

  constructor(private readonly channels: Channels) {
  }

  cacheHit(path: string) {
    this.channels.message(i`Using the cached ${path}`);
  }

  downloadProgress(url: string, transferredBytes: number, totalBytes: number | undefined) {
    const percent = percentOf(transferredBytes, totalBytes) ?? 0;
    const payload = { suffix: i`downloading ${url}` };
    if (this.#started) {
      this.#bar.update(percent, payload);
    } else {
      this.#started = true;
      this.#bar.start(100, percent, payload);
    }
  }

  downloadComplete() {
    this.stop();
  }

  unpackArchiveStart(archivePath: string) {
    this.channels.message(i`Unpacking ${archivePath}...`);
  }

  stop() {
    if (this.#started) {
      this.#started = false;
      this.#bar.stop();
    }
  }
}

const downloadUpdateRateMs = 10 * 1000;

class NoTtyProgressRenderer implements ProgressRenderer {
  #downloadPercent: number | undefined;
  #downloadTimeoutId: NodeJS.Timeout | undefined;
  constructor(private readonly channels: Channels) {}

  cacheHit(path: string) {
    this.channels.message(i`Using the cached ${path}`);
  }

  downloadStart(url: string) {
    this.channels.message(i`Downloading ${url}...`);
    this.#downloadTimeoutId = setTimeout(this.downloadProgressDisplay.bind(this), downloadUpdateRateMs);
  }

  downloadProgress(_url: string, transferredBytes: number, totalBytes: number | undefined): void {
    this.#downloadPercent = percentOf(transferredBytes, totalBytes);
  }

  downloadProgressDisplay() {
    if (this.#downloadPercent !== undefined) {
      this.channels.message(`${this.#downloadPercent}%`);
    }
    this.#downloadTimeoutId = setTimeout(this.downloadProgressDisplay.bind(this), downloadUpdateRateMs);
  }

  downloadComplete(): void {
    this.stop();
  }

  unpackArchiveStart(archivePath: string) {
    this.channels.message(i`Unpacking ${archivePath}...`);
  }

  unpackFileComplete(entry: Readonly<FileEntry>) {
    this.channels.debug(`${entry.member} -> ${entry.destination}`);
  }

  stop(): void {
    if (this.#downloadTimeoutId) {
      clearTimeout(this.#downloadTimeoutId);
      this.#downloadTimeoutId = undefined;
    }
  }
}

/** Reports acquisition progress with a bar on a terminal, or with periodic messages otherwise. */
export function createProgressRenderer(channels: Channels, isTty = process.stdout.isTTY === true): ProgressRenderer {
  return isTty ? new TtyProgressRenderer(channels) : new NoTtyProgressRenderer(channels);
}
