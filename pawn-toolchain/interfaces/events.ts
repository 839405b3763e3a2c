// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import type { AcquisitionStage } from '../util/exceptions';

export interface DownloadEvents {
  downloadStart(url: string, destination: string): void;
  /** totalBytes is undefined when the server sends no content-length */
  downloadProgress(url: string, transferredBytes: number, totalBytes: number | undefined): void;
  downloadComplete(url: string, destination: string): void;
}

export interface FileEntry {
  archivePath: string;
  /** the member name inside the archive */
  member: string;
  /** the absolute path the member is written to */
  destination: string;
}

export interface UnpackEvents {
  unpackArchiveStart(archivePath: string, destination: string): void;
  unpackFileComplete(entry: Readonly<FileEntry>): void;
  unpackArchiveComplete(archivePath: string): void;
}

export interface AcquireEvents extends DownloadEvents, UnpackEvents {
  stageStart(stage: AcquisitionStage): void;
  cacheHit(path: string): void;
  cacheMiss(filename: string): void;
}

export interface AcquireOptions {
  /** skip the cache lookup and download again */
  force?: boolean;
  signal?: AbortSignal;
  events?: Partial<AcquireEvents>;
}
