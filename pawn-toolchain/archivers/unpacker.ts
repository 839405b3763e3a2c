// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { createWriteStream } from 'fs';
import { chmod, mkdir } from 'fs/promises';
import { dirname, join } from 'path';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { i } from '../i18n';
import type { UnpackEvents } from '../interfaces/events';
import type { Session } from '../session';
import { errorCode, ExtractionError, InvalidArchiveError, messageOf, MissingMemberError } from '../util/exceptions';

/** The archive formats an unpacker exists for. */
export type ExtractionKind = 'zip' | 'tar.gz';

export interface UnpackOptions {
  signal?: AbortSignal;
  events?: Partial<UnpackEvents>;
}

/** error codes that come from the local filesystem rather than from the archive contents */
const fileSystemErrorCodes = new Set(['EACCES', 'EPERM', 'ENOENT', 'ENOSPC', 'EISDIR', 'ENOTDIR', 'EROFS', 'EEXIST', 'EMFILE', 'EBUSY', 'EIO']);

/** Unix permission bits of an archive entry, or undefined if the archive carries none. */
export function permissionBits(mode: number | undefined): number | undefined {
  const bits = (mode ?? 0) & 0o777;
  return bits ? bits : undefined;
}

/**
 * Extracts selected members of an archive to renamed paths.
 *
 * Only the members in `paths` are written; every one of them must be present in the archive.
 */
export abstract class Unpacker {
  abstract readonly kind: ExtractionKind;

  constructor(protected readonly session: Session) {
  }

  /**
   * Writes each mapped member to `destination/<install path>`.
   *
   * @param paths archive member => install path relative to destination
   * @returns the absolute paths written, in the order of `paths`
   * @throws MissingMemberError when a mapped member is not a file in the archive
   * @throws InvalidArchiveError when the archive cannot be decoded
   * @throws ExtractionError (IO_FAILED) when a file cannot be read or written
   */
  abstract unpack(archivePath: string, destination: string, paths: ReadonlyMap<string, string>, options?: UnpackOptions): Promise<Array<string>>;

  protected targetOf(destination: string, installPath: string) {
    return join(destination, ...installPath.split('/'));
  }

  /** Throws for the first mapped member (in map order) that was not found. */
  protected requireMembers(archivePath: string, paths: ReadonlyMap<string, string>, found: { has(member: string): boolean }) {
    for (const member of paths.keys()) {
      if (!found.has(member)) {
        throw new MissingMemberError(archivePath, member);
      }
    }
  }

  protected async writeMember(archivePath: string, member: string, source: Readable, target: string, mode: number | undefined, options: UnpackOptions): Promise<void> {
    this.session.channels.debug(`unpacking ${archivePath}/${member} => ${target}`);
    try {
      await mkdir(dirname(target), { recursive: true });
      await pipeline(source, createWriteStream(target, { mode }), { signal: options.signal });
      if (mode !== undefined && process.platform !== 'win32') {
        // the file may have existed before, in which case open() did not apply the mode.
        await chmod(target, mode);
      }
    } catch (e) {
      throw this.failure(archivePath, e, options, member, target);
    }
    options.events?.unpackFileComplete?.({ archivePath, member, destination: target });
  }

  /** Translates a low-level failure into an ExtractionError, leaving cancellations alone. */
  protected failure(archivePath: string, error: unknown, options: UnpackOptions, member?: string, target?: string): unknown {
    if (error instanceof ExtractionError || options.signal?.aborted) {
      return error;
    }

    const code = errorCode(error);
    if (code && fileSystemErrorCodes.has(code)) {
      const message = target ?
        i`Failed to write member '${member}' of '${archivePath}' to '${target}': ${messageOf(error)}` :
        i`Failed to read '${archivePath}': ${messageOf(error)}`;
      return new ExtractionError(archivePath, 'IO_FAILED', message, { cause: error, member });
    }

    const detail = member ? i`while reading member '${member}': ${messageOf(error)}` : messageOf(error);
    return new InvalidArchiveError(archivePath, detail, { cause: error, member });
  }
}
