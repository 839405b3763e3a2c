// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { createReadStream } from 'fs';
import type { Readable } from 'stream';
import { pipeline } from 'stream/promises';
import { createGunzip } from 'zlib';
import { extract as tarExtract, type Headers } from 'tar-stream';
import { normalizeMember } from '../catalog/descriptor';
import { i } from '../i18n';
import { permissionBits, Unpacker, type ExtractionKind, type UnpackOptions } from './unpacker';

/** Unpacks gzip-compressed tarballs in a single streaming pass. */
export class TarGzUnpacker extends Unpacker {
  readonly kind: ExtractionKind = 'tar.gz';

  async unpack(archivePath: string, destination: string, paths: ReadonlyMap<string, string>, options: UnpackOptions = {}): Promise<Array<string>> {
    options.signal?.throwIfAborted();
    this.session.channels.debug(`unpacking TAR.GZ ${archivePath} => ${destination}`);
    options.events?.unpackArchiveStart?.(archivePath, destination);

    const written = new Map<string, string>();
    const tarExtractor = tarExtract();

    tarExtractor.on('entry', (header: Headers, stream: Readable, next: () => void) =>
      this.maybeUnpackEntry(archivePath, destination, paths, written, options, header, stream).then(
        () => next(),
        (err: unknown) => tarExtractor.destroy(err instanceof Error ? err : new Error(String(err)))));

    try {
      await pipeline(createReadStream(archivePath), createGunzip(), tarExtractor, { signal: options.signal });
    } catch (e) {
      throw this.failure(archivePath, e, options);
    }

    this.requireMembers(archivePath, paths, written);
    options.events?.unpackArchiveComplete?.(archivePath);
    return [...paths.keys()].flatMap(member => written.get(member) ?? []);
  }

  private async maybeUnpackEntry(archivePath: string, destination: string, paths: ReadonlyMap<string, string>, written: Map<string, string>, options: UnpackOptions, header: Headers, stream: Readable): Promise<void> {
    // a failed write destroys the entry, which then closes without ending; its error reaches the extractor.
    const drained = new Promise<void>(resolve => {
      stream.once('end', resolve);
      stream.once('close', resolve);
    });

    try {
      const member = normalizeMember(header.name);
      const installPath = paths.get(member);
      if (installPath === undefined) {
        return;
      }

      switch (header.type) {
        case 'file':
        case 'contiguous-file':
          break;

        default:
          // a link or directory with a mapped name does not satisfy the member.
          this.session.channels.warning(i`in ${archivePath} skipping ${header.name} because it is a ${header.type || ''}`);
          return;
      }

      const target = this.targetOf(destination, installPath);
      await this.writeMember(archivePath, member, stream, target, permissionBits(header.mode), options);
      written.set(member, target);
    } finally {
      // the extractor only moves on once the entry has been drained.
      if (!stream.destroyed) {
        stream.resume();
        await drained;
      }
    }
  }
}
