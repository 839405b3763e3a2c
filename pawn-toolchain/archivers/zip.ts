// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import type { Readable } from 'stream';
import { open as openZip, type Entry, type ZipFile } from 'yauzl';
import { normalizeMember } from '../catalog/descriptor';
import { permissionBits, Unpacker, type ExtractionKind, type UnpackOptions } from './unpacker';

const symbolicLink = 0o120000;
const fileTypeMask = 0o170000;

function openArchive(archivePath: string): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    openZip(archivePath, { lazyEntries: true, autoClose: false }, (err, zipfile) => {
      if (err || !zipfile) {
        reject(err ?? new Error(`unable to open ${archivePath}`));
        return;
      }
      resolve(zipfile);
    });
  });
}

/** reads the central directory */
function readEntries(zipfile: ZipFile): Promise<Array<Entry>> {
  return new Promise((resolve, reject) => {
    const entries = new Array<Entry>();
    zipfile.on('entry', (entry: Entry) => {
      entries.push(entry);
      zipfile.readEntry();
    });
    zipfile.once('end', () => resolve(entries));
    zipfile.once('error', reject);
    zipfile.readEntry();
  });
}

function openReadStream(zipfile: ZipFile, entry: Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (err, stream) => {
      if (err || !stream) {
        reject(err ?? new Error(`unable to read ${entry.fileName}`));
        return;
      }
      resolve(stream);
    });
  });
}

/** the unix mode stored in the upper 16 bits of the external attributes */
function unixMode(entry: Entry) {
  return (entry.externalFileAttributes >>> 16) & 0xffff;
}

function isRegularFile(entry: Entry) {
  if (entry.fileName.endsWith('/')) {
    return false;
  }
  return (unixMode(entry) & fileTypeMask) !== symbolicLink;
}

export class ZipUnpacker extends Unpacker {
  readonly kind: ExtractionKind = 'zip';

  async unpack(archivePath: string, destination: string, paths: ReadonlyMap<string, string>, options: UnpackOptions = {}): Promise<Array<string>> {
    options.signal?.throwIfAborted();
    this.session.channels.debug(`unpacking ZIP ${archivePath} => ${destination}`);
    options.events?.unpackArchiveStart?.(archivePath, destination);

    let zipfile: ZipFile;
    let entries: Map<string, Entry>;
    try {
      zipfile = await openArchive(archivePath);
    } catch (e) {
      throw this.failure(archivePath, e, options);
    }

    try {
      entries = new Map<string, Entry>();
      for (const entry of await readEntries(zipfile)) {
        const name = normalizeMember(entry.fileName);
        if (paths.has(name) && isRegularFile(entry)) {
          entries.set(name, entry);
        }
      }
    } catch (e) {
      zipfile.close();
      throw this.failure(archivePath, e, options);
    }

    // every member is checked before anything is written.
    try {
      this.requireMembers(archivePath, paths, entries);

      const written = new Array<string>();
      for (const [member, installPath] of paths) {
        options.signal?.throwIfAborted();
        const entry = entries.get(member);
        if (!entry) {
          continue;
        }
        const target = this.targetOf(destination, installPath);
        let source: Readable;
        try {
          source = await openReadStream(zipfile, entry);
        } catch (e) {
          throw this.failure(archivePath, e, options, member);
        }
        await this.writeMember(archivePath, member, source, target, permissionBits(unixMode(entry)), options);
        written.push(target);
      }

      options.events?.unpackArchiveComplete?.(archivePath);
      return written;
    } finally {
      zipfile.close();
    }
  }
}
