// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { mkdir } from 'fs/promises';
import { resolve } from 'path';
import { unpackerFor } from './archivers/unpackers';
import { resolveDescriptor, type ResolvedDescriptor } from './catalog/descriptor';
import { i } from './i18n';
import type { AcquireOptions } from './interfaces/events';
import type { Session } from './session';
import { AcquisitionError, messageOf, type AcquisitionStage } from './util/exceptions';

export interface AcquisitionResult {
  /** where the installed files came from */
  readonly source: 'cache' | 'network';
  readonly descriptor: ResolvedDescriptor;
  /** absolute paths of the installed files, in path map order */
  readonly files: Array<string>;
}

/**
 * Installs the mapped members of the compiler distribution for a platform and version into a folder.
 *
 * The cached archive is used when there is a usable one; otherwise it is downloaded into the cache first.
 * A cached archive that cannot be extracted is replaced by a fresh download.
 *
 * @throws AcquisitionError naming the stage that failed, with the underlying error as its cause
 */
export async function acquireArtifact(session: Session, platform: string, version: string, destination: string, options: AcquireOptions = {}): Promise<AcquisitionResult> {
  const { force, signal, events } = options;
  const target = resolve(destination);
  let subject = i`platform '${platform}'`;
  let stage: AcquisitionStage = 'resolve';

  const enter = (next: AcquisitionStage) => {
    stage = next;
    session.channels.debug(`Acquisition of ${version} for ${platform}: entering the ${next} stage`);
    events?.stageStart?.(next);
  };

  try {
    enter('resolve');
    const descriptor = resolveDescriptor(platform, version);
    subject = `'${descriptor.locator}'`;

    enter('cache');
    signal?.throwIfAborted();
    subject = i`destination '${target}'`;
    await mkdir(target, { recursive: true });
    subject = `'${descriptor.locator}'`;
    if (force) {
      session.channels.debug(`Skipping the cache lookup for '${descriptor.filename}'`);
    } else {
      const lookup = await session.cache.satisfy(descriptor.filename, target, descriptor.extraction, descriptor.paths, { signal, events });
      switch (lookup.status) {
        case 'hit':
          events?.cacheHit?.(lookup.path);
          return { source: 'cache', descriptor, files: lookup.files };

        case 'corrupt':
          session.channels.warning(i`${lookup.error.message}; downloading it again`);
          break;

        case 'miss':
          events?.cacheMiss?.(descriptor.filename);
          break;
      }
    }

    enter('network');
    await mkdir(session.cache.folder, { recursive: true });
    const archivePath = await session.fetcher.fetch(descriptor.locator, descriptor.filename, { signal, events });
    subject = `'${archivePath}'`;

    enter('extract');
    const files = await unpackerFor(session, descriptor.extraction).unpack(archivePath, target, descriptor.paths, { signal, events });
    session.channels.debug(`Installed ${files.length} files from '${descriptor.filename}' to ${target}`);
    return { source: 'network', descriptor, files };
  } catch (e) {
    throw new AcquisitionError(stage, platform, version, i`Failed to acquire the compiler ${version} for ${platform} (${stage} stage, ${subject}): ${messageOf(e)}`, { cause: e });
  }
}

/** Installs the compiler for the session's platform, the host platform unless configured otherwise. */
export function acquireCompiler(session: Session, version: string, destination: string, options: AcquireOptions = {}): Promise<AcquisitionResult> {
  return acquireArtifact(session, session.platform, version, destination, options);
}
