// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { i } from '../i18n';
import type { Session } from '../session';
import { ConfigurationError } from '../util/exceptions';
import { TarGzUnpacker } from './tar';
import type { Unpacker } from './unpacker';
import { ZipUnpacker } from './zip';

type UnpackerFactory = (session: Session) => Unpacker;

/** register unpackers here */
const unpackers = new Map<string, UnpackerFactory>([
  ['zip', session => new ZipUnpacker(session)],
  ['tar.gz', session => new TarGzUnpacker(session)],
]);

/** Returns the unpacker for an extraction kind. */
export function unpackerFor(session: Session, kind: string): Unpacker {
  const factory = unpackers.get(kind);
  if (!factory) {
    throw new ConfigurationError(i`No unpacker is registered for '${kind}' archives`);
  }
  return factory(session);
}
