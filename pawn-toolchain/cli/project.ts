// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { dirname, resolve } from 'path';
import { defaultCompilerFolder } from '../constants';
import { i } from '../i18n';
import { loadPackageDefinition, type PackageDefinition } from '../project/package-definition';
import type { Session } from '../session';
import { ConfigurationError } from '../util/exceptions';

export interface CompilerRequest {
  readonly version: string;
  /** where the compiler goes unless the command line says otherwise */
  readonly destination: string;
  readonly definition: PackageDefinition | undefined;
}

/**
 * Works out which compiler version to use: the one given on the command line,
 * or else the one the package in the current folder asks for.
 */
export async function compilerRequest(session: Session, version: string | undefined): Promise<CompilerRequest> {
  const definition = await loadPackageDefinition(session.currentDirectory);
  const requested = version || definition?.compilerVersion;
  if (!requested) {
    throw new ConfigurationError(i`No compiler version given, and no package definition in ${session.currentDirectory} names one`);
  }

  const base = definition ? dirname(definition.file) : session.currentDirectory;
  return {
    version: requested,
    destination: resolve(base, definition?.compilerFolder || defaultCompilerFolder),
    definition
  };
}
