// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import type { ExtractionKind } from '../archivers/unpacker';
import { UnsupportedPlatformError } from '../util/exceptions';
import { validateTemplate } from './template';

export type Platform = 'darwin' | 'linux' | 'windows';

/** Describes where a compiler package lives and which of its members get installed. */
export interface PackageDescriptor {
  /** download location, with {version} placeholders */
  readonly locator: string;

  /** the archive format of the download */
  readonly extraction: ExtractionKind;

  /** archive member template => install path template, in install order */
  readonly paths: ReadonlyArray<readonly [member: string, installPath: string]>;
}

const releases = 'https://github.com/Zeex/pawn/releases/download/v{version}';

function freeze(descriptor: PackageDescriptor): PackageDescriptor {
  validateTemplate(descriptor.locator);
  const members = new Set<string>();
  for (const [member, installPath] of descriptor.paths) {
    validateTemplate(member);
    validateTemplate(installPath);
    if (members.has(member)) {
      throw new Error(`duplicate archive member '${member}' in catalog entry for ${descriptor.locator}`);
    }
    members.add(member);
  }
  Object.freeze(descriptor.paths);
  return Object.freeze(descriptor);
}

const catalog: ReadonlyMap<string, PackageDescriptor> = new Map<Platform, PackageDescriptor>([
  ['darwin', freeze({
    locator: `${releases}/pawnc-{version}-darwin.zip`,
    extraction: 'zip',
    paths: [
      ['pawnc-{version}-darwin/bin/pawncc', 'pawncc'],
      ['pawnc-{version}-darwin/lib/libpawnc.dylib', 'libpawnc.dylib'],
    ]
  })],
  ['linux', freeze({
    locator: `${releases}/pawnc-{version}-linux.tar.gz`,
    extraction: 'tar.gz',
    paths: [
      ['pawnc-{version}-linux/bin/pawncc', 'pawncc'],
      ['pawnc-{version}-linux/lib/libpawnc.so', 'libpawnc.so'],
    ]
  })],
  ['windows', freeze({
    locator: `${releases}/pawnc-{version}-windows.zip`,
    extraction: 'zip',
    paths: [
      ['pawnc-{version}-windows/bin/pawncc.exe', 'pawncc.exe'],
      ['pawnc-{version}-windows/bin/pawnc.dll', 'pawnc.dll'],
    ]
  })],
]);

export const supportedPlatforms: ReadonlyArray<Platform> = Object.freeze(['darwin', 'linux', 'windows']);

export function isPlatform(platform: string): platform is Platform {
  return supportedPlatforms.some(each => each === platform);
}

/** Returns the package descriptor for a platform. */
export function lookupPackage(platform: string): PackageDescriptor {
  const descriptor = catalog.get(platform);
  if (!descriptor) {
    throw new UnsupportedPlatformError(platform, supportedPlatforms);
  }
  return descriptor;
}

/** Maps the node.js platform of this process onto a catalog platform. */
export function hostPlatform(nodePlatform: NodeJS.Platform = process.platform): Platform {
  switch (nodePlatform) {
    case 'win32':
      return 'windows';
    case 'darwin':
    case 'linux':
      return nodePlatform;
  }
  throw new UnsupportedPlatformError(nodePlatform, supportedPlatforms);
}
