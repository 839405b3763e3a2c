// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { posix } from 'path';
import type { ExtractionKind } from '../archivers/unpacker';
import { i } from '../i18n';
import { ConfigurationError, TemplateError } from '../util/exceptions';
import { lookupPackage, type PackageDescriptor } from './platforms';
import { resolveTemplate } from './template';

/** A package descriptor with a concrete version applied. Immutable. */
export interface ResolvedDescriptor {
  readonly platform: string;
  readonly version: string;

  /** the download URL */
  readonly locator: string;

  /** the last path segment of the download URL; this is the cache key */
  readonly filename: string;

  readonly extraction: ExtractionKind;

  /** archive member => path relative to the install folder */
  readonly paths: ReadonlyMap<string, string>;
}

/** Normalizes an archive member name to forward slashes with no leading './' or '/'. */
export function normalizeMember(member: string): string {
  return member.replace(/\\/g, '/').replace(/^(\.\/)+/, '').replace(/^\/+/, '');
}

function checkInstallPath(template: string, installPath: string): string {
  const normalized = posix.normalize(installPath.replace(/\\/g, '/'));
  if (!normalized || normalized === '.' || posix.isAbsolute(normalized) || /^[A-Za-z]:/.test(normalized) || normalized === '..' || normalized.startsWith('../')) {
    throw new TemplateError(template, i`Install path '${installPath}' must be a relative path inside the install folder`);
  }
  return normalized;
}

function filenameOf(locator: string): string {
  let url: URL;
  try {
    url = new URL(locator);
  } catch (e) {
    throw new ConfigurationError(i`'${locator}' is not a valid URL`, { cause: e });
  }
  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    throw new ConfigurationError(i`'${locator}' must be an http or https URL`);
  }

  let filename: string;
  try {
    filename = decodeURIComponent(posix.basename(url.pathname));
  } catch (e) {
    throw new ConfigurationError(i`'${locator}' has a malformed escape in its file name`, { cause: e });
  }
  if (!filename || filename === '.' || filename === '..' || /[\\/]/.test(filename)) {
    throw new ConfigurationError(i`'${locator}' does not name a file`);
  }
  return filename;
}

/** characters that would change the meaning of the url or of the cache file name */
const unsafeVersionCharacters = /[/\\?#%\s\x00-\x1f]/;

function checkVersion(version: string) {
  if (!version) {
    throw new ConfigurationError(i`The compiler version must not be empty`);
  }
  if (unsafeVersionCharacters.test(version)) {
    throw new ConfigurationError(i`'${version}' is not a valid compiler version; it must not contain path separators, whitespace or any of '?#%'`);
  }
}

/**
 * Applies a version to every template of a package descriptor.
 *
 * Nothing is touched on disk or network; every template is resolved before the result is returned.
 */
export function instantiateDescriptor(platform: string, pkg: PackageDescriptor, version: string): ResolvedDescriptor {
  checkVersion(version);
  const locator = resolveTemplate(pkg.locator, version);
  const paths = new Map<string, string>();
  for (const [memberTemplate, installTemplate] of pkg.paths) {
    const member = normalizeMember(resolveTemplate(memberTemplate, version));
    const installPath = checkInstallPath(installTemplate, resolveTemplate(installTemplate, version));
    if (!member) {
      throw new TemplateError(memberTemplate, i`Archive member template '${memberTemplate}' resolves to an empty path`);
    }
    paths.set(member, installPath);
  }

  return Object.freeze({
    platform,
    version,
    locator,
    filename: filenameOf(locator),
    extraction: pkg.extraction,
    paths
  });
}

/** Looks up the platform in the catalog and resolves its descriptor for the version. */
export function resolveDescriptor(platform: string, version: string): ResolvedDescriptor {
  return instantiateDescriptor(platform, lookupPackage(platform), version);
}
