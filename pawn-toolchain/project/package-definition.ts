// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { readFile } from 'fs/promises';
import { join } from 'path';
import { isMap, isScalar, parseDocument, type YAMLMap } from 'yaml';
import { packageDefinitionFiles } from '../constants';
import { i } from '../i18n';
import { ConfigurationError, errorCode, messageOf } from '../util/exceptions';

/** The toolchain settings of a pawn package (pawn.json or pawn.yaml). */
export interface PackageDefinition {
  /** the file the definition was read from */
  readonly file: string;
  readonly compilerVersion: string | undefined;
  /** where the compiler is installed, relative to the package */
  readonly compilerFolder: string | undefined;
}

function stringMember(file: string, map: YAMLMap, name: string): string | undefined {
  const node = map.get(name, true);
  if (node === undefined || (isScalar(node) && node.value === null)) {
    return undefined;
  }
  if (isScalar(node) && (typeof node.value === 'string' || typeof node.value === 'number')) {
    const value = String(node.value).trim();
    return value || undefined;
  }
  throw new ConfigurationError(i`'${name}' in '${file}' must be a string`);
}

/** Parses the content of a package definition; JSON is read as the YAML subset it is. */
export function parsePackageDefinition(file: string, content: string): PackageDefinition {
  const doc = parseDocument(content || '{}', { prettyErrors: false, strict: true });
  if (doc.errors.length) {
    throw new ConfigurationError(i`Unable to parse '${file}': ${doc.errors[0].message}`);
  }

  const contents = doc.contents;
  if (contents === null) {
    return { file, compilerVersion: undefined, compilerFolder: undefined };
  }
  if (!isMap(contents)) {
    throw new ConfigurationError(i`'${file}' must contain an object`);
  }

  return {
    file,
    compilerVersion: stringMember(file, contents, 'compiler_version'),
    compilerFolder: stringMember(file, contents, 'compiler_dir')
  };
}

/**
 * Reads the package definition in a folder, trying each supported file name in turn.
 *
 * @returns undefined when the folder has no package definition
 */
export async function loadPackageDefinition(folder: string): Promise<PackageDefinition | undefined> {
  for (const name of packageDefinitionFiles) {
    const file = join(folder, name);
    let content: string;
    try {
      content = await readFile(file, 'utf8');
    } catch (e) {
      if (errorCode(e) === 'ENOENT') {
        continue;
      }
      throw new ConfigurationError(i`Unable to read '${file}': ${messageOf(e)}`, { cause: e });
    }
    return parsePackageDefinition(file, content);
  }
  return undefined;
}
