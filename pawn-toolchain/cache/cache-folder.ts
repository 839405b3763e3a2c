// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { homedir } from 'os';
import { join, resolve } from 'path';
import { cacheFolderVariable, toolName } from '../constants';

type Environment = Record<string, string | undefined>;

/**
 * Determines the download cache folder:
 * the setting, then $PAWN_TOOLCHAIN_CACHE, then the platform's user cache location.
 *
 * This does not create the folder.
 */
export function getCacheFolder(setting?: string, env: Environment = process.env, platform: NodeJS.Platform = process.platform): string {
  if (setting) {
    return resolve(setting);
  }

  const fromEnvironment = env[cacheFolderVariable];
  if (fromEnvironment) {
    return resolve(fromEnvironment);
  }

  if (platform === 'win32') {
    return join(env['LOCALAPPDATA'] || join(homedir(), 'AppData', 'Local'), toolName, 'cache');
  }

  // XDG base directory specification
  const xdgCache = env['XDG_CACHE_HOME'];
  if (xdgCache) {
    return join(xdgCache, toolName);
  }

  if (platform === 'darwin') {
    return join(homedir(), 'Library', 'Caches', toolName);
  }

  return join(homedir(), '.cache', toolName);
}
