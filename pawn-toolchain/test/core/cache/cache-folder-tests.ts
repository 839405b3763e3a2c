// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { strict } from 'assert';
import { homedir } from 'os';
import { join, resolve } from 'path';
import { getCacheFolder } from '../../../cache/cache-folder';

describe('getCacheFolder', () => {
  it('prefers the setting', () => {
    strict.equal(getCacheFolder('/opt/pawn/cache', { PAWN_TOOLCHAIN_CACHE: '/var/cache/pawn' }, 'linux'), resolve('/opt/pawn/cache'));
  });

  it('then the environment', () => {
    strict.equal(getCacheFolder(undefined, { PAWN_TOOLCHAIN_CACHE: '/var/cache/pawn', XDG_CACHE_HOME: '/xdg' }, 'linux'), resolve('/var/cache/pawn'));
  });

  it('uses the local application data folder on windows', () => {
    strict.equal(getCacheFolder(undefined, { LOCALAPPDATA: 'C:\\Users\\dev\\AppData\\Local' }, 'win32'), join('C:\\Users\\dev\\AppData\\Local', 'pawn-toolchain', 'cache'));
  });

  it('follows XDG_CACHE_HOME', () => {
    strict.equal(getCacheFolder(undefined, { XDG_CACHE_HOME: '/xdg' }, 'linux'), join('/xdg', 'pawn-toolchain'));
    strict.equal(getCacheFolder(undefined, { XDG_CACHE_HOME: '/xdg' }, 'darwin'), join('/xdg', 'pawn-toolchain'));
  });

  it('falls back to the platform cache location', () => {
    strict.equal(getCacheFolder(undefined, {}, 'darwin'), join(homedir(), 'Library', 'Caches', 'pawn-toolchain'));
    strict.equal(getCacheFolder(undefined, {}, 'linux'), join(homedir(), '.cache', 'pawn-toolchain'));
  });
});
