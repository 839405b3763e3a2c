// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { i } from '../../i18n';
import { Command } from '../command';
import { Table } from '../console-table';
import { filePath, size } from '../format';
import { Clear } from '../switches/clear';

export class CacheCommand extends Command {
  readonly command = 'cache';
  readonly summary = i`Lists the downloaded archives in the cache, or clears it`;
  clear = new Clear(this);

  override async run() {
    const cache = this.session.cache;
    if (this.clear.active) {
      await cache.clear();
      this.session.channels.message(i`Cache folder cleared (${filePath(cache.folder)})`);
      return true;
    }

    const entries = await cache.entries();
    if (!entries.length) {
      this.session.channels.message(i`The download cache is empty (${filePath(cache.folder)})`);
      return true;
    }

    const table = new Table(i`File`, { name: i`Size`, align: 'right' }, i`Date`);
    for (const entry of entries) {
      table.push(entry.filename, size(entry.size), entry.modified.toISOString());
    }
    this.session.channels.message([table.toString(), '']);

    return true;
  }
}
