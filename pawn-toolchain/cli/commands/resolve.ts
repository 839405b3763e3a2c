// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { resolveDescriptor } from '../../catalog/descriptor';
import { i } from '../../i18n';
import { Command } from '../command';
import { Table } from '../console-table';
import { compilerIdentity, filePath, heading, url } from '../format';
import { compilerRequest } from '../project';
import { PlatformSwitch } from '../switches/platform';
import { indent } from '../styling';
import { VersionArgument } from './acquire';

export class ResolveCommand extends Command {
  readonly command = 'resolve';
  readonly summary = i`Shows where the pawn compiler would be downloaded from and which files would be installed`;
  version = new VersionArgument(this);
  platform = new PlatformSwitch(this);

  override async run() {
    const request = await compilerRequest(this.session, this.inputs[0]);
    const descriptor = resolveDescriptor(this.platform.value || this.session.platform, request.version);

    const table = new Table(i`Member`, i`Install path`);
    for (const [member, installPath] of descriptor.paths) {
      table.push(member, installPath);
    }

    this.session.channels.message([
      heading(compilerIdentity(descriptor.platform, descriptor.version)),
      indent(i`url: ${url(descriptor.locator)}`),
      indent(i`format: ${descriptor.extraction}`),
      indent(i`cache file: ${filePath(this.session.cache.pathOf(descriptor.filename))}`),
      indent(i`destination: ${filePath(request.destination)}`),
      '',
      table.toString()
    ]);
    return true;
  }
}
