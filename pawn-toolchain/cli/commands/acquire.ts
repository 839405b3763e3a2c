// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { acquireArtifact } from '../../acquire';
import { i } from '../../i18n';
import { Argument } from '../argument';
import { Command } from '../command';
import { compilerIdentity, filePath } from '../format';
import { createProgressRenderer } from '../progress';
import { compilerRequest } from '../project';
import { Destination } from '../switches/destination';
import { Force } from '../switches/force';
import { PlatformSwitch } from '../switches/platform';

export class VersionArgument extends Argument {
  readonly argument = 'version';
  override readonly title = i`the compiler version; defaults to the package's compiler_version`;
}

export class AcquireCommand extends Command {
  readonly command = 'acquire';
  readonly summary = i`Downloads (or takes from the cache) the pawn compiler and installs it into a folder`;
  version = new VersionArgument(this);
  destination = new Destination(this);
  platform = new PlatformSwitch(this);
  force = new Force(this);

  override async run() {
    const request = await compilerRequest(this.session, this.inputs[0]);
    const destination = this.destination.resolvedValue(this.session.currentDirectory) ?? request.destination;
    const platform = this.platform.value || this.session.platform;

    const progress = createProgressRenderer(this.session.channels);
    try {
      const result = await acquireArtifact(this.session, platform, request.version, destination, { force: this.force.active, signal: this.signal, events: progress });
      for (const file of result.files) {
        this.session.channels.debug(`Installed ${file}`);
      }
      this.session.channels.message(result.source === 'cache' ?
        i`Installed ${compilerIdentity(platform, request.version)} to ${filePath(destination)} from the cache` :
        i`Installed ${compilerIdentity(platform, request.version)} to ${filePath(destination)}`);
    } finally {
      progress.stop();
    }
    return true;
  }
}
