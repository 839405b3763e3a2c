// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import type { Session } from '../session';
import type { Argument } from './argument';
import type { CommandLine } from './command-line';
import type { Switch } from './switch';
import { Debug } from './switches/debug';

/** @internal */

export abstract class Command {
  readonly abstract command: string;
  /** one line of help text */
  readonly abstract summary: string;

  readonly switches = new Array<Switch>();
  readonly arguments = new Array<Argument>();

  readonly debug = new Debug(this);

  constructor(public commandLine: CommandLine, protected session: Session, protected signal?: AbortSignal) {}

  get inputs() {
    return this.commandLine.inputs.slice(1);
  }

  async run() {
    // do something
    return true;
  }
}
