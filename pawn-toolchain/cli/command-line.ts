// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import type { SessionSettings } from '../session';
import type { Command } from './command';

export type switches = {
  [key: string]: Array<string | undefined>;
}

/** switches that never take the following argument as their value */
const flags = new Set(['debug', 'force', 'clear']);

export class CommandLine {
  readonly commands = new Array<Command>();
  readonly inputs = new Array<string>();
  readonly switches: switches = {};

  get cacheRoot() {
    // cache folder is determined by
    // command line ( --cache-root )
    // environment (PAWN_TOOLCHAIN_CACHE)
    // the user's cache location
    return this.switches['cache-root']?.[0];
  }

  get platform() {
    return this.switches['platform']?.[0];
  }

  get force() {
    return this.isSet('force');
  }

  get debug() {
    return this.isSet('debug');
  }

  get language() {
    const l = this.switches['language'] || [];
    return l[0];
  }

  /** the session settings given on the command line */
  get sessionSettings(): SessionSettings {
    return { cacheFolder: this.cacheRoot, platform: this.platform };
  }

  isSet(sw: string) {
    const s = this.switches[sw];
    if (s && s[s.length - 1] !== 'false') {
      return true;
    }
    return false;
  }

  claim(sw: string) {
    const v = this.switches[sw];
    delete this.switches[sw];
    return v;
  }

  addCommand(command: Command) {
    this.commands.push(command);
  }

  /** parses the command line and returns the command that has been requested */
  get command() {
    return this.commands.find(cmd => cmd.command === this.inputs[0]);
  }

  constructor(args: Array<string>) {
    for (let i = 0; i < args.length; i++) {
      const arg = args[i];
      // eslint-disable-next-line prefer-const
      let [, name, , value] = /^--([^=:]+)([=:])?(.+)?$/g.exec(arg) || [];
      if (name) {
        if (!value && !flags.has(name)) {
          if (i + 1 < args.length && !args[i + 1].startsWith('--')) {
            // if you say --foo bar then bar is the value
            value = args[++i];
          }
        }
        this.switches[name] = this.switches[name] === undefined ? [] : this.switches[name];
        this.switches[name].push(value);
        continue;
      }
      this.inputs.push(arg);
    }
  }
}
