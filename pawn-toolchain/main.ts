#!/usr/bin/env node

// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { argv } from 'process';
import { CommandLine } from './cli/command-line';
import { AcquireCommand } from './cli/commands/acquire';
import { CacheCommand } from './cli/commands/cache';
import { HelpCommand } from './cli/commands/help';
import { ResolveCommand } from './cli/commands/resolve';
import { error, initStyling, log } from './cli/styling';
import { i, setLocale } from './i18n';
import { Session } from './session';
import { messageOf } from './util/exceptions';

/** Runs one command line; resolves to the process exit code. */
export async function main(args: Array<string>, settings?: { currentDirectory?: string }): Promise<number> {
  // parse the command line
  const commandline = new CommandLine(args);

  setLocale(commandline.language);

  // create our session for this process.
  const session = new Session({ ...commandline.sessionSettings, ...settings });

  initStyling(session, commandline.debug);

  const cancellation = new AbortController();
  const onInterrupt = () => cancellation.abort();
  process.once('SIGINT', onInterrupt);

  commandline.addCommand(new AcquireCommand(commandline, session, cancellation.signal));
  commandline.addCommand(new ResolveCommand(commandline, session, cancellation.signal));
  commandline.addCommand(new CacheCommand(commandline, session, cancellation.signal));
  commandline.addCommand(new HelpCommand(commandline, session, cancellation.signal));

  try {
    const command = commandline.command;
    if (!command) {
      // no command recognized.

      // did they specify inputs?
      if (commandline.inputs.length > 0) {
        // unrecognized command
        error(i`Unrecognized command '${commandline.inputs[0]}'`);
        return 1;
      }

      return await new HelpCommand(commandline, session).run() ? 0 : 1;
    }

    return await command.run() ? 0 : 1;
  } catch (e) {
    // in --debug mode we want to see the stack trace(s).
    if (commandline.debug && e instanceof Error) {
      log(e.stack);
      let cause = e.cause;
      while (cause instanceof Error) {
        log(cause.stack);
        cause = cause.cause;
      }
    }

    error(messageOf(e));
    return 1;
  } finally {
    process.removeListener('SIGINT', onInterrupt);
  }
}

if (require.main === module) {
  main(argv.slice(2)).then(code => {
    process.exitCode = code;
  }, e => {
    error(messageOf(e));
    process.exitCode = 1;
  });
}
