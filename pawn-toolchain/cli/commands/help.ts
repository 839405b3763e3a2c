// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { cli } from '../../constants';
import { i } from '../../i18n';
import { Command } from '../command';
import { Table } from '../console-table';
import { cmdSwitch, command, heading, hint, optional } from '../format';
import { indent } from '../styling';

export class HelpCommand extends Command {
  readonly command = 'help';
  readonly summary = i`Shows this help`;

  override async run() {
    const lines = [heading(i`Usage`), indent(`${cli} ${command('<command>')} ${optional(i`[arguments] [--switches]`)}`), ''];

    for (const each of this.commandLine.commands) {
      lines.push(`${command(each.command)} ${each.arguments.map(arg => optional(`[${arg.argument}]`)).join(' ')}`.trimEnd());
      lines.push(indent(hint(each.summary)));

      const details = new Table('', '');
      for (const arg of each.arguments) {
        details.push(indent(optional(arg.argument)), arg.title);
      }
      for (const sw of each.switches) {
        details.push(indent(cmdSwitch(sw.switch)), sw.title);
      }
      // the table's first line is its (empty) heading
      lines.push(...details.toString().split('\n').slice(1), '');
    }

    lines.push(i`Global switches:`);
    lines.push(indent(`${cmdSwitch('cache-root')} ${i`the folder downloads are cached in`}`));
    lines.push(indent(`${cmdSwitch('language')} ${i`a JSON file of translated messages`}`));

    this.session.channels.message(lines);
    return true;
  }
}
