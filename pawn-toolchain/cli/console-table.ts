// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { strict } from 'assert';
import chalk from 'chalk';
import stripAnsi from 'strip-ansi';

export type Alignment = 'left' | 'right';

export interface Column {
  readonly name: string;
  readonly align?: Alignment;
}

/** pads to a visible width; escape sequences do not count */
function pad(text: string, length: number, align: Alignment = 'left') {
  const remain = length - stripAnsi(text).length;
  if (remain <= 0) { return text; }
  return align === 'right' ? ' '.repeat(remain) + text : text + ' '.repeat(remain);
}

export class Table {
  private readonly columns: Array<Column>;
  private readonly rows = new Array<Array<string>>();
  constructor(...columns: Array<string | Column>) {
    this.columns = columns.map(each => typeof each === 'string' ? { name: each } : each);
  }
  push(...values: Array<string>) {
    strict.equal(values.length, this.columns.length, 'unexpected number of arguments in table row');
    this.rows.push(Array.from(values));
  }
  toString() {
    const lengths = this.columns.map(column => column.name.length);

    for (const row of this.rows) {
      row.forEach((cell, colNum) => {
        lengths[colNum] = Math.max(lengths[colNum], stripAnsi(cell).length);
      });
    }

    const formattedRows = new Array<string>();
    formattedRows.push(this.columns.map((column, colNum) => chalk.red(pad(column.name, lengths[colNum], column.align))).join(' ').trimEnd());

    for (const row of this.rows) {
      formattedRows.push(row.map((cell, colNum) => pad(cell, lengths[colNum], this.columns[colNum].align)).join(' ').trimEnd());
    }

    return formattedRows.join('\n');
  }
}
