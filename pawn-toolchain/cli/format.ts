// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import chalk from 'chalk';

export function filePath(path: string): string {
  return chalk.cyan(path);
}

export function url(text: string): string {
  return chalk.blueBright(text);
}

export function compilerIdentity(platform: string, version: string): string {
  return `${chalk.whiteBright('pawncc')}-${chalk.gray(version)} ${chalk.yellow(platform)}`;
}

export function heading(text: string, level = 1) {
  switch (level) {
    case 1:
      return `${chalk.underline.bold(text)}`;
    case 2:
      return `${chalk.greenBright(text)}`;
    case 3:
      return `${chalk.green(text)}`;
  }
  return `${chalk.bold(text)}`;
}

export function optional(text: string) {
  return chalk.gray(text);
}
export function cmdSwitch(text: string) {
  return optional(`--${text}`);
}

export function command(text: string) {
  return chalk.whiteBright.bold(text);
}

export function hint(text: string) {
  return chalk.green.dim(text);
}

export function count(num: number) {
  return chalk.grey(`${num}`);
}

/** a byte count in the largest unit that keeps it at or above one */
export function size(bytes: number): string {
  const units = ['B', 'KiB', 'MiB', 'GiB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}
