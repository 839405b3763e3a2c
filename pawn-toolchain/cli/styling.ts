// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import chalk from 'chalk';
import { i } from '../i18n';
import type { Session } from '../session';

export function formatTime(t: number) {
  return (
    t < 3600000 ? [Math.floor(t / 60000) % 60, Math.floor(t / 1000) % 60, t % 1000] :
      t < 86400000 ? [Math.floor(t / 3600000) % 24, Math.floor(t / 60000) % 60, Math.floor(t / 1000) % 60, t % 1000] :
        [Math.floor(t / 86400000), Math.floor(t / 3600000) % 24, Math.floor(t / 60000) % 60, Math.floor(t / 1000) % 60, t % 1000]).map(each => each.toString().padStart(2, '0')).join(':').replace(/(.*):(\d)/, '$1.$2');
}

export function indent(text: string): string
export function indent(text: Array<string>): Array<string>
export function indent(text: string | Array<string>): string | Array<string> {
  if (Array.isArray(text)) {
    return text.map(each => indent(each));
  }
  return `  ${text}`;
}

export const log: (message?: string) => void = (text) => console.log(text ?? '');
export const error: (message?: string) => void = (text) => {
  const errorLocalized = i`error:`;
  return console.error(`${chalk.red.bold(errorLocalized)} ${text}`);
};
export const warning: (message?: string) => void = (text) => {
  const warningLocalized = i`warning:`;
  return console.error(`${chalk.yellow.bold(warningLocalized)} ${text}`);
};

/** Prints the session's channels on the console; debug messages only when asked for. */
export function initStyling(session: Session, showDebug: boolean) {

  session.channels.on('message', (text: string, _msec: number) => {
    log(text);
  });

  session.channels.on('error', (text: string, _msec: number) => {
    error(text);
  });

  session.channels.on('warning', (text: string, _msec: number) => {
    warning(text);
  });

  if (showDebug) {
    session.channels.on('debug', (text: string, msec: number) => {
      console.error(`${chalk.cyan.bold(`debug: [${formatTime(msec)}]`)} ${text}`);
    });
  }
}
