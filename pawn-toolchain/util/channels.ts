// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { EventEmitter } from 'events';

export type ChannelName = 'warning' | 'error' | 'message' | 'debug';

/**
 * @internal
 *
 * Tracks timing of events
*/
export class Stopwatch {
  start: number;
  last: number;
  constructor() {
    this.last = this.start = process.uptime() * 1000;
  }
  get time() {
    const now = process.uptime() * 1000;
    const result = Math.floor(now - this.last);
    this.last = now;
    return result;
  }
  get total() {
    const now = process.uptime() * 1000;
    return Math.floor(now - this.start);
  }
}

/** Exposes a set of events that are used to communicate with the user
 *
 * Warning, Error, Message, Debug
 */
export class Channels extends EventEmitter {
  constructor(private readonly stopwatch: Stopwatch) {
    super();
  }

  warning(text: string | Array<string>) {
    this.send('warning', text);
  }
  error(text: string | Array<string>) {
    this.send('error', text);
  }
  message(text: string | Array<string>) {
    this.send('message', text);
  }
  debug(text: string | Array<string>) {
    this.send('debug', text);
  }

  private send(channel: ChannelName, text: string | Array<string>) {
    if (typeof text === 'string') {
      this.emit(channel, text, this.stopwatch.total);
    } else {
      text.forEach(t => this.emit(channel, t, this.stopwatch.total));
    }
  }
}
