// Copyright (c) Microsoft Corporation.
// Licensed under the MIT License.

import { strictEqual, deepStrictEqual, ok } from 'assert';
import { Channels, Stopwatch } from '../../util/channels';

describe('Channels', () => {
  it('event emitter works', async () => {

    const expected = ['a', 'b', 'c', 'd'];
    let i = 0;

    const m = new Channels(new Stopwatch());
    m.on('message', (message: string) => {
      // check that each message comes in order
      strictEqual(message, expected[i], 'messages should be in order');
      i++;
    });

    for (const each of expected) {
      m.message(each);
    }

    strictEqual(expected.length, i, 'should have got the right number of messages');
  });

  it('splits arrays into one event per line', () => {
    const received = new Array<string>();
    const m = new Channels(new Stopwatch());
    m.on('warning', (text: string) => received.push(text));
    m.on('message', () => received.push('wrong channel'));

    m.warning(['first', 'second']);
    deepStrictEqual(received, ['first', 'second']);
  });

  it('stamps messages with the elapsed time', () => {
    const m = new Channels(new Stopwatch());
    let stamp = -1;
    m.on('debug', (_text: string, msec: number) => {
      stamp = msec;
    });
    m.debug('tick');
    ok(stamp >= 0);
  });
});
