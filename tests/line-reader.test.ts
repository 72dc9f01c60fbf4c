import { PassThrough } from 'node:stream';

import { describe, expect, test, vi } from 'vitest';

import { Channel } from '../src/utils/channel.js';
import { onLines, pipeLines } from '../src/utils/line-reader.js';
import { settleWithin } from '../src/utils/timeout.js';

describe('onLines', () => {
  test('splits chunks on newlines and flushes the tail at end', async () => {
    const stream = new PassThrough();
    const lines: string[] = [];
    const ended = new Promise<void>((resolve) => {
      onLines(stream, (line) => lines.push(line), resolve);
    });

    stream.write('{"a":');
    stream.write('1}\r\n{"b":2}\n');
    stream.end('tail');
    await ended;

    expect(lines).toEqual(['{"a":1}', '{"b":2}', 'tail']);
  });

  test('reports a read error and ends once without the partial line', async () => {
    const stream = new PassThrough();
    const lines: string[] = [];
    const errors: string[] = [];
    let ends = 0;
    onLines(
      stream,
      (line) => lines.push(line),
      () => {
        ends++;
      },
      (error) => errors.push(error.message),
    );

    stream.write('done\npartial');
    await vi.waitFor(() => {
      expect(lines).toEqual(['done']);
    });
    stream.destroy(new Error('EIO'));
    await vi.waitFor(() => {
      expect(errors).toEqual(['EIO']);
    });
    expect(ends).toBe(1);
    expect(lines).toEqual(['done']);
  });
});

describe('pipeLines', () => {
  test('feeds non-blank lines through a small channel without losing any', async () => {
    const stream = new PassThrough();
    const channel = new Channel<string>(2);
    pipeLines(stream, channel);

    stream.end('a\nb\n\n   \nc\r\nd\ne\nf');

    const received: string[] = [];
    for await (const line of channel) {
      received.push(line);
    }
    expect(received).toEqual(['a', 'b', 'c', 'd', 'e', 'f']);
  });

  test('closes the channel when the stream fails', async () => {
    const stream = new PassThrough();
    const channel = new Channel<string>(4);
    const errors: string[] = [];
    pipeLines(stream, channel, (error) => errors.push(error.message));

    stream.write('first\n');
    expect(await channel.receive()).toEqual({ done: false, value: 'first' });
    stream.destroy(new Error('EIO'));
    expect(await channel.receive()).toEqual({ done: true });
    expect(errors).toEqual(['EIO']);
  });

  test('the returned function closes the channel for streams that never end', async () => {
    const stream = new PassThrough();
    const channel = new Channel<string>(4);
    const end = pipeLines(stream, channel);

    stream.write('only\n');
    expect(await channel.receive()).toEqual({ done: false, value: 'only' });
    end();
    expect(await channel.receive()).toEqual({ done: true });
  });
});

describe('settleWithin', () => {
  test('reports whether the task settled in time', async () => {
    expect(await settleWithin(null, 10)).toBe(true);
    expect(await settleWithin(Promise.resolve('done'), 10)).toBe(true);
    expect(await settleWithin(Promise.reject(new Error('failed')), 10)).toBe(true);
    expect(await settleWithin(new Promise(() => undefined), 20)).toBe(false);
  });
});
