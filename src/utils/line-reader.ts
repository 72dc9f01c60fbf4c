import type { Readable } from 'node:stream';

import type { Channel } from '@/utils/channel.js';

export type StreamErrorHandler = (error: Error) => void;

/**
 * Split a text stream into lines, one callback per complete line.
 * A trailing line without a newline is delivered at end of stream.
 *
 * A read error ends the stream too: `onError` sees the error, the partial
 * line is discarded and `onEnd` runs. `onEnd` runs at most once.
 */
export function onLines(
  stream: Readable,
  handler: (line: string) => void,
  onEnd: () => void,
  onError?: StreamErrorHandler,
): void {
  stream.setEncoding('utf8');
  let buffer = '';
  let finished = false;
  const finish = (): void => {
    if (finished) {
      return;
    }
    finished = true;
    onEnd();
  };

  stream.on('data', (chunk: string) => {
    buffer += chunk;
    let newlineIndex = buffer.indexOf('\n');
    while (newlineIndex >= 0) {
      const line = buffer.slice(0, newlineIndex).replace(/\r$/, '');
      buffer = buffer.slice(newlineIndex + 1);
      handler(line);
      newlineIndex = buffer.indexOf('\n');
    }
  });
  stream.once('end', () => {
    if (finished) {
      return;
    }
    const remaining = buffer.replace(/\r$/, '');
    buffer = '';
    if (remaining.length > 0) {
      handler(remaining);
    }
    finish();
  });
  stream.on('error', (error: Error) => {
    buffer = '';
    onError?.(error);
    finish();
  });
}

/**
 * Feed the non-blank lines of `stream` into `channel`, pausing the stream
 * while the channel is full. The channel is closed after the last line.
 *
 * Returns a function that marks the stream finished early (for streams that
 * are destroyed without emitting 'end'). A read error finishes it as well.
 */
export function pipeLines(stream: Readable, channel: Channel<string>, onError?: StreamErrorHandler): () => void {
  const backlog: string[] = [];
  let draining = false;
  let ended = false;

  const finish = (): void => {
    if (ended && !draining && backlog.length === 0) {
      channel.close();
    }
  };

  const drain = async (): Promise<void> => {
    draining = true;
    stream.pause();
    for (let line = backlog.shift(); line !== undefined; line = backlog.shift()) {
      if (!(await channel.send(line))) {
        backlog.length = 0;
      }
    }
    draining = false;
    if (!ended) {
      stream.resume();
    }
    finish();
  };

  const push = (line: string): void => {
    if (line.trim().length === 0) {
      return;
    }
    if (!draining && channel.trySend(line)) {
      return;
    }
    if (channel.isClosed) {
      return;
    }
    backlog.push(line);
    if (!draining) {
      void drain();
    }
  };

  const end = (): void => {
    if (ended) {
      return;
    }
    ended = true;
    finish();
  };

  onLines(stream, push, end, onError);
  return end;
}
