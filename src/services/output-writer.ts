/**
 * Sole writer of the editor-facing stream.
 *
 * Every producer goes through `enqueue`; one drain loop turns envelopes into
 * lines, so two sessions can never interleave bytes inside a line.
 */

import type { Writable } from 'node:stream';

import { OUTPUT_QUEUE_CAPACITY } from '@/config/constants.js';
import type { JsonRpcEnvelope } from '@/types/json-rpc.js';
import { serializeEnvelope } from '@/services/wire-codec.js';
import { Channel } from '@/utils/channel.js';
import { errorMessage } from '@/utils/error-handler.js';
import { createLogger, type Logger } from '@/utils/logger.js';

function writeLine(stream: Writable, line: string): Promise<void> {
  return new Promise((resolve, reject) => {
    stream.write(line, 'utf8', (error) => {
      if (error) {
        reject(error);
      } else {
        resolve();
      }
    });
  });
}

export class OutputWriter {
  private readonly queue: Channel<JsonRpcEnvelope>;
  private readonly log: Logger;
  private written = 0;

  constructor(
    private readonly stream: Writable,
    capacity: number = OUTPUT_QUEUE_CAPACITY,
    log: Logger = createLogger('output'),
  ) {
    this.queue = new Channel(capacity);
    this.log = log;
  }

  get linesWritten(): number {
    return this.written;
  }

  get isCompleted(): boolean {
    return this.queue.isClosed;
  }

  /**
   * Queue one envelope. Waits while the queue is full; false after complete().
   */
  async enqueue(envelope: JsonRpcEnvelope): Promise<boolean> {
    const accepted = await this.queue.send(envelope);
    if (!accepted) {
      this.log.warn(`Output writer completed; dropping ${envelope.method ?? 'response'} message`);
    }
    return accepted;
  }

  /**
   * Drain until complete() has been called and the queue is empty, or until
   * `signal` aborts. A failed write ends the loop with that error.
   */
  async run(signal?: AbortSignal): Promise<void> {
    for (;;) {
      const next = await this.queue.receive(signal);
      if (next.done) {
        return;
      }
      const line = `${serializeEnvelope(next.value)}\n`;
      try {
        await writeLine(this.stream, line);
      } catch (error) {
        this.log.error(`Failed to write to output stream: ${errorMessage(error)}`);
        this.queue.close();
        throw error;
      }
      this.written++;
    }
  }

  complete(): void {
    this.queue.close();
  }
}
