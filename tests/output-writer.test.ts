import { PassThrough, Writable } from 'node:stream';

import { describe, expect, test, vi } from 'vitest';

import { OutputWriter } from '../src/services/output-writer.js';
import { isJsonObject } from '../src/services/payload.js';
import { createNotification, createResultResponse, numericId, parseEnvelope } from '../src/services/wire-codec.js';
import type { Logger } from '../src/utils/logger.js';

function recordingLogger(): Logger & { warnings: string[]; errors: string[] } {
  const warnings: string[] = [];
  const errors: string[] = [];
  return {
    warnings,
    errors,
    debug: () => undefined,
    info: () => undefined,
    warn: (message) => warnings.push(message),
    error: (message) => errors.push(message),
  };
}

function collect(stream: PassThrough): () => string {
  let text = '';
  stream.setEncoding('utf8');
  stream.on('data', (chunk: string) => {
    text += chunk;
  });
  return () => text;
}

describe('OutputWriter', () => {
  test('writes one line per envelope', async () => {
    const stream = new PassThrough();
    const output = collect(stream);
    const writer = new OutputWriter(stream, 8, recordingLogger());
    const running = writer.run();

    await writer.enqueue(createResultResponse(numericId(1), { ok: true }));
    await writer.enqueue(createNotification('session/update', { sessionId: 's' }));
    writer.complete();
    await running;

    await vi.waitFor(() => {
      expect(output()).toBe(
        '{"jsonrpc":"2.0","id":1,"result":{"ok":true}}\n' +
          '{"jsonrpc":"2.0","method":"session/update","params":{"sessionId":"s"}}\n',
      );
    });
    expect(writer.linesWritten).toBe(2);
  });

  test('never interleaves lines from concurrent producers', async () => {
    const stream = new PassThrough();
    const output = collect(stream);
    const writer = new OutputWriter(stream, 4, recordingLogger());
    const running = writer.run();

    const produce = async (sessionId: string): Promise<void> => {
      for (let seq = 0; seq < 50; seq++) {
        await writer.enqueue(createNotification('session/update', { sessionId, seq, text: 'x'.repeat(200) }));
      }
    };
    await Promise.all([produce('alpha'), produce('beta')]);
    writer.complete();
    await running;

    await vi.waitFor(() => {
      expect(output().split('\n')).toHaveLength(101);
    });
    const lines = output().trimEnd().split('\n');

    const seqBySession = new Map<string, number[]>();
    for (const line of lines) {
      const parsed = parseEnvelope(line);
      expect(parsed.ok).toBe(true);
      if (!parsed.ok) continue;
      const params = parsed.value.params;
      if (!isJsonObject(params)) continue;
      const { sessionId, seq } = params;
      if (typeof sessionId !== 'string' || typeof seq !== 'number') continue;
      seqBySession.set(sessionId, [...(seqBySession.get(sessionId) ?? []), seq]);
    }

    const expected = Array.from({ length: 50 }, (_, i) => i);
    expect(seqBySession.get('alpha')).toEqual(expected);
    expect(seqBySession.get('beta')).toEqual(expected);
  });

  test('drops envelopes after completion', async () => {
    const logger = recordingLogger();
    const writer = new OutputWriter(new PassThrough(), 2, logger);
    writer.complete();

    expect(writer.isCompleted).toBe(true);
    expect(await writer.enqueue(createNotification('late'))).toBe(false);
    expect(logger.warnings).toEqual(['Output writer completed; dropping late message']);
  });

  test('stops with the write error', async () => {
    const broken = new Writable({
      write(_chunk, _encoding, callback) {
        callback(new Error('EPIPE'));
      },
    });
    broken.on('error', () => undefined);
    const logger = recordingLogger();
    const writer = new OutputWriter(broken, 2, logger);
    const failed = expect(writer.run()).rejects.toThrow('EPIPE');

    await writer.enqueue(createNotification('first'));
    await failed;
    expect(logger.errors).toEqual(['Failed to write to output stream: EPIPE']);
    expect(await writer.enqueue(createNotification('second'))).toBe(false);
  });

  test('run returns when its signal aborts', async () => {
    const writer = new OutputWriter(new PassThrough(), 2, recordingLogger());
    const controller = new AbortController();
    const running = writer.run(controller.signal);
    controller.abort();
    await running;
    expect(writer.linesWritten).toBe(0);
  });
});
