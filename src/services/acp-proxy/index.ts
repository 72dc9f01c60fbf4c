/**
 * ACP multiplexing proxy
 *
 * Reads the editor's NDJSON stream, gives every session/new its own agent
 * process, and merges all agent output back into one editor stream.
 */

import type { Readable } from 'node:stream';

import { CONTAINER_WORKSPACE_ROOT, OUTPUT_QUEUE_CAPACITY } from '@/config/constants.js';
import { DEFAULT_CONFIG } from '@/config/defaults.js';
import type { AcpSession } from '@/services/acp-session.js';
import { OutputWriter } from '@/services/output-writer.js';
import { isResponse, parseEnvelope } from '@/services/wire-codec.js';
import type { JsonRpcEnvelope } from '@/types/json-rpc.js';
import { Channel } from '@/utils/channel.js';
import { errorMessage } from '@/utils/error-handler.js';
import { pipeLines } from '@/utils/line-reader.js';
import { createLogger, type Logger } from '@/utils/logger.js';
import { createAgentOutputPump } from './agent-output-pump.js';
import { createSessionRouting, type SessionRouting } from './session-routing.js';
import type { AcpProxyOptions, ProxyState, ResolvedProxySettings } from './types.js';

// Editor lines buffered ahead of dispatch
const INPUT_LINE_CAPACITY = 256;

export class AcpProxy {
  private readonly controller = new AbortController();
  private readonly writer: OutputWriter;
  private readonly routing: SessionRouting;
  private readonly log: Logger;
  private readonly state: ProxyState = {
    sessions: new Map(),
    initializeSnapshot: null,
    inflight: new Set(),
    agentRequests: new Map(),
    agentRequestSeq: 0,
  };

  constructor(options: AcpProxyOptions) {
    this.log = options.logger ?? createLogger('proxy');
    this.writer = new OutputWriter(options.output, options.outputCapacity ?? OUTPUT_QUEUE_CAPACITY, this.log);

    const settings: ResolvedProxySettings = {
      agent: options.agent,
      containerWorkspace: options.containerWorkspace ?? CONTAINER_WORKSPACE_ROOT,
      timeouts: { ...DEFAULT_CONFIG.timeouts, ...options.timeouts },
      server: { ...DEFAULT_CONFIG.server, ...options.server },
      cwd: options.cwd ?? (() => process.cwd()),
    };

    const enqueue = (envelope: JsonRpcEnvelope): Promise<boolean> => this.writer.enqueue(envelope);
    const pump = createAgentOutputPump({ state: this.state, enqueue, log: this.log });
    this.routing = createSessionRouting({
      state: this.state,
      settings,
      spawner: options.spawner,
      workspaceResolver: options.workspaceResolver,
      pump,
      enqueue,
      signal: this.controller.signal,
      log: this.log,
    });
  }

  get sessionCount(): number {
    return this.state.sessions.size;
  }

  getSession(proxySessionId: string): AcpSession | undefined {
    return this.state.sessions.get(proxySessionId);
  }

  /**
   * Stop reading the editor stream and shut down
   */
  cancel(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
  }

  /**
   * Serve until the editor closes `input` or cancel() is called.
   * Resolves with the process exit code.
   */
  async run(input: Readable): Promise<number> {
    // Settles with the write error (or null); never rejects
    const writerTask = this.writer.run().then(
      () => null,
      (error: unknown) => error,
    );
    const lines = new Channel<string>(INPUT_LINE_CAPACITY);
    const failure: { error: Error | null } = { error: null };

    input.once('error', (error) => {
      failure.error = error;
      lines.close();
    });
    const endInput = pipeLines(input, lines);
    input.once('close', endInput);

    let exitCode = 0;
    try {
      for (;;) {
        const next = await lines.receive(this.controller.signal);
        if (next.done) {
          break;
        }
        await this.handleLine(next.value);
      }
      await this.shutdown();
    } catch (error) {
      this.log.error(`Fatal error: ${errorMessage(error)}`);
      exitCode = 1;
    } finally {
      this.cancel();
      this.writer.complete();
      const writeError = await writerTask;
      if (writeError !== null) {
        this.log.error(`Output stream failed: ${errorMessage(writeError)}`);
        exitCode = 1;
      }
    }

    if (failure.error) {
      this.log.error(`Input stream failed: ${failure.error.message}`);
      exitCode = 1;
    }
    return exitCode;
  }

  /**
   * Dispatch one editor line. A bad line is logged and skipped.
   */
  async handleLine(line: string): Promise<void> {
    if (line.trim().length === 0) {
      return;
    }

    const parsed = parseEnvelope(line);
    if (!parsed.ok) {
      this.log.warn(`Ignoring editor message: ${parsed.error.message}`);
      return;
    }

    const message = parsed.value;
    try {
      switch (message.method) {
        case undefined:
          if (isResponse(message)) {
            await this.routing.routeEditorResponse(message);
          } else {
            this.log.warn('Ignoring editor message with neither method nor result');
          }
          return;
        case 'initialize':
          await this.routing.handleInitialize(message);
          return;
        case 'session/new':
          this.track(this.routing.handleSessionNew(message));
          return;
        case 'session/end':
          await this.routing.handleSessionEnd(message);
          return;
        default:
          await this.routing.routeToSession(message);
      }
    } catch (error) {
      this.log.error(`Error processing ${message.method ?? 'response'}: ${errorMessage(error)}`);
    }
  }

  /**
   * Wait for in-flight session/new handlers to finish. Mainly for tests and shutdown.
   */
  async idle(): Promise<void> {
    while (this.state.inflight.size > 0) {
      await Promise.all([...this.state.inflight]);
    }
  }

  // session/new runs alongside later lines: the editor cannot address the
  // new session until it has the reply
  private track(task: Promise<void>): void {
    const tracked = task.catch((error: unknown) => {
      this.log.error(`session/new handler failed: ${errorMessage(error)}`);
    });
    this.state.inflight.add(tracked);
    void tracked.finally(() => this.state.inflight.delete(tracked));
  }

  // After cancel() the handshakes still running fail fast and answer with an
  // error; at end of input they are allowed to finish first
  private async shutdown(): Promise<void> {
    await this.idle();
    await this.routing.endAllSessions();
  }
}

export type { AcpProxyOptions, WorkspaceLookup } from './types.js';
