/**
 * One editor-visible session backed by one agent process
 */

import type { JsonRpcEnvelope, JsonRpcId } from '@/types/json-rpc.js';
import type { AgentExit, AgentTransport, TransportHost } from '@/services/agent-spawner.js';
import { PendingRequestRegistry } from '@/services/pending-requests.js';
import { idKey, serializeEnvelope } from '@/services/wire-codec.js';
import type { Channel } from '@/utils/channel.js';
import { ProxyError, ValidationError } from '@/utils/error-handler.js';
import { createLogger } from '@/utils/logger.js';
import { Mutex } from '@/utils/mutex.js';
import { generateULID } from '@/utils/ulid.js';

const log = createLogger('session');

// idKey alone gives "1" and 1 the same key
function requestKey(id: JsonRpcId): string {
  return `${id.kind}:${idKey(id)}`;
}

export class AcpSession implements TransportHost {
  readonly proxySessionId: string;
  readonly workspace: string;

  /** Agent output pump; set by the router once the agent is running */
  readerTask: Promise<void> | null = null;

  private agentId: string | null = null;
  private transport: AgentTransport | null = null;
  private disposed = false;
  private readonly controller = new AbortController();
  private readonly writeLock = new Mutex();
  private readonly pending: PendingRequestRegistry;
  /** Editor requests forwarded to the agent and not yet answered */
  private readonly editorRequests = new Map<string, JsonRpcId>();

  constructor(workspace: string, proxySessionId: string = generateULID()) {
    this.workspace = workspace;
    this.proxySessionId = proxySessionId;
    this.pending = new PendingRequestRegistry(this.controller.signal);
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get agentSessionId(): string | null {
    return this.agentId;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get hasTransport(): boolean {
    return this.transport !== null;
  }

  get pendingCount(): number {
    return this.pending.size;
  }

  /**
   * Record the id the agent issued for this session. Set once, after the handshake.
   */
  assignAgentSessionId(agentSessionId: string): void {
    if (agentSessionId.length === 0) {
      throw new ValidationError('Agent session id must not be empty');
    }
    if (this.agentId !== null) {
      throw new ProxyError(
        `Session ${this.proxySessionId} already has agent session id ${this.agentId}`,
        'E_AGENT_SESSION_ASSIGNED',
      );
    }
    this.agentId = agentSessionId;
  }

  attachTransport(transport: AgentTransport): void {
    if (this.transport) {
      throw new ProxyError(`Session ${this.proxySessionId} already has a transport`, 'E_TRANSPORT_ATTACHED');
    }
    this.transport = transport;
    if (this.disposed) {
      transport.input.close();
      transport.terminate();
    }
  }

  get agentOutput(): Channel<string> {
    return this.requireTransport().output;
  }

  get agentExecution(): Promise<AgentExit> {
    return this.requireTransport().execution;
  }

  /**
   * Send one envelope to the agent. False when it was dropped because the
   * agent's input is closed or was never attached.
   */
  async writeToAgent(envelope: JsonRpcEnvelope): Promise<boolean> {
    const transport = this.transport;
    if (!transport) {
      log.debug(`[${this.proxySessionId}] no transport; dropping ${envelope.method ?? 'response'}`);
      return false;
    }
    const line = serializeEnvelope(envelope);
    return this.writeLock.withLock(async () => {
      if (transport.input.isClosed) {
        return false;
      }
      return transport.input.send(line);
    });
  }

  trackEditorRequest(id: JsonRpcId): void {
    this.editorRequests.set(requestKey(id), id);
  }

  /** Called when the agent's response to an editor request passes through */
  settleEditorRequest(id: JsonRpcId): boolean {
    return this.editorRequests.delete(requestKey(id));
  }

  /**
   * Editor requests the agent never answered. Each id is returned once.
   */
  takeUnansweredRequests(): JsonRpcId[] {
    const ids = [...this.editorRequests.values()];
    this.editorRequests.clear();
    return ids;
  }

  /**
   * Send a request and wait for its response. Null when the agent stops,
   * the timeout elapses or the session is cancelled first.
   */
  sendAndWaitForResponse(
    request: JsonRpcEnvelope,
    requestId: JsonRpcId,
    timeoutMs: number,
  ): Promise<JsonRpcEnvelope | null> {
    return this.pending.sendAndWait(
      request,
      requestId,
      timeoutMs,
      async (envelope) => {
        await this.writeToAgent(envelope);
      },
      this.agentGone(),
    );
  }

  tryCompleteResponse(requestId: JsonRpcId, response: JsonRpcEnvelope): boolean {
    return this.pending.complete(requestId, response);
  }

  isAwaiting(requestId: JsonRpcId): boolean {
    return this.pending.has(requestId);
  }

  /**
   * Abort the session's work and close the agent's input. Idempotent.
   */
  cancel(): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort();
    }
    this.transport?.input.close();
  }

  dispose(): void {
    if (this.disposed) {
      return;
    }
    this.disposed = true;
    this.pending.cancelAll();
    this.cancel();
    this.transport?.terminate();
    log.debug(`[${this.proxySessionId}] disposed`);
  }

  // No response can arrive once the pump has consumed the last agent line.
  // Before the pump exists, process exit is the best signal available.
  private agentGone(): Promise<unknown> {
    return this.readerTask ?? this.requireTransport().execution;
  }

  private requireTransport(): AgentTransport {
    if (!this.transport) {
      throw new ProxyError(`Session ${this.proxySessionId} has no agent transport`, 'E_NO_TRANSPORT');
    }
    return this.transport;
  }
}
