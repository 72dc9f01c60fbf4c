/**
 * Correlates requests the proxy sends to an agent with the agent's responses.
 */

import type { JsonRpcEnvelope, JsonRpcId } from '@/types/json-rpc.js';
import { idKey } from '@/services/wire-codec.js';
import { ProxyError } from '@/utils/error-handler.js';
import { createLogger } from '@/utils/logger.js';

const log = createLogger('pending');

export type SendFn = (request: JsonRpcEnvelope) => Promise<void>;

interface Waiter {
  settle: (response: JsonRpcEnvelope | null) => void;
}

export class PendingRequestRegistry {
  private readonly pending = new Map<string, Waiter>();

  constructor(private readonly signal: AbortSignal) {}

  get size(): number {
    return this.pending.size;
  }

  has(id: JsonRpcId): boolean {
    return this.pending.has(idKey(id));
  }

  /**
   * Send `request` and wait for the response carrying `id`.
   *
   * The slot is registered before sending, so a response that arrives before
   * the caller awaits is still delivered. Resolves null when the agent exits,
   * the timeout elapses or the session is cancelled first.
   */
  async sendAndWait(
    request: JsonRpcEnvelope,
    id: JsonRpcId,
    timeoutMs: number,
    send: SendFn,
    agentExecution: Promise<unknown>,
  ): Promise<JsonRpcEnvelope | null> {
    const key = idKey(id);
    if (this.pending.has(key)) {
      throw new ProxyError(`Request id already pending: ${key}`, 'E_DUPLICATE_REQUEST_ID');
    }

    const waiter: Waiter = { settle: () => undefined };
    const slot = new Promise<JsonRpcEnvelope | null>((resolve) => {
      waiter.settle = resolve;
    });
    this.pending.set(key, waiter);

    const deregister = (): void => {
      if (this.pending.get(key) === waiter) {
        this.pending.delete(key);
      }
    };

    try {
      await send(request);
    } catch (error) {
      deregister();
      throw error;
    }

    let timer: NodeJS.Timeout | undefined;
    const onAbort = (): void => waiter.settle(null);
    const interrupted = new Promise<null>((resolve) => {
      timer = setTimeout(() => resolve(null), timeoutMs);
      agentExecution.then(
        () => resolve(null),
        () => resolve(null),
      );
    });

    if (this.signal.aborted) {
      waiter.settle(null);
    } else {
      this.signal.addEventListener('abort', onAbort, { once: true });
    }

    try {
      return await Promise.race([slot, interrupted]);
    } finally {
      clearTimeout(timer);
      this.signal.removeEventListener('abort', onAbort);
      deregister();
    }
  }

  /**
   * Deliver a response to its waiter. False when nobody is waiting for `id`.
   */
  complete(id: JsonRpcId, response: JsonRpcEnvelope): boolean {
    const key = idKey(id);
    const waiter = this.pending.get(key);
    if (!waiter) {
      log.debug(`No pending request for response id ${key}`);
      return false;
    }
    this.pending.delete(key);
    waiter.settle(response);
    return true;
  }

  /**
   * Resolve every outstanding request with null
   */
  cancelAll(): void {
    const waiters = [...this.pending.values()];
    this.pending.clear();
    for (const waiter of waiters) {
      waiter.settle(null);
    }
  }
}
