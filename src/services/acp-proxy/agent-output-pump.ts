/**
 * Per-session loop moving agent output to the editor
 *
 * Responses the session is waiting for (handshake) stop here. Everything else
 * is forwarded with the agent's session id replaced by the proxy's, and
 * agent-originated requests are renumbered into the proxy's id space.
 */

import type { AcpSession } from '@/services/acp-session.js';
import { isJsonObject } from '@/services/payload.js';
import { createErrorResponse, isRequest, isResponse, parseEnvelope, stringId } from '@/services/wire-codec.js';
import { JsonRpcErrorCodes, type JsonRpcEnvelope } from '@/types/json-rpc.js';
import { errorMessage } from '@/utils/error-handler.js';
import type { Logger } from '@/utils/logger.js';
import type { Enqueue, ProxyState } from './types.js';

export interface AgentOutputPumpDependencies {
  state: ProxyState;
  enqueue: Enqueue;
  log: Logger;
}

export interface AgentOutputPump {
  run(session: AcpSession): Promise<void>;
}

/**
 * Drop proxied agent requests belonging to a session that is gone
 */
export function forgetAgentRequests(state: ProxyState, proxySessionId: string): void {
  for (const [key, request] of state.agentRequests) {
    if (request.proxySessionId === proxySessionId) {
      state.agentRequests.delete(key);
    }
  }
}

/**
 * Answer with an error every editor request the session's agent never answered
 */
export async function failUnansweredRequests(session: AcpSession, enqueue: Enqueue, reason: string): Promise<void> {
  for (const id of session.takeUnansweredRequests()) {
    await enqueue(createErrorResponse(id, JsonRpcErrorCodes.InternalError, reason));
  }
}

function rewriteSessionId(envelope: JsonRpcEnvelope, session: AcpSession): JsonRpcEnvelope {
  const agentSessionId = session.agentSessionId;
  const params = envelope.params;
  if (agentSessionId === null || !isJsonObject(params) || params.sessionId !== agentSessionId) {
    return envelope;
  }
  return { ...envelope, params: { ...params, sessionId: session.proxySessionId } };
}

export function createAgentOutputPump(deps: AgentOutputPumpDependencies): AgentOutputPump {
  const { state, enqueue, log } = deps;

  const renumberRequest = (envelope: JsonRpcEnvelope, session: AcpSession): JsonRpcEnvelope => {
    if (!isRequest(envelope) || envelope.id === undefined) {
      return envelope;
    }
    state.agentRequestSeq += 1;
    const proxyId = `${session.proxySessionId}:${state.agentRequestSeq}`;
    state.agentRequests.set(proxyId, {
      proxySessionId: session.proxySessionId,
      originalId: envelope.id,
    });
    return { ...envelope, id: stringId(proxyId) };
  };

  const handleLine = async (session: AcpSession, line: string): Promise<void> => {
    const parsed = parseEnvelope(line);
    if (!parsed.ok) {
      log.warn(`[${session.proxySessionId}] skipping malformed agent output: ${parsed.error.message}`);
      return;
    }

    const envelope = parsed.value;
    if (isResponse(envelope) && envelope.id !== undefined) {
      if (session.tryCompleteResponse(envelope.id, envelope)) {
        return;
      }
      session.settleEditorRequest(envelope.id);
    }

    const forwarded = renumberRequest(rewriteSessionId(envelope, session), session);
    await enqueue(forwarded);
  };

  const run = async (session: AcpSession): Promise<void> => {
    const output = session.agentOutput;
    try {
      for (;;) {
        const next = await output.receive(session.signal);
        if (next.done) {
          break;
        }
        await handleLine(session, next.value);
      }
    } catch (error) {
      log.error(`[${session.proxySessionId}] agent reader error: ${errorMessage(error)}`);
    } finally {
      // Output ended without a cancel: the agent went away on its own
      const agentGone = !session.signal.aborted;
      if (agentGone && state.sessions.get(session.proxySessionId) === session) {
        log.info(`[${session.proxySessionId}] agent exited; removing session`);
        state.sessions.delete(session.proxySessionId);
        forgetAgentRequests(state, session.proxySessionId);
        session.dispose();
      }
      if (agentGone) {
        await failUnansweredRequests(session, enqueue, 'Agent exited before responding');
      }
    }
  };

  return { run };
}
