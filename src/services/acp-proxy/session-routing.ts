/**
 * Editor request handling: initialize, the session/new handshake,
 * session/end, and routing of session-scoped traffic to agents.
 */

import { INIT_REQUEST_PREFIX, SESSION_NEW_REQUEST_PREFIX } from '@/config/constants.js';
import { AcpSession } from '@/services/acp-session.js';
import type { AgentSpawner } from '@/services/agent-spawner.js';
import { PathTranslator } from '@/services/path-translator.js';
import { isJsonObject, readOptionalString } from '@/services/payload.js';
import {
  createErrorResponse,
  createNotification,
  createRequest,
  createResultResponse,
  idKey,
  stringId,
} from '@/services/wire-codec.js';
import {
  JsonRpcErrorCodes,
  type JsonObject,
  type JsonRpcEnvelope,
  type JsonValue,
} from '@/types/json-rpc.js';
import {
  errorMessage,
  HandshakeError,
  ProxyError,
  SessionCreationError,
  SessionNotFoundError,
  toJsonRpcError,
  ValidationError,
} from '@/utils/error-handler.js';
import type { Logger } from '@/utils/logger.js';
import { settleWithin } from '@/utils/timeout.js';
import { failUnansweredRequests, forgetAgentRequests, type AgentOutputPump } from './agent-output-pump.js';
import type { Enqueue, ProxyState, ResolvedProxySettings, WorkspaceLookup } from './types.js';

export interface SessionRoutingDependencies {
  state: ProxyState;
  settings: ResolvedProxySettings;
  spawner: AgentSpawner;
  workspaceResolver: WorkspaceLookup;
  pump: AgentOutputPump;
  enqueue: Enqueue;
  /** Process-wide shutdown signal */
  signal: AbortSignal;
  log: Logger;
}

export interface SessionRouting {
  handleInitialize(message: JsonRpcEnvelope): Promise<void>;
  handleSessionNew(message: JsonRpcEnvelope): Promise<void>;
  handleSessionEnd(message: JsonRpcEnvelope): Promise<void>;
  routeToSession(message: JsonRpcEnvelope): Promise<void>;
  routeEditorResponse(message: JsonRpcEnvelope): Promise<void>;
  endAllSessions(): Promise<void>;
}

/**
 * Frozen deep copy. LosslessNumbers are immutable and shared.
 */
function frozenCopy(value: JsonValue): JsonValue {
  if (Array.isArray(value)) {
    const copy = value.map(frozenCopy);
    Object.freeze(copy);
    return copy;
  }
  return isJsonObject(value) ? frozenObject(value) : value;
}

function frozenObject(value: JsonObject): JsonObject {
  const copy: JsonObject = {};
  for (const [key, child] of Object.entries(value)) {
    copy[key] = frozenCopy(child);
  }
  Object.freeze(copy);
  return copy;
}

function paramsObject(message: JsonRpcEnvelope): JsonObject {
  return isJsonObject(message.params) ? message.params : {};
}

export function createSessionRouting(deps: SessionRoutingDependencies): SessionRouting {
  const { state, settings, spawner, workspaceResolver, pump, enqueue, signal, log } = deps;

  const replyError = async (message: JsonRpcEnvelope, error: unknown): Promise<void> => {
    if (message.id === undefined) {
      return;
    }
    const { code, message: text, data } = toJsonRpcError(error);
    await enqueue(createErrorResponse(message.id, code, text, data));
  };

  const endSession = async (session: AcpSession, waitMs: number): Promise<void> => {
    state.sessions.delete(session.proxySessionId);
    try {
      const agentSessionId = session.agentSessionId;
      if (agentSessionId !== null) {
        // A notification: the proxy answers the editor itself
        await session.writeToAgent(createNotification('session/end', { sessionId: agentSessionId }));
      }
      const settled = await settleWithin(session.readerTask, waitMs);
      if (!settled) {
        log.warn(`[${session.proxySessionId}] agent did not finish within ${waitMs} ms`);
      }
    } finally {
      session.dispose();
      forgetAgentRequests(state, session.proxySessionId);
      await failUnansweredRequests(session, enqueue, 'Session ended before the agent responded');
    }
  };

  const handleInitialize = async (message: JsonRpcEnvelope): Promise<void> => {
    const params = isJsonObject(message.params) ? message.params : null;
    state.initializeSnapshot = params ? frozenObject(params) : null;

    const requested = readOptionalString(params ?? undefined, 'protocolVersion');
    const protocolVersion =
      requested.ok && requested.value !== undefined ? requested.value : settings.server.defaultProtocolVersion;

    if (message.id === undefined) {
      return;
    }
    await enqueue(
      createResultResponse(message.id, {
        protocolVersion,
        capabilities: { multiSession: true },
        serverInfo: { name: settings.server.name, version: settings.server.version },
      }),
    );
  };

  const handshake = async (session: AcpSession, method: string, params: JsonObject, prefix: string): Promise<JsonValue> => {
    const requestId = stringId(`${prefix}${session.proxySessionId}`);
    const response = await session.sendAndWaitForResponse(
      createRequest(requestId, method, params),
      requestId,
      settings.timeouts.handshakeMs,
    );
    if (!response) {
      throw new HandshakeError(`Agent did not respond to ${method}`, true);
    }
    if (response.error) {
      throw new HandshakeError(`Agent ${method} failed: ${response.error.message}`);
    }
    return response.result ?? null;
  };

  const handleSessionNew = async (message: JsonRpcEnvelope): Promise<void> => {
    // Captured now so a later initialize cannot change this handshake
    const snapshot = state.initializeSnapshot;
    const params = paramsObject(message);
    let session: AcpSession | null = null;
    let detachAbort = (): void => undefined;

    try {
      const cwdParam = readOptionalString(params, 'cwd');
      if (!cwdParam.ok) {
        throw new ValidationError(cwdParam.error.message);
      }
      const cwd = cwdParam.value ?? settings.cwd();
      const workspace = await workspaceResolver.resolve(cwd);

      const created = new AcpSession(workspace);
      session = created;
      if (signal.aborted) {
        throw new ProxyError('Proxy is shutting down', 'E_SHUTTING_DOWN');
      }
      const onShutdown = (): void => created.cancel();
      signal.addEventListener('abort', onShutdown, { once: true });
      detachAbort = () => signal.removeEventListener('abort', onShutdown);

      log.info(`[${created.proxySessionId}] starting ${settings.agent} for ${workspace}`);
      await spawner.spawnAgent(created, settings.agent, created.signal);
      created.readerTask = pump.run(created);

      const requestedVersion = readOptionalString(snapshot ?? undefined, 'protocolVersion');
      const protocolVersion =
        requestedVersion.ok && requestedVersion.value !== undefined
          ? requestedVersion.value
          : settings.server.defaultProtocolVersion;
      await handshake(created, 'initialize', { ...(snapshot ?? {}), protocolVersion }, INIT_REQUEST_PREFIX);

      const translator = new PathTranslator(workspace, settings.containerWorkspace);
      const agentParams: JsonObject = {};
      for (const [key, value] of Object.entries(params)) {
        if (key !== 'cwd' && key !== 'mcpServers') {
          agentParams[key] = value;
        }
      }
      agentParams.cwd = translator.toContainer(cwd);
      const mcpServers = params.mcpServers;
      if (mcpServers !== undefined) {
        agentParams.mcpServers = translator.translateMcpServers(mcpServers);
      }

      const result = await handshake(created, 'session/new', agentParams, SESSION_NEW_REQUEST_PREFIX);
      const agentSessionId = readOptionalString(result, 'sessionId');
      if (!agentSessionId.ok || !agentSessionId.value) {
        throw new HandshakeError('Agent returned no session id');
      }
      created.assignAgentSessionId(agentSessionId.value);

      if (created.signal.aborted) {
        throw new ProxyError('Session cancelled during setup', 'E_SESSION_CANCELLED');
      }
      state.sessions.set(created.proxySessionId, created);
      log.info(`[${created.proxySessionId}] ready (agent session ${agentSessionId.value})`);

      if (message.id !== undefined) {
        const reply: JsonObject = {};
        if (isJsonObject(result)) {
          for (const [key, value] of Object.entries(result)) {
            if (key !== 'sessionId') {
              reply[key] = value;
            }
          }
        }
        reply.sessionId = created.proxySessionId;
        await enqueue(createResultResponse(message.id, reply));
      }
    } catch (error) {
      session?.dispose();
      log.error(`session/new failed: ${errorMessage(error)}`);
      await replyError(message, new SessionCreationError(errorMessage(error)));
    } finally {
      detachAbort();
    }
  };

  const handleSessionEnd = async (message: JsonRpcEnvelope): Promise<void> => {
    const sessionId = readOptionalString(message.params, 'sessionId');
    const id = sessionId.ok ? sessionId.value : undefined;
    const session = id !== undefined ? state.sessions.get(id) : undefined;
    if (!session) {
      log.warn(`session/end for unknown session ${id ?? '(none)'}`);
      await replyError(message, new SessionNotFoundError(id ?? ''));
      return;
    }

    await endSession(session, settings.timeouts.sessionEndMs);
    log.info(`[${session.proxySessionId}] ended`);
    if (message.id !== undefined) {
      await enqueue(createResultResponse(message.id, {}));
    }
  };

  const routeToSession = async (message: JsonRpcEnvelope): Promise<void> => {
    const method = message.method ?? '';
    const params = message.params;
    const sessionId = readOptionalString(params, 'sessionId');

    if (!sessionId.ok) {
      log.warn(`${method}: ${sessionId.error.message}`);
      await replyError(message, new ValidationError(sessionId.error.message));
      return;
    }
    if (sessionId.value === undefined || !isJsonObject(params)) {
      log.debug(`Dropping ${method}: no session id`);
      if (message.id !== undefined) {
        await enqueue(createErrorResponse(message.id, JsonRpcErrorCodes.MethodNotFound, `Method not found: ${method}`));
      }
      return;
    }

    const session = state.sessions.get(sessionId.value);
    const agentSessionId = session?.agentSessionId ?? null;
    if (!session || agentSessionId === null) {
      log.warn(`${method} for unknown session ${sessionId.value}`);
      await replyError(message, new SessionNotFoundError(sessionId.value));
      return;
    }

    // Tracked before the write: the agent may answer before it returns
    if (message.id !== undefined) {
      session.trackEditorRequest(message.id);
    }
    const delivered = await session.writeToAgent({ ...message, params: { ...params, sessionId: agentSessionId } });
    if (delivered) {
      return;
    }
    log.warn(`[${session.proxySessionId}] agent input closed; dropping ${method}`);
    // Still tracked means the pump has not answered it yet
    if (message.id !== undefined && session.settleEditorRequest(message.id)) {
      await enqueue(
        createErrorResponse(message.id, JsonRpcErrorCodes.InternalError, `Agent for session ${sessionId.value} is not running`),
      );
    }
  };

  const routeEditorResponse = async (message: JsonRpcEnvelope): Promise<void> => {
    if (message.id === undefined || message.id.kind !== 'string') {
      log.warn(`Dropping editor response with unknown id ${message.id ? idKey(message.id) : '(none)'}`);
      return;
    }
    const proxied = state.agentRequests.get(message.id.value);
    if (!proxied) {
      log.warn(`Dropping editor response with unknown id ${message.id.value}`);
      return;
    }
    state.agentRequests.delete(message.id.value);

    const session = state.sessions.get(proxied.proxySessionId);
    if (!session) {
      log.warn(`Dropping editor response for ended session ${proxied.proxySessionId}`);
      return;
    }
    if (!(await session.writeToAgent({ ...message, id: proxied.originalId }))) {
      log.warn(`[${session.proxySessionId}] agent input closed; dropping response ${message.id.value}`);
    }
  };

  const endAllSessions = async (): Promise<void> => {
    const sessions = [...state.sessions.values()];
    await Promise.all(
      sessions.map(async (session) => {
        try {
          await endSession(session, settings.timeouts.shutdownMs);
        } catch (error) {
          log.error(`[${session.proxySessionId}] shutdown error: ${errorMessage(error)}`);
        }
      }),
    );
  };

  return {
    handleInitialize,
    handleSessionNew,
    handleSessionEnd,
    routeToSession,
    routeEditorResponse,
    endAllSessions,
  };
}
