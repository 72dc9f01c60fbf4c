import type { Writable } from 'node:stream';

import type { AcpSession } from '@/services/acp-session.js';
import type { AgentSpawner } from '@/services/agent-spawner.js';
import type { ServerInfoConfig, TimeoutConfig } from '@/types/index.js';
import type { JsonObject, JsonRpcEnvelope, JsonRpcId } from '@/types/json-rpc.js';
import type { Logger } from '@/utils/logger.js';

/**
 * Maps a session's working directory to its workspace root
 */
export interface WorkspaceLookup {
  resolve(cwd: string): Promise<string>;
}

export interface AcpProxyOptions {
  /** Agent command name handed to the spawner */
  agent: string;
  spawner: AgentSpawner;
  /** Editor-facing output stream (normally stdout) */
  output: Writable;
  workspaceResolver: WorkspaceLookup;
  containerWorkspace?: string;
  timeouts?: Partial<TimeoutConfig>;
  outputCapacity?: number;
  server?: Partial<ServerInfoConfig>;
  /** Working directory used when session/new carries no cwd */
  cwd?: () => string;
  logger?: Logger;
}

/**
 * An agent-originated request forwarded to the editor under a proxy id
 */
export interface ProxiedAgentRequest {
  proxySessionId: string;
  originalId: JsonRpcId;
}

/**
 * Mutable router state shared by the dispatch modules
 */
export interface ProxyState {
  /** Live sessions keyed by proxy session id */
  sessions: Map<string, AcpSession>;
  /** Frozen copy of the editor's last initialize params */
  initializeSnapshot: JsonObject | null;
  /** Running session/new handlers */
  inflight: Set<Promise<void>>;
  /** Keyed by the proxy-issued request id */
  agentRequests: Map<string, ProxiedAgentRequest>;
  agentRequestSeq: number;
}

export type Enqueue = (envelope: JsonRpcEnvelope) => Promise<boolean>;

export interface ResolvedProxySettings {
  agent: string;
  containerWorkspace: string;
  timeouts: TimeoutConfig;
  server: ServerInfoConfig;
  cwd: () => string;
}
