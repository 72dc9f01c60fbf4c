/**
 * Spawn mode for agent processes
 * - 'direct': run the agent binary itself with --acp
 * - 'wrapped': run the agent through the container exec wrapper
 */
export type SpawnMode = 'direct' | 'wrapped';

/**
 * Agent launch configuration
 */
export interface AgentConfig {
  /** Agent binary name (any agent that speaks ACP when started with --acp) */
  name: string;
  mode: SpawnMode;
  /** Wrapper executable used in 'wrapped' mode */
  execBinary: string;
}

/**
 * Host/container workspace mapping
 */
export interface WorkspaceConfig {
  /** Workspace root as seen from inside the container */
  containerRoot: string;
  /** Marker files (relative to a directory) that identify a workspace root */
  markers: string[];
}

export interface TimeoutConfig {
  handshakeMs: number;
  spawnMs: number;
  sessionEndMs: number;
  shutdownMs: number;
}

export interface QueueConfig {
  outputCapacity: number;
  agentChannelCapacity: number;
}

/**
 * Identity the proxy reports in its initialize reply
 */
export interface ServerInfoConfig {
  name: string;
  version: string;
  defaultProtocolVersion: string;
}

/**
 * Configuration structure from ~/.acp-proxy/config.yaml
 */
export interface ProxyConfig {
  agent: AgentConfig;
  workspace: WorkspaceConfig;
  timeouts: TimeoutConfig;
  queues: QueueConfig;
  server: ServerInfoConfig;
}

/**
 * Partial config as read from YAML, one level deep
 */
export type PartialProxyConfig = {
  [K in keyof ProxyConfig]?: Partial<ProxyConfig[K]>;
};

/**
 * Options accepted by the proxy command
 */
export interface ProxyCommandOptions {
  direct?: boolean;
  execBin?: string;
  containerWorkspace?: string;
  config?: string;
}

export * from './json-rpc.js';
