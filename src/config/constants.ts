/**
 * Application-wide constants and magic values
 */

export const PROXY_HOME = '~/.acp-proxy';
export const PROXY_CONFIG_FILE = `${PROXY_HOME}/config.yaml`;

// Protocol
export const JSON_RPC_VERSION = '2.0';
export const DEFAULT_PROTOCOL_VERSION = '2025-01-01';
export const AGENT_ACP_FLAG = '--acp';
export const CONTAINER_WORKSPACE_ROOT = '/home/agent/workspace';

// Handshake request ids sent to a freshly spawned agent
export const INIT_REQUEST_PREFIX = 'init-';
export const SESSION_NEW_REQUEST_PREFIX = 'session-new-';

// Timeouts (milliseconds)
export const HANDSHAKE_TIMEOUT = 30000; // 30 seconds
export const SPAWN_TIMEOUT = 10000; // 10 seconds
export const SESSION_END_TIMEOUT = 5000; // 5 seconds
export const SHUTDOWN_SESSION_TIMEOUT = 2000; // 2 seconds

// Queues
export const OUTPUT_QUEUE_CAPACITY = 1000;
export const AGENT_CHANNEL_CAPACITY = 256;

// Wrapped spawn mode: exit status the container-side preflight uses for a missing agent
export const AGENT_NOT_FOUND_EXIT_CODE = 127;

// Environment
export const ENV_DEBUG = 'ACP_PROXY_DEBUG';
export const ENV_CONFIG = 'ACP_PROXY_CONFIG';
export const ENV_AGENT = 'ACP_PROXY_AGENT';
export const ENV_DIRECT = 'ACP_PROXY_DIRECT';
export const ENV_EXEC_BIN = 'ACP_PROXY_EXEC_BIN';
export const ENV_CONTAINER_WORKSPACE = 'ACP_PROXY_CONTAINER_WORKSPACE';
