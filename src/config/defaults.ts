/**
 * Default configuration values for acp-proxy
 */

import type { ProxyConfig } from '@/types/index.js';
import {
  AGENT_CHANNEL_CAPACITY,
  CONTAINER_WORKSPACE_ROOT,
  DEFAULT_PROTOCOL_VERSION,
  HANDSHAKE_TIMEOUT,
  OUTPUT_QUEUE_CAPACITY,
  SESSION_END_TIMEOUT,
  SHUTDOWN_SESSION_TIMEOUT,
  SPAWN_TIMEOUT,
} from '@/config/constants.js';

export const DEFAULT_CONFIG: ProxyConfig = {
  agent: {
    name: 'claude',
    mode: 'wrapped',
    execBinary: 'cai',
  },
  workspace: {
    containerRoot: CONTAINER_WORKSPACE_ROOT,
    markers: ['.containai/config.toml'],
  },
  timeouts: {
    handshakeMs: HANDSHAKE_TIMEOUT,
    spawnMs: SPAWN_TIMEOUT,
    sessionEndMs: SESSION_END_TIMEOUT,
    shutdownMs: SHUTDOWN_SESSION_TIMEOUT,
  },
  queues: {
    outputCapacity: OUTPUT_QUEUE_CAPACITY,
    agentChannelCapacity: AGENT_CHANNEL_CAPACITY,
  },
  server: {
    name: 'containai-acp-proxy',
    version: '0.1.0',
    defaultProtocolVersion: DEFAULT_PROTOCOL_VERSION,
  },
};
