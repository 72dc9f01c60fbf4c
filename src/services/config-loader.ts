/**
 * Configuration loading, validation and initialization
 */

import { promises as fs } from 'node:fs';
import path from 'node:path';

import yaml from 'js-yaml';

import {
  ENV_AGENT,
  ENV_CONTAINER_WORKSPACE,
  ENV_DIRECT,
  ENV_EXEC_BIN,
} from '@/config/constants.js';
import { DEFAULT_CONFIG } from '@/config/defaults.js';
import type { PartialProxyConfig, ProxyConfig, SpawnMode } from '@/types/index.js';
import { ConfigError, errorMessage } from '@/utils/error-handler.js';
import { getConfigFilePath } from '@/utils/path-helper.js';

type RawSection = Record<string, unknown>;

function isRecord(value: unknown): value is RawSection {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function readSection(raw: RawSection, name: string): RawSection {
  const section = raw[name];
  if (section === undefined || section === null) {
    return {};
  }
  if (!isRecord(section)) {
    throw new ConfigError(`'${name}' must be a mapping`);
  }
  return section;
}

function readString(section: RawSection, key: string, keyPath: string): string | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'string' || value.length === 0) {
    throw new ConfigError(`'${keyPath}' must be a non-empty string`);
  }
  return value;
}

function readPositiveInt(section: RawSection, key: string, keyPath: string): number | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (typeof value !== 'number' || !Number.isInteger(value) || value <= 0) {
    throw new ConfigError(`'${keyPath}' must be a positive integer`);
  }
  return value;
}

function readStringList(section: RawSection, key: string, keyPath: string): string[] | undefined {
  const value = section[key];
  if (value === undefined || value === null) {
    return undefined;
  }
  if (!Array.isArray(value)) {
    throw new ConfigError(`'${keyPath}' must be a list of strings`);
  }
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') {
      throw new ConfigError(`'${keyPath}' must be a list of strings`);
    }
    items.push(item);
  }
  return items;
}

function readMode(section: RawSection, keyPath: string): SpawnMode | undefined {
  const value = readString(section, 'mode', keyPath);
  if (value === undefined || value === 'direct' || value === 'wrapped') {
    return value;
  }
  throw new ConfigError(`'${keyPath}' must be 'direct' or 'wrapped', got '${value}'`);
}

/**
 * Validate a parsed YAML document into a partial config
 */
export function parseConfigDocument(document: unknown): PartialProxyConfig {
  if (document === undefined || document === null) {
    return {};
  }
  if (!isRecord(document)) {
    throw new ConfigError('Config file must contain a YAML mapping');
  }

  const agent = readSection(document, 'agent');
  const workspace = readSection(document, 'workspace');
  const timeouts = readSection(document, 'timeouts');
  const queues = readSection(document, 'queues');
  const server = readSection(document, 'server');

  return {
    agent: {
      name: readString(agent, 'name', 'agent.name'),
      mode: readMode(agent, 'agent.mode'),
      execBinary: readString(agent, 'execBinary', 'agent.execBinary'),
    },
    workspace: {
      containerRoot: readString(workspace, 'containerRoot', 'workspace.containerRoot'),
      markers: readStringList(workspace, 'markers', 'workspace.markers'),
    },
    timeouts: {
      handshakeMs: readPositiveInt(timeouts, 'handshakeMs', 'timeouts.handshakeMs'),
      spawnMs: readPositiveInt(timeouts, 'spawnMs', 'timeouts.spawnMs'),
      sessionEndMs: readPositiveInt(timeouts, 'sessionEndMs', 'timeouts.sessionEndMs'),
      shutdownMs: readPositiveInt(timeouts, 'shutdownMs', 'timeouts.shutdownMs'),
    },
    queues: {
      outputCapacity: readPositiveInt(queues, 'outputCapacity', 'queues.outputCapacity'),
      agentChannelCapacity: readPositiveInt(queues, 'agentChannelCapacity', 'queues.agentChannelCapacity'),
    },
    server: {
      name: readString(server, 'name', 'server.name'),
      version: readString(server, 'version', 'server.version'),
      defaultProtocolVersion: readString(server, 'defaultProtocolVersion', 'server.defaultProtocolVersion'),
    },
  };
}

/**
 * Merge partial config with defaults, field by field
 */
export function mergeConfig(defaults: ProxyConfig, partial: PartialProxyConfig): ProxyConfig {
  const { agent = {}, workspace = {}, timeouts = {}, queues = {}, server = {} } = partial;
  return {
    agent: {
      name: agent.name ?? defaults.agent.name,
      mode: agent.mode ?? defaults.agent.mode,
      execBinary: agent.execBinary ?? defaults.agent.execBinary,
    },
    workspace: {
      containerRoot: workspace.containerRoot ?? defaults.workspace.containerRoot,
      markers: [...(workspace.markers ?? defaults.workspace.markers)],
    },
    timeouts: {
      handshakeMs: timeouts.handshakeMs ?? defaults.timeouts.handshakeMs,
      spawnMs: timeouts.spawnMs ?? defaults.timeouts.spawnMs,
      sessionEndMs: timeouts.sessionEndMs ?? defaults.timeouts.sessionEndMs,
      shutdownMs: timeouts.shutdownMs ?? defaults.timeouts.shutdownMs,
    },
    queues: {
      outputCapacity: queues.outputCapacity ?? defaults.queues.outputCapacity,
      agentChannelCapacity: queues.agentChannelCapacity ?? defaults.queues.agentChannelCapacity,
    },
    server: {
      name: server.name ?? defaults.server.name,
      version: server.version ?? defaults.server.version,
      defaultProtocolVersion: server.defaultProtocolVersion ?? defaults.server.defaultProtocolVersion,
    },
  };
}

/**
 * Apply ACP_PROXY_* environment overrides
 */
export function applyEnvOverrides(config: ProxyConfig, env: NodeJS.ProcessEnv = process.env): ProxyConfig {
  const direct = env[ENV_DIRECT];
  return mergeConfig(config, {
    agent: {
      name: env[ENV_AGENT] || undefined,
      mode: direct === '1' || direct === 'true' ? 'direct' : undefined,
      execBinary: env[ENV_EXEC_BIN] || undefined,
    },
    workspace: {
      containerRoot: env[ENV_CONTAINER_WORKSPACE] || undefined,
    },
  });
}

/**
 * Load configuration from file; a missing file means defaults.
 * Environment overrides are applied on top.
 */
export async function loadConfig(
  configPath: string = getConfigFilePath(),
  env: NodeJS.ProcessEnv = process.env,
): Promise<ProxyConfig> {
  let content: string;
  try {
    content = await fs.readFile(configPath, 'utf-8');
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return applyEnvOverrides(DEFAULT_CONFIG, env);
    }
    throw new ConfigError(`Failed to read ${configPath}: ${errorMessage(error)}`);
  }

  let document: unknown;
  try {
    document = yaml.load(content, { filename: configPath });
  } catch (error) {
    throw new ConfigError(`Invalid YAML in ${configPath}: ${errorMessage(error)}`);
  }

  return applyEnvOverrides(mergeConfig(DEFAULT_CONFIG, parseConfigDocument(document)), env);
}

/**
 * Save configuration to file
 */
export async function saveConfig(config: ProxyConfig, configPath: string = getConfigFilePath()): Promise<void> {
  await fs.mkdir(path.dirname(configPath), { recursive: true });
  const content = yaml.dump(config, { indent: 2 });
  await fs.writeFile(configPath, content, 'utf-8');
}

/**
 * Write the default config file unless one already exists
 */
export async function initConfig(configPath: string = getConfigFilePath()): Promise<{ path: string; created: boolean }> {
  try {
    await fs.access(configPath);
    return { path: configPath, created: false };
  } catch {
    await saveConfig(DEFAULT_CONFIG, configPath);
    return { path: configPath, created: true };
  }
}

/**
 * Look up a dotted key such as `agent.mode`
 */
export function getConfigValue(config: ProxyConfig, keyPath: string): unknown {
  let current: unknown = config;
  for (const key of keyPath.split('.')) {
    if (isRecord(current) && key in current) {
      current = current[key];
    } else {
      return undefined;
    }
  }
  return current;
}
