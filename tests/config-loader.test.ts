import { mkdtemp, readFile, rm, writeFile } from 'node:fs/promises';
import { homedir, tmpdir } from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { DEFAULT_CONFIG } from '../src/config/defaults.js';
import {
  applyEnvOverrides,
  getConfigValue,
  initConfig,
  loadConfig,
  parseConfigDocument,
} from '../src/services/config-loader.js';
import { getConfigFilePath } from '../src/utils/path-helper.js';

describe('loadConfig', () => {
  let dir: string;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), 'acp-proxy-config-'));
  });

  afterEach(async () => {
    await rm(dir, { recursive: true, force: true });
  });

  test('uses defaults when the file does not exist', async () => {
    expect(await loadConfig(path.join(dir, 'missing.yaml'), {})).toEqual(DEFAULT_CONFIG);
  });

  test('merges file values over defaults field by field', async () => {
    const file = path.join(dir, 'config.yaml');
    await writeFile(file, ['agent:', '  name: gemini', '  mode: direct', 'timeouts:', '  handshakeMs: 500', ''].join('\n'));

    const config = await loadConfig(file, {});
    expect(config.agent).toEqual({ name: 'gemini', mode: 'direct', execBinary: 'cai' });
    expect(config.timeouts).toEqual({ ...DEFAULT_CONFIG.timeouts, handshakeMs: 500 });
    expect(config.workspace).toEqual(DEFAULT_CONFIG.workspace);
  });

  test('applies environment overrides last', async () => {
    const file = path.join(dir, 'config.yaml');
    await writeFile(file, 'agent:\n  name: gemini\n');

    const config = await loadConfig(file, {
      ACP_PROXY_AGENT: 'codex',
      ACP_PROXY_DIRECT: '1',
      ACP_PROXY_CONTAINER_WORKSPACE: '/workspace',
    });
    expect(config.agent).toEqual({ name: 'codex', mode: 'direct', execBinary: 'cai' });
    expect(config.workspace.containerRoot).toBe('/workspace');
  });

  test('rejects an unknown spawn mode', async () => {
    const file = path.join(dir, 'config.yaml');
    await writeFile(file, 'agent:\n  mode: docker\n');

    await expect(loadConfig(file, {})).rejects.toThrow(
      "Configuration error: 'agent.mode' must be 'direct' or 'wrapped', got 'docker'",
    );
  });

  test('reports invalid YAML with the file path', async () => {
    const file = path.join(dir, 'config.yaml');
    await writeFile(file, 'agent: [unclosed\n');

    await expect(loadConfig(file, {})).rejects.toThrow(`Configuration error: Invalid YAML in ${file}:`);
  });

  test('initConfig writes defaults once', async () => {
    const file = path.join(dir, 'nested', 'config.yaml');

    expect(await initConfig(file)).toEqual({ path: file, created: true });
    expect(await initConfig(file)).toEqual({ path: file, created: false });
    expect(await readFile(file, 'utf-8')).toContain('execBinary: cai');
    expect(await loadConfig(file, {})).toEqual(DEFAULT_CONFIG);
  });
});

describe('parseConfigDocument', () => {
  test('treats an empty document as no overrides', () => {
    expect(parseConfigDocument(null)).toEqual({});
  });

  test('requires a mapping at the top level', () => {
    expect(() => parseConfigDocument(['agent'])).toThrow('Configuration error: Config file must contain a YAML mapping');
  });

  test('validates numbers and lists', () => {
    expect(() => parseConfigDocument({ timeouts: { handshakeMs: -1 } })).toThrow(
      "'timeouts.handshakeMs' must be a positive integer",
    );
    expect(() => parseConfigDocument({ workspace: { markers: ['.git', 3] } })).toThrow(
      "'workspace.markers' must be a list of strings",
    );
    expect(() => parseConfigDocument({ server: 'oops' })).toThrow("'server' must be a mapping");
  });
});

describe('applyEnvOverrides', () => {
  test('accepts "true" for direct mode and ignores other values', () => {
    expect(applyEnvOverrides(DEFAULT_CONFIG, { ACP_PROXY_DIRECT: 'true' }).agent.mode).toBe('direct');
    expect(applyEnvOverrides(DEFAULT_CONFIG, { ACP_PROXY_DIRECT: 'no' }).agent.mode).toBe('wrapped');
  });

  test('ignores empty values', () => {
    expect(applyEnvOverrides(DEFAULT_CONFIG, { ACP_PROXY_EXEC_BIN: '' }).agent.execBinary).toBe('cai');
  });
});

describe('getConfigValue', () => {
  test('follows dotted keys', () => {
    expect(getConfigValue(DEFAULT_CONFIG, 'agent.mode')).toBe('wrapped');
    expect(getConfigValue(DEFAULT_CONFIG, 'workspace.markers')).toEqual(['.containai/config.toml']);
    expect(getConfigValue(DEFAULT_CONFIG, 'agent.nope')).toBeUndefined();
    expect(getConfigValue(DEFAULT_CONFIG, 'agent.mode.deeper')).toBeUndefined();
  });
});

describe('getConfigFilePath', () => {
  test('prefers the explicit path, then the environment, then the default', () => {
    expect(getConfigFilePath('/etc/acp/proxy.yaml', { ACP_PROXY_CONFIG: '/ignored.yaml' })).toBe('/etc/acp/proxy.yaml');
    expect(getConfigFilePath(undefined, { ACP_PROXY_CONFIG: '~/alt.yaml' })).toBe(path.join(homedir(), 'alt.yaml'));
    expect(getConfigFilePath(undefined, {})).toBe(path.join(homedir(), '.acp-proxy', 'config.yaml'));
  });
});
