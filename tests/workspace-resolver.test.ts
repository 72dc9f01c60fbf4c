import { mkdir, mkdtemp, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { afterEach, beforeEach, describe, expect, test } from 'vitest';

import { WorkspaceResolver } from '../src/services/workspace-resolver.js';

const noGit = async (): Promise<string | null> => null;

describe('WorkspaceResolver', () => {
  let root: string;

  beforeEach(async () => {
    root = await mkdtemp(path.join(os.tmpdir(), 'acp-proxy-ws-'));
  });

  afterEach(async () => {
    await rm(root, { recursive: true, force: true });
  });

  test('prefers the git top level', async () => {
    const seen: string[] = [];
    const resolver = new WorkspaceResolver({
      markers: ['.containai/config.toml'],
      gitLookup: async (cwd) => {
        seen.push(cwd);
        return '/repos/demo/';
      },
    });

    expect(await resolver.resolve('/repos/demo/src/../src')).toBe('/repos/demo');
    expect(seen).toEqual(['/repos/demo/src']);
  });

  test('falls back to the nearest ancestor with a marker file', async () => {
    await mkdir(path.join(root, '.containai'), { recursive: true });
    await writeFile(path.join(root, '.containai', 'config.toml'), '');
    const nested = path.join(root, 'a', 'b');
    await mkdir(nested, { recursive: true });

    const resolver = new WorkspaceResolver({ markers: ['.containai/config.toml'], gitLookup: noGit });
    expect(await resolver.resolve(nested)).toBe(root);
  });

  test('returns the cwd itself when nothing matches', async () => {
    const nested = path.join(root, 'plain');
    await mkdir(nested);

    const resolver = new WorkspaceResolver({ markers: ['no-such-marker-file.acp'], gitLookup: noGit });
    expect(await resolver.resolve(nested)).toBe(nested);
  });

  test('skips the marker walk when no markers are configured', async () => {
    const resolver = new WorkspaceResolver({ markers: [], gitLookup: noGit });
    expect(await resolver.resolve(root)).toBe(root);
  });
});
