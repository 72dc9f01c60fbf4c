/**
 * Host workspace root resolution for a session's working directory
 */

import { execFile } from 'node:child_process';
import { promises as fsp } from 'node:fs';
import path from 'node:path';
import { promisify } from 'node:util';

import { errorMessage } from '@/utils/error-handler.js';
import { createLogger } from '@/utils/logger.js';

const execFileAsync = promisify(execFile);
const log = createLogger('workspace');

/**
 * Returns the git top-level directory for `cwd`, or null when there is none
 */
export type GitTopLevelLookup = (cwd: string) => Promise<string | null>;

export const gitTopLevel: GitTopLevelLookup = async (cwd) => {
  try {
    const { stdout } = await execFileAsync('git', ['-C', cwd, 'rev-parse', '--show-toplevel'], {
      encoding: 'utf8',
    });
    const topLevel = stdout.trim();
    return topLevel.length > 0 ? topLevel : null;
  } catch (error) {
    log.debug(`git lookup failed for ${cwd}: ${errorMessage(error)}`);
    return null;
  }
};

async function fileExists(target: string): Promise<boolean> {
  try {
    await fsp.access(target);
    return true;
  } catch {
    return false;
  }
}

export interface WorkspaceResolverOptions {
  markers: string[];
  gitLookup?: GitTopLevelLookup;
}

export class WorkspaceResolver {
  private readonly markers: string[];
  private readonly gitLookup: GitTopLevelLookup;

  constructor(options: WorkspaceResolverOptions) {
    this.markers = options.markers;
    this.gitLookup = options.gitLookup ?? gitTopLevel;
  }

  /**
   * git top level, else the nearest ancestor holding a marker file, else cwd
   */
  async resolve(cwd: string): Promise<string> {
    const start = path.resolve(cwd);

    const topLevel = await this.gitLookup(start);
    if (topLevel) {
      return path.resolve(topLevel);
    }

    const marked = await this.findMarkedAncestor(start);
    return marked ?? start;
  }

  private async findMarkedAncestor(start: string): Promise<string | null> {
    if (this.markers.length === 0) {
      return null;
    }

    let dir = start;
    for (;;) {
      for (const marker of this.markers) {
        if (await fileExists(path.join(dir, marker))) {
          return dir;
        }
      }
      const parent = path.dirname(dir);
      if (parent === dir) {
        return null;
      }
      dir = parent;
    }
  }
}
