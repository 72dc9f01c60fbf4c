/**
 * Host <-> container path rewriting for handshake payloads.
 */

import path from 'node:path';

import { CONTAINER_WORKSPACE_ROOT } from '@/config/constants.js';
import type { JsonObject, JsonValue } from '@/types/json-rpc.js';
import { isJsonObject } from '@/services/payload.js';

function stripTrailingSeparators(value: string, separators: RegExp): string {
  const stripped = value.replace(separators, '');
  return stripped.length === 0 ? value.slice(0, 1) : stripped;
}

export class PathTranslator {
  private readonly hostRoot: string;
  private readonly containerRoot: string;

  constructor(
    hostWorkspace: string,
    containerWorkspace: string = CONTAINER_WORKSPACE_ROOT,
  ) {
    this.hostRoot = stripTrailingSeparators(path.resolve(hostWorkspace), /[\\/]+$/);
    this.containerRoot = stripTrailingSeparators(containerWorkspace, /\/+$/);
  }

  get hostWorkspace(): string {
    return this.hostRoot;
  }

  get containerWorkspace(): string {
    return this.containerRoot;
  }

  /**
   * Rewrite a host path under the workspace to its container location.
   * Anything outside the workspace, or relative, comes back unchanged.
   */
  toContainer(hostPath: string): string {
    if (!path.isAbsolute(hostPath)) {
      return hostPath;
    }

    let normalized: string;
    try {
      normalized = stripTrailingSeparators(path.normalize(hostPath), /[\\/]+$/);
    } catch {
      return hostPath;
    }

    if (normalized === this.hostRoot) {
      return this.containerRoot;
    }

    const prefix = this.hostRoot.endsWith(path.sep) ? this.hostRoot : this.hostRoot + path.sep;
    if (!normalized.startsWith(prefix)) {
      return hostPath;
    }

    const relative = normalized.slice(prefix.length).split(path.sep).join('/');
    return `${this.containerRoot}/${relative}`;
  }

  toHost(containerPath: string): string {
    if (!containerPath.startsWith('/')) {
      return containerPath;
    }

    const trimmed = stripTrailingSeparators(containerPath, /\/+$/);
    if (trimmed === this.containerRoot) {
      return this.hostRoot;
    }

    const prefix = this.containerRoot === '/' ? '/' : `${this.containerRoot}/`;
    if (!trimmed.startsWith(prefix)) {
      return containerPath;
    }

    const segments = trimmed.slice(prefix.length).split('/');
    return path.join(this.hostRoot, ...segments);
  }

  /**
   * Rewrite string `args` of every MCP server entry. Accepts the keyed form
   * (`{ name: server }`) or a list of servers; other shapes pass through.
   */
  translateMcpServers(value: JsonValue): JsonValue {
    if (Array.isArray(value)) {
      return value.map((server) => this.translateServer(server));
    }
    if (isJsonObject(value)) {
      const result: JsonObject = {};
      for (const [name, server] of Object.entries(value)) {
        result[name] = this.translateServer(server);
      }
      return result;
    }
    return value;
  }

  private translateServer(server: JsonValue): JsonValue {
    if (!isJsonObject(server)) {
      return server;
    }
    const args = server.args;
    if (!Array.isArray(args)) {
      return server;
    }
    return {
      ...server,
      args: args.map((arg) => (typeof arg === 'string' ? this.toContainer(arg) : arg)),
    };
  }
}
