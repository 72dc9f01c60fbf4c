/**
 * Path utilities for the ~/.acp-proxy config location
 */

import { homedir } from 'node:os';
import path from 'node:path';

import { ENV_CONFIG, PROXY_CONFIG_FILE } from '@/config/constants.js';

/**
 * Expand a leading ~ to the user's home directory
 */
export function expandHome(targetPath: string): string {
  if (targetPath === '~' || targetPath.startsWith('~/')) {
    return path.join(homedir(), targetPath.slice(1));
  }
  return targetPath;
}

/**
 * Config file location: explicit override, then $ACP_PROXY_CONFIG, then the default
 */
export function getConfigFilePath(override?: string, env: NodeJS.ProcessEnv = process.env): string {
  const configured = override ?? env[ENV_CONFIG];
  return path.resolve(expandHome(configured && configured.length > 0 ? configured : PROXY_CONFIG_FILE));
}
