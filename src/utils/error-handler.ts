/**
 * Error handling and formatting utilities
 */

import { stderr } from 'process';

import { JsonRpcErrorCodes, type JsonRpcError } from '@/types/json-rpc.js';

export class ProxyError extends Error {
  constructor(
    message: string,
    public code: string = 'INTERNAL_ERROR',
  ) {
    super(message);
    this.name = 'ProxyError';
  }
}

export class SessionNotFoundError extends ProxyError {
  constructor(sessionId: string) {
    super(`Session not found: ${sessionId}`, 'SESSION_NOT_FOUND');
  }
}

export class SessionCreationError extends ProxyError {
  constructor(message: string) {
    super(`Failed to create session: ${message}`, 'SESSION_CREATION_FAILED');
  }
}

export class AgentSpawnError extends ProxyError {
  constructor(message: string) {
    super(message, 'AGENT_SPAWN_FAILED');
  }
}

/**
 * Agent answered a handshake request with an error, or not at all
 */
export class HandshakeError extends ProxyError {
  constructor(
    message: string,
    public readonly timedOut: boolean = false,
  ) {
    super(message, timedOut ? 'HANDSHAKE_TIMEOUT' : 'HANDSHAKE_FAILED');
  }
}

export class ConfigError extends ProxyError {
  constructor(message: string) {
    super(`Configuration error: ${message}`, 'CONFIG_ERROR');
  }
}

export class ValidationError extends ProxyError {
  constructor(message: string) {
    super(`Validation error: ${message}`, 'VALIDATION_ERROR');
  }
}

/**
 * Get suggested next steps for an error code
 */
function getSuggestion(code: string): string | null {
  const suggestions: Record<string, string> = {
    CONFIG_ERROR: "Run 'acp-proxy config show' to inspect the effective configuration",
    AGENT_SPAWN_FAILED: 'Check that the agent binary is installed and on PATH, or pass --direct',
    E_UNKNOWN_CONFIG_KEY: "Run 'acp-proxy config show' to list available keys",
  };
  return suggestions[code] || null;
}

/**
 * Extract a message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Format error for terminal output
 */
export function formatError(error: unknown): string {
  if (error instanceof Error) {
    if (error instanceof ProxyError) {
      return `[${error.code}] ${error.message}`;
    }
    return `[ERROR] ${error.message}`;
  }
  return `[ERROR] ${String(error)}`;
}

/**
 * Print error to stderr with optional suggestion
 */
export function printError(error: unknown): void {
  const formatted = formatError(error);
  let output = `\n❌ ${formatted}`;

  if (error instanceof ProxyError) {
    const suggestion = getSuggestion(error.code);
    if (suggestion) {
      output += `\n💡 ${suggestion}`;
    }
  }

  output += '\n\n';
  stderr.write(output);
}

/**
 * Map an error to the JSON-RPC error object sent back to the editor
 */
export function toJsonRpcError(error: unknown): JsonRpcError {
  if (error instanceof SessionNotFoundError) {
    return { code: JsonRpcErrorCodes.SessionNotFound, message: error.message };
  }
  if (error instanceof SessionCreationError) {
    return { code: JsonRpcErrorCodes.SessionCreationFailed, message: error.message };
  }
  if (error instanceof ValidationError) {
    return { code: JsonRpcErrorCodes.InvalidParams, message: error.message };
  }
  return { code: JsonRpcErrorCodes.InternalError, message: errorMessage(error) };
}
