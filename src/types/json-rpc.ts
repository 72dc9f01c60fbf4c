/**
 * JSON-RPC 2.0 wire types shared by the editor and agent streams.
 */

import type { LosslessNumber } from 'lossless-json';

/**
 * Any JSON value. Payloads are kept opaque and only read through payload.ts.
 *
 * Numbers a double cannot hold exactly stay a LosslessNumber carrying the
 * source text, so they are written back out unchanged.
 */
export type JsonValue = null | boolean | number | LosslessNumber | string | JsonValue[] | JsonObject;

export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * Request identifier.
 *
 * Numeric ids keep their source text so integers outside the double range
 * survive a round trip unchanged.
 */
export type JsonRpcId =
  | { kind: 'string'; value: string }
  | { kind: 'number'; literal: string };

export interface JsonRpcError {
  code: number;
  message: string;
  data?: JsonValue;
}

/**
 * One NDJSON line: request, notification or response.
 */
export interface JsonRpcEnvelope {
  jsonrpc: '2.0';
  id?: JsonRpcId;
  method?: string;
  params?: JsonValue;
  result?: JsonValue;
  error?: JsonRpcError;
}

export const JsonRpcErrorCodes = {
  ParseError: -32700,
  InvalidRequest: -32600,
  MethodNotFound: -32601,
  InvalidParams: -32602,
  InternalError: -32603,
  SessionCreationFailed: -32000,
  SessionNotFound: -32001,
} as const;

export type JsonRpcErrorCode = (typeof JsonRpcErrorCodes)[keyof typeof JsonRpcErrorCodes];

export type ParseSuccess<T> = {
  ok: true;
  value: T;
};

export type ParseFailure = {
  ok: false;
  error: {
    code: JsonRpcErrorCode;
    message: string;
  };
};

export type ParseResult<T> = ParseSuccess<T> | ParseFailure;
