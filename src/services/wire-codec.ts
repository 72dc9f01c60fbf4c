/**
 * NDJSON codec for JSON-RPC envelopes.
 *
 * Lines are parsed with lossless-json: numbers a double holds exactly become
 * plain numbers, every other number stays a LosslessNumber. Numeric ids are
 * read a second time straight from the line text to keep their exact literal
 * (`1.50` stays `1.50`).
 */

import { isLosslessNumber, isSafeNumber, LosslessNumber, parse, stringify } from 'lossless-json';

import { JSON_RPC_VERSION } from '@/config/constants.js';
import {
  JsonRpcErrorCodes,
  type JsonObject,
  type JsonRpcEnvelope,
  type JsonRpcError,
  type JsonRpcErrorCode,
  type JsonRpcId,
  type JsonValue,
  type ParseFailure,
  type ParseResult,
} from '@/types/json-rpc.js';

const NUMBER_LITERAL = /^-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?$/;

// ─── Identifiers ───

export function stringId(value: string): JsonRpcId {
  return { kind: 'string', value };
}

export function numericId(literal: string | number | bigint): JsonRpcId {
  return { kind: 'number', literal: String(literal) };
}

/**
 * Key used for correlation maps: the string value or the numeric literal text.
 */
export function idKey(id: JsonRpcId): string {
  return id.kind === 'string' ? id.value : id.literal;
}

export function idsEqual(a: JsonRpcId, b: JsonRpcId): boolean {
  return a.kind === b.kind && idKey(a) === idKey(b);
}

export function isValidNumberLiteral(literal: string): boolean {
  return NUMBER_LITERAL.test(literal);
}

/**
 * JSON text for an id. A numeric literal that is not valid JSON is written as
 * a string rather than producing a broken line.
 */
export function formatId(id: JsonRpcId): string {
  if (id.kind === 'string') {
    return JSON.stringify(id.value);
  }
  return isValidNumberLiteral(id.literal) ? id.literal : JSON.stringify(id.literal);
}

// ─── Raw member scanning ───

function skipWhitespace(text: string, pos: number): number {
  let i = pos;
  while (i < text.length) {
    const ch = text[i];
    if (ch !== ' ' && ch !== '\t' && ch !== '\n' && ch !== '\r') {
      break;
    }
    i++;
  }
  return i;
}

/** Index just past the closing quote of the string starting at `pos`. */
function skipString(text: string, pos: number): number {
  let i = pos + 1;
  while (i < text.length) {
    const ch = text[i];
    if (ch === '\\') {
      i += 2;
      continue;
    }
    if (ch === '"') {
      return i + 1;
    }
    i++;
  }
  return i;
}

/** Index just past the JSON value starting at `pos`. Input must be valid JSON. */
function skipValue(text: string, pos: number): number {
  const first = text[pos];
  if (first === '"') {
    return skipString(text, pos);
  }
  if (first === '{' || first === '[') {
    let depth = 0;
    let i = pos;
    while (i < text.length) {
      const ch = text[i];
      if (ch === '"') {
        i = skipString(text, i);
        continue;
      }
      if (ch === '{' || ch === '[') {
        depth++;
      } else if (ch === '}' || ch === ']') {
        depth--;
        if (depth === 0) {
          return i + 1;
        }
      }
      i++;
    }
    return i;
  }
  let i = pos;
  while (i < text.length && !',}] \t\n\r'.includes(text[i] ?? '')) {
    i++;
  }
  return i;
}

/**
 * Raw source text of a top-level member of a JSON object, last occurrence
 * winning. The text must already be known to be valid JSON.
 */
export function findTopLevelMember(text: string, key: string): string | undefined {
  let i = skipWhitespace(text, 0);
  if (text[i] !== '{') {
    return undefined;
  }
  i++;

  let found: string | undefined;
  while (i < text.length) {
    i = skipWhitespace(text, i);
    if (text[i] === '}') {
      break;
    }
    if (text[i] === ',') {
      i++;
      continue;
    }
    const keyStart = i;
    i = skipString(text, i);
    const name: unknown = JSON.parse(text.slice(keyStart, i));
    i = skipWhitespace(text, i);
    i++; // ':'
    i = skipWhitespace(text, i);
    const valueStart = i;
    i = skipValue(text, i);
    if (name === key) {
      found = text.slice(valueStart, i);
    }
  }
  return found;
}

// ─── Parsing ───

function fail(code: JsonRpcErrorCode, message: string): ParseFailure {
  return { ok: false, error: { code, message } };
}

function isObject(value: JsonValue | undefined): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !isLosslessNumber(value);
}

function parseNumber(text: string): number | LosslessNumber {
  return isSafeNumber(text) ? Number.parseFloat(text) : new LosslessNumber(text);
}

function isJsonValue(value: unknown): value is JsonValue {
  if (value === null || typeof value === 'boolean' || typeof value === 'number' || typeof value === 'string') {
    return true;
  }
  if (isLosslessNumber(value)) {
    return true;
  }
  if (Array.isArray(value)) {
    return value.every(isJsonValue);
  }
  return typeof value === 'object' && value !== null && Object.values(value).every(isJsonValue);
}

/** JSON text of a payload; LosslessNumbers are written as their source text. */
function toJsonText(value: JsonValue | JsonRpcError): string {
  return stringify(value) ?? 'null';
}

function parseError(value: JsonValue): ParseResult<JsonRpcError> {
  if (!isObject(value)) {
    return fail(JsonRpcErrorCodes.InvalidRequest, 'error must be an object');
  }
  const code = value.code;
  if (typeof code !== 'number' || !Number.isInteger(code)) {
    return fail(JsonRpcErrorCodes.InvalidRequest, 'error.code must be an integer');
  }
  const error: JsonRpcError = {
    code,
    message: typeof value.message === 'string' ? value.message : '',
  };
  if (value.data !== undefined) {
    error.data = value.data;
  }
  return { ok: true, value: error };
}

function parseId(line: string, value: JsonValue): ParseResult<JsonRpcId | undefined> {
  if (value === null) {
    return { ok: true, value: undefined };
  }
  if (typeof value === 'string') {
    return { ok: true, value: stringId(value) };
  }
  if (typeof value === 'number' || isLosslessNumber(value)) {
    const literal = findTopLevelMember(line, 'id');
    return { ok: true, value: numericId(literal ?? value.toString()) };
  }
  return fail(JsonRpcErrorCodes.InvalidRequest, `id must be a string or number, got ${Array.isArray(value) ? 'array' : typeof value}`);
}

/**
 * Parse one NDJSON line. Never throws.
 *
 * Duplicate members with different values are a parse error.
 */
export function parseEnvelope(line: string): ParseResult<JsonRpcEnvelope> {
  let parsed: unknown;
  try {
    parsed = parse(line, null, parseNumber);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    return fail(JsonRpcErrorCodes.ParseError, `Invalid JSON: ${message}`);
  }
  if (!isJsonValue(parsed)) {
    return fail(JsonRpcErrorCodes.ParseError, 'Invalid JSON: unsupported value');
  }

  if (!isObject(parsed)) {
    return fail(JsonRpcErrorCodes.InvalidRequest, 'Message must be a JSON object');
  }

  const envelope: JsonRpcEnvelope = { jsonrpc: JSON_RPC_VERSION };

  if (parsed.id !== undefined) {
    const id = parseId(line, parsed.id);
    if (!id.ok) {
      return id;
    }
    if (id.value !== undefined) {
      envelope.id = id.value;
    }
  }

  if (parsed.method !== undefined && parsed.method !== null) {
    if (typeof parsed.method !== 'string') {
      return fail(JsonRpcErrorCodes.InvalidRequest, 'method must be a string');
    }
    envelope.method = parsed.method;
  }

  if (parsed.params !== undefined) {
    envelope.params = parsed.params;
  }

  const hasResult = parsed.result !== undefined;
  const hasError = parsed.error !== undefined && parsed.error !== null;
  if (hasResult && hasError) {
    return fail(JsonRpcErrorCodes.InvalidRequest, 'Response carries both result and error');
  }
  if (hasResult) {
    envelope.result = parsed.result;
  }
  if (hasError && parsed.error !== undefined) {
    const error = parseError(parsed.error);
    if (!error.ok) {
      return error;
    }
    envelope.error = error.value;
  }

  return { ok: true, value: envelope };
}

// ─── Serialization ───

/**
 * One JSON line (without the trailing newline).
 */
export function serializeEnvelope(envelope: JsonRpcEnvelope): string {
  const parts = [`"jsonrpc":${JSON.stringify(JSON_RPC_VERSION)}`];
  if (envelope.id !== undefined) {
    parts.push(`"id":${formatId(envelope.id)}`);
  }
  if (envelope.method !== undefined) {
    parts.push(`"method":${JSON.stringify(envelope.method)}`);
  }
  if (envelope.params !== undefined) {
    parts.push(`"params":${toJsonText(envelope.params)}`);
  }
  if (envelope.result !== undefined) {
    parts.push(`"result":${toJsonText(envelope.result)}`);
  }
  if (envelope.error !== undefined) {
    parts.push(`"error":${toJsonText(envelope.error)}`);
  }
  return `{${parts.join(',')}}`;
}

// ─── Envelope helpers ───

export function isRequest(envelope: JsonRpcEnvelope): boolean {
  return envelope.method !== undefined && envelope.id !== undefined;
}

export function isNotification(envelope: JsonRpcEnvelope): boolean {
  return envelope.method !== undefined && envelope.id === undefined;
}

export function isResponse(envelope: JsonRpcEnvelope): boolean {
  return (
    envelope.method === undefined &&
    envelope.id !== undefined &&
    (envelope.result !== undefined || envelope.error !== undefined)
  );
}

export function createRequest(id: JsonRpcId, method: string, params?: JsonValue): JsonRpcEnvelope {
  const envelope: JsonRpcEnvelope = { jsonrpc: JSON_RPC_VERSION, id, method };
  if (params !== undefined) {
    envelope.params = params;
  }
  return envelope;
}

export function createNotification(method: string, params?: JsonValue): JsonRpcEnvelope {
  const envelope: JsonRpcEnvelope = { jsonrpc: JSON_RPC_VERSION, method };
  if (params !== undefined) {
    envelope.params = params;
  }
  return envelope;
}

export function createResultResponse(id: JsonRpcId, result: JsonValue): JsonRpcEnvelope {
  return { jsonrpc: JSON_RPC_VERSION, id, result };
}

export function createErrorResponse(
  id: JsonRpcId,
  code: number,
  message: string,
  data?: JsonValue,
): JsonRpcEnvelope {
  const error: JsonRpcError = { code, message };
  if (data !== undefined) {
    error.data = data;
  }
  return { jsonrpc: JSON_RPC_VERSION, id, error };
}
