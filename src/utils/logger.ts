// This module centralizes structured logging configuration and safe payload shaping.

import { createHash } from 'node:crypto';
import pino, { type Logger, type LoggerOptions } from 'pino';
import { CLIENT_NAME } from '../version.js';

// RPC params and results can be arbitrarily large; log lines keep only a bounded preview.
const LOG_LIMITS = {
  depth: 4,
  stringLength: 256,
  arrayItems: 16,
  objectKeys: 24
} as const;

// Credentials travel in headers and config objects; none of them may reach a log line.
const REDACT_PATHS = ['headers.Authorization', 'headers.authorization', '*.Authorization', '*.password'];

const SECRET_KEY_PATTERN = /pass(word|phrase)?|secret|token|authorization|credential/i;

// Short sha256 prefix so two log lines can be correlated on a secret without printing it.
function fingerprint(value: unknown): string {
  const text = typeof value === 'string' ? value : JSON.stringify(value ?? '');
  return createHash('sha256').update(text).digest('hex').slice(0, 12);
}

function shapeEntries(value: object, depth: number): Record<string, unknown> {
  const keys = Object.keys(value);
  const shaped: Record<string, unknown> = {};

  for (const key of keys.slice(0, LOG_LIMITS.objectKeys)) {
    const entry: unknown = Reflect.get(value, key);
    shaped[key] = SECRET_KEY_PATTERN.test(key) ? `[redacted:${fingerprint(entry)}]` : sanitizeForLog(entry, depth + 1);
  }

  if (keys.length > LOG_LIMITS.objectKeys) {
    shaped.__truncatedKeys = keys.length - LOG_LIMITS.objectKeys;
  }
  return shaped;
}

/** Bounds and redacts a value (RPC params, error details) before it is attached to a log line. */
export function sanitizeForLog(value: unknown, depth = 0): unknown {
  if (depth > LOG_LIMITS.depth) {
    return '[depth-limited]';
  }

  switch (typeof value) {
    case 'string':
      return value.length <= LOG_LIMITS.stringLength
        ? value
        : `${value.slice(0, LOG_LIMITS.stringLength)}...[truncated:${value.length - LOG_LIMITS.stringLength}]`;
    case 'bigint':
      return value.toString();
    case 'object':
      break;
    case 'undefined':
    case 'number':
    case 'boolean':
      return value;
    default:
      return String(value);
  }

  if (value === null) {
    return null;
  }
  if (value instanceof Uint8Array) {
    return `[bytes:${value.byteLength}]`;
  }
  if (Array.isArray(value)) {
    const preview: unknown[] = value.slice(0, LOG_LIMITS.arrayItems).map((item) => sanitizeForLog(item, depth + 1));
    return value.length > LOG_LIMITS.arrayItems
      ? [...preview, `[truncated-items:${value.length - LOG_LIMITS.arrayItems}]`]
      : preview;
  }
  return shapeEntries(value, depth);
}

// Keeps the error code of AppError-style errors and follows the cause chain transports attach.
export function errorForLog(error: unknown): Record<string, unknown> {
  if (!(error instanceof Error)) {
    return { message: String(error) };
  }

  const code: unknown = Reflect.get(error, 'code');
  return {
    name: error.name,
    ...(typeof code === 'string' ? { code } : {}),
    message: error.message,
    stack: error.stack,
    ...(error.cause === undefined ? {} : { cause: errorForLog(error.cause) })
  };
}

// This helper builds the pino configuration shared by every logger the client creates.
export function buildLoggerOptions(level = process.env.LOG_LEVEL ?? 'info'): LoggerOptions {
  return {
    level,
    base: {
      service: CLIENT_NAME
    },
    redact: {
      paths: REDACT_PATHS,
      remove: true
    },
    timestamp: pino.stdTimeFunctions.isoTime
  };
}

export function createLogger(level?: string): Logger {
  return pino(buildLoggerOptions(level));
}
