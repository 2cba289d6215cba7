// This module defines the layered error taxonomy surfaced by the client call path.

import type { ZodError } from 'zod';
import type { JsonValue } from '../types/jsonrpc.js';
import { AppError } from '../utils/errors.js';

// The point of the round-trip at which a transport failed.
export type ConnectionStage = 'poll' | 'service' | 'body';

const STAGE_LABELS: Record<ConnectionStage, string> = {
  poll: 'polling error',
  service: 'service error',
  body: 'body error'
};

// This error wraps the transport's own error type together with the stage it failed in.
export class ConnectionError<E> extends AppError {
  public readonly stage: ConnectionStage;
  declare readonly cause: E;

  public constructor(stage: ConnectionStage, cause: E) {
    super(`connection_${stage}`, `${STAGE_LABELS[stage]}, ${describe(cause)}`, undefined, { cause });
    this.name = 'ConnectionError';
    this.stage = stage;
  }
}

export type JsonDecodeFailure = SyntaxError | ZodError;

/**
 * Variants of a failed call. Only `connection` and `json` are produced by the
 * single-call path; the batch and nonce variants are reserved for batch dispatch.
 */
export type ClientErrorVariant<E> =
  | { kind: 'connection'; error: ConnectionError<E> }
  | { kind: 'json'; error: JsonDecodeFailure }
  | { kind: 'empty_batch' }
  | { kind: 'wrong_batch_response_size' }
  | { kind: 'batch_duplicate_response_id'; id: JsonValue }
  | { kind: 'wrong_batch_response_id'; id: JsonValue }
  | { kind: 'nonce_mismatch' }
  | { kind: 'version_mismatch' };

export type ClientErrorKind = ClientErrorVariant<unknown>['kind'];

function describe(value: unknown): string {
  return value instanceof Error ? value.message : String(value);
}

function messageFor<E>(variant: ClientErrorVariant<E>): string {
  switch (variant.kind) {
    case 'connection':
      return `connection error: ${variant.error.message}`;
    case 'json':
      return `response JSON could not be decoded: ${variant.error.message}`;
    case 'empty_batch':
      return 'batches cannot be empty';
    case 'wrong_batch_response_size':
      return 'too many responses returned in batch';
    case 'batch_duplicate_response_id':
      return `batch response contained a duplicate id: ${JSON.stringify(variant.id)}`;
    case 'wrong_batch_response_id':
      return `batch response contained an id matching no request: ${JSON.stringify(variant.id)}`;
    case 'nonce_mismatch':
      return 'response did not carry the expected nonce';
    case 'version_mismatch':
      return 'response jsonrpc field was not "2.0"';
  }
}

export class ClientError<E = unknown> extends AppError {
  public readonly variant: ClientErrorVariant<E>;

  public constructor(variant: ClientErrorVariant<E>) {
    const cause = variant.kind === 'connection' || variant.kind === 'json' ? variant.error : undefined;
    super(variant.kind, messageFor(variant), undefined, { cause });
    this.name = 'ClientError';
    this.variant = variant;
  }

  public get kind(): ClientErrorKind {
    return this.variant.kind;
  }

  public static connection<E>(stage: ConnectionStage, cause: E): ClientError<E> {
    return new ClientError<E>({ kind: 'connection', error: new ConnectionError(stage, cause) });
  }

  public static json<E = never>(error: JsonDecodeFailure): ClientError<E> {
    return new ClientError<E>({ kind: 'json', error });
  }
}

// This error reports a request builder finished without its mandatory fields.
export class IncompleteRequestError extends AppError {
  public readonly missing: ReadonlyArray<'method' | 'id'>;

  public constructor(missing: ReadonlyArray<'method' | 'id'>) {
    super('incomplete_request', `Request is missing required field(s): ${missing.join(', ')}.`, { missing });
    this.name = 'IncompleteRequestError';
    this.missing = missing;
  }
}
