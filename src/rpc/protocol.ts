// This module encodes requests and decodes responses for the JSON-RPC 2.0 wire format.

import { z } from 'zod';
import type { JsonValue, Request, RequestId, RpcError } from '../types/jsonrpc.js';
import { parseJson } from '../utils/json.js';
import { ClientError } from './errors.js';

export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([z.string(), z.number(), z.boolean(), z.null(), z.array(jsonValueSchema), z.record(jsonValueSchema)])
);

const requestIdSchema: z.ZodType<RequestId> = z.union([z.number(), z.string()]);

const requestSchema = z.object({
  method: z.string(),
  params: jsonValueSchema,
  id: requestIdSchema,
  jsonrpc: z.string()
});

const I32_MIN = -2_147_483_648;
const I32_MAX = 2_147_483_647;

const rpcErrorSchema = z.object({
  code: z.number().int().min(I32_MIN).max(I32_MAX),
  message: z.string(),
  data: jsonValueSchema.nullish()
});

// Optional members sent as null are read as absent, matching servers that emit every key on every reply.
const responseSchema = z.object({
  result: jsonValueSchema.nullish(),
  error: rpcErrorSchema.nullish(),
  id: jsonValueSchema,
  jsonrpc: z.string().nullish()
});

function toRpcError(raw: z.infer<typeof rpcErrorSchema>): RpcError {
  const { code, message, data } = raw;
  return data === null || data === undefined ? { code, message } : { code, message, data };
}

export interface ResponseFields {
  result?: JsonValue;
  error?: RpcError;
  id: JsonValue;
  jsonrpc?: string;
}

/** A decoded JSON-RPC response. Exactly one of `result`/`error` is expected but not enforced. */
export class Response {
  public readonly result?: JsonValue;
  public readonly error?: RpcError;
  public readonly id: JsonValue;
  public readonly jsonrpc?: string;

  public constructor(fields: ResponseFields) {
    this.result = fields.result;
    this.error = fields.error;
    this.id = fields.id;
    this.jsonrpc = fields.jsonrpc;
    Object.freeze(this);
  }

  public isResult(): boolean {
    return this.result !== undefined;
  }

  public isError(): boolean {
    return this.error !== undefined;
  }

  public rpcError(): RpcError | undefined {
    return this.error;
  }

  /**
   * Extracts the result through `schema`.
   *
   * @returns `undefined` when the response carries no result.
   * @throws ClientError of kind `json` when the result does not match `schema`.
   */
  public decodeResult<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>): T | undefined {
    if (this.result === undefined) {
      return undefined;
    }

    const parsed = schema.safeParse(this.result);
    if (!parsed.success) {
      throw ClientError.json(parsed.error);
    }

    return parsed.data;
  }
}

const encoder = new TextEncoder();

// Serialization of a built request cannot fail for JSON values; anything thrown here is a defect.
export function serializeRequest(request: Request): Uint8Array {
  const ordered = {
    method: request.method,
    params: request.params,
    id: request.id,
    jsonrpc: request.jsonrpc
  };

  return encoder.encode(JSON.stringify(ordered));
}

// This helper parses and validates a serialized request, for servers and round-trip checks.
export function decodeRequest(input: Uint8Array | string): Request {
  const parsed = parseJson(input);
  if (!parsed.ok) {
    throw ClientError.json(parsed.error);
  }

  const validated = requestSchema.safeParse(parsed.value);
  if (!validated.success) {
    throw ClientError.json(validated.error);
  }

  return Object.freeze({ ...validated.data });
}

// This helper turns a buffered response body into a Response or a json-kind ClientError.
export function decodeResponse(input: Uint8Array | string): Response {
  const parsed = parseJson(input);
  if (!parsed.ok) {
    throw ClientError.json(parsed.error);
  }

  const validated = responseSchema.safeParse(parsed.value);
  if (!validated.success) {
    throw ClientError.json(validated.error);
  }

  const { result, error, id, jsonrpc } = validated.data;
  return new Response({
    result: result ?? undefined,
    error: error ? toRpcError(error) : undefined,
    id,
    jsonrpc: jsonrpc ?? undefined
  });
}
