// This file defines the JSON-RPC 2.0 wire model shared by the request builder, codec, and transports.

export type JsonPrimitive = string | number | boolean | null;

export type JsonValue = JsonPrimitive | JsonValue[] | { [key: string]: JsonValue };

// Request ids are restricted to numbers and strings; servers may still echo any JSON value.
export type RequestId = number | string;

export interface Request {
  readonly method: string;
  readonly params: JsonValue;
  readonly id: RequestId;
  readonly jsonrpc: string;
}

export interface RpcError {
  readonly code: number;
  readonly message: string;
  readonly data?: JsonValue;
}
