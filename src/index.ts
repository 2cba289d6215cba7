// This is the package entrypoint that re-exports the client, protocol model, transports, and ambient helpers.

export { Client, type CallOptions, type ClientOptions, type RequestFactory } from './rpc/client.js';
export { basicAuthorization, createCredentials, type Credentials } from './rpc/credentials.js';
export {
  ClientError,
  ConnectionError,
  IncompleteRequestError,
  type ClientErrorKind,
  type ClientErrorVariant,
  type ConnectionStage,
  type JsonDecodeFailure
} from './rpc/errors.js';
export { NonceCounter } from './rpc/nonce.js';
export { Response, decodeRequest, decodeResponse, jsonValueSchema, serializeRequest } from './rpc/protocol.js';
export { RequestBuilder, buildRequest } from './rpc/request-builder.js';
export { singleChunk, type HttpMessage, type InvokeOptions, type Transport, type TransportReply } from './rpc/transport.js';
export { FetchTransport, type FetchTransportOptions } from './transports/fetch-transport.js';
export { InjectTransport } from './transports/inject-transport.js';
export { createClientFromConfig, loadClientConfig, type ClientConfig } from './config/client-config.js';
export type { JsonPrimitive, JsonValue, Request, RequestId, RpcError } from './types/jsonrpc.js';
export { AppError, normalizeError } from './utils/errors.js';
export { buildLoggerOptions, createLogger, errorForLog, sanitizeForLog } from './utils/logger.js';
export { CLIENT_NAME, CLIENT_VERSION, JSONRPC_VERSION } from './version.js';
