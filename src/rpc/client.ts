// This module orchestrates one JSON-RPC round-trip: build, serialize, authenticate, dispatch, decode.

import type { Logger } from 'pino';
import { FetchTransport } from '../transports/fetch-transport.js';
import type { Request } from '../types/jsonrpc.js';
import type { AppError } from '../utils/errors.js';
import { errorForLog, sanitizeForLog } from '../utils/logger.js';
import { JSON_CONTENT_TYPE } from '../version.js';
import { basicAuthorization, createCredentials, type Credentials } from './credentials.js';
import { ClientError, type ConnectionStage } from './errors.js';
import { NonceCounter } from './nonce.js';
import { decodeResponse, serializeRequest, type Response } from './protocol.js';
import { buildRequest, type RequestBuilder } from './request-builder.js';
import type { HttpMessage, InvokeOptions, Transport, TransportReply } from './transport.js';

export interface RequestFactory {
  buildRequest(): RequestBuilder;
}

export interface ClientOptions {
  logger?: Logger;
  // Share a counter with clients in other threads; defaults to a fresh counter.
  nonce?: NonceCounter;
}

export type CallOptions = InvokeOptions;

interface ClientState<E> {
  readonly transport: Transport<E>;
  readonly credentials: Credentials;
  readonly nonce: NonceCounter;
  readonly logger?: Logger;
}

// This class is a handle to a remote JSON-RPC endpoint; clones share credentials, transport, and id counter.
export class Client<E> implements RequestFactory {
  private readonly state: ClientState<E>;

  private constructor(state: ClientState<E>) {
    this.state = state;
  }

  // This factory binds the client to any transport that satisfies the contract.
  public static fromTransport<E>(
    transport: Transport<E>,
    url: string,
    user?: string,
    password?: string,
    options: ClientOptions = {}
  ): Client<E> {
    return new Client<E>({
      transport,
      credentials: createCredentials(url, user, password),
      nonce: options.nonce ?? NonceCounter.create(),
      logger: options.logger?.child({
        component: 'rpc_client'
      })
    });
  }

  public static create(url: string, user?: string, password?: string, options?: ClientOptions): Client<AppError> {
    return Client.fromTransport(new FetchTransport({ secure: false }), url, user, password, options);
  }

  public static createTls(url: string, user?: string, password?: string, options?: ClientOptions): Client<AppError> {
    return Client.fromTransport(new FetchTransport({ secure: true }), url, user, password, options);
  }

  public get credentials(): Credentials {
    return this.state.credentials;
  }

  public get nonce(): NonceCounter {
    return this.state.nonce;
  }

  public clone(): Client<E> {
    return new Client<E>(this.state);
  }

  // Returns the id the next built request will receive, without consuming it.
  public nextNonce(): number {
    return this.state.nonce.peek();
  }

  public buildRequest(): RequestBuilder {
    return buildRequest().id(this.state.nonce.next());
  }

  // This method waits until the transport accepts calls; transports without a readiness hook are always ready.
  public async ready(options?: CallOptions): Promise<void> {
    const { transport } = this.state;
    if (!transport.ready) {
      return;
    }

    try {
      await transport.ready(options);
    } catch (error) {
      throw this.connectionFailure('poll', error);
    }
  }

  public async call(request: Request, options?: CallOptions): Promise<Response> {
    const { credentials } = this.state;
    const startedAt = Date.now();
    const message = this.buildMessage(request);

    this.log('debug', 'rpc_call_started', {
      method: request.method,
      rpcRequestId: request.id,
      params: request.params,
      authenticated: credentials.user !== undefined
    });

    try {
      await this.ready(options);
      const reply = await this.dispatch(message, options);
      const body = await this.bufferBody(reply);

      const response = decodeResponse(body);
      this.log('debug', 'rpc_call_completed', {
        method: request.method,
        rpcRequestId: request.id,
        status: reply.status,
        isError: response.isError(),
        rpcErrorCode: response.error?.code,
        durationMs: Date.now() - startedAt
      });
      return response;
    } catch (error) {
      this.log('warn', 'rpc_call_failed', {
        method: request.method,
        rpcRequestId: request.id,
        kind: error instanceof ClientError ? error.kind : undefined,
        durationMs: Date.now() - startedAt,
        error: errorForLog(error)
      });
      throw error;
    }
  }

  // One-shot form: readiness, dispatch, and decoding in a single awaited call.
  public async send(request: Request, options?: CallOptions): Promise<Response> {
    return this.call(request, options);
  }

  private buildMessage(request: Request): HttpMessage {
    const headers: Record<string, string> = {
      'Content-Type': JSON_CONTENT_TYPE
    };

    const authorization = basicAuthorization(this.state.credentials);
    if (authorization !== undefined) {
      headers.Authorization = authorization;
    }

    return {
      method: 'POST',
      url: this.state.credentials.url,
      headers,
      body: serializeRequest(request)
    };
  }

  private async dispatch(message: HttpMessage, options?: CallOptions): Promise<TransportReply> {
    try {
      return await this.state.transport.invoke(message, options);
    } catch (error) {
      throw this.connectionFailure('service', error);
    }
  }

  // Responses are not streamed to the caller; the whole body is collected before decoding.
  private async bufferBody(reply: TransportReply): Promise<Buffer> {
    const chunks: Uint8Array[] = [];
    try {
      for await (const chunk of reply.body) {
        chunks.push(chunk);
      }
    } catch (error) {
      throw this.connectionFailure('body', error);
    }
    return Buffer.concat(chunks);
  }

  private connectionFailure(stage: ConnectionStage, error: unknown): ClientError<E> {
    return ClientError.connection(stage, this.state.transport.normalizeError(error));
  }

  private log(level: 'debug' | 'info' | 'warn' | 'error', event: string, details?: Record<string, unknown>): void {
    const { logger } = this.state;
    if (!logger) {
      return;
    }

    const sanitized = sanitizeForLog(details);
    logger[level](
      {
        event,
        ...(typeof sanitized === 'object' && sanitized !== null ? sanitized : {})
      },
      event
    );
  }
}
