// This module dispatches JSON-RPC messages to a Fastify instance in the same process, without sockets.

import type { FastifyInstance } from 'fastify';
import type { OutgoingHttpHeaders } from 'node:http';
import { singleChunk, type HttpMessage, type InvokeOptions, type Transport, type TransportReply } from '../rpc/transport.js';
import { AppError, normalizeError } from '../utils/errors.js';

// This helper flattens Node's multi-valued header map into single strings.
function flattenHeaders(headers: OutgoingHttpHeaders): Record<string, string> {
  const flattened: Record<string, string> = {};
  for (const [key, value] of Object.entries(headers)) {
    if (value === undefined) {
      continue;
    }
    flattened[key] = Array.isArray(value) ? value.join(', ') : String(value);
  }
  return flattened;
}

export class InjectTransport implements Transport<AppError> {
  private readonly app: FastifyInstance;

  public constructor(app: FastifyInstance) {
    this.app = app;
  }

  // Fastify finishes loading plugins before the first injected request is accepted.
  public async ready(): Promise<void> {
    await this.app.ready();
  }

  public async invoke(message: HttpMessage, options?: InvokeOptions): Promise<TransportReply> {
    options?.signal?.throwIfAborted();

    const target = new URL(message.url);
    const reply = await this.app.inject({
      method: message.method,
      url: `${target.pathname}${target.search}`,
      headers: { ...message.headers },
      payload: Buffer.from(message.body)
    });

    options?.signal?.throwIfAborted();

    return {
      status: reply.statusCode,
      headers: flattenHeaders(reply.headers),
      body: singleChunk(reply.rawPayload)
    };
  }

  public normalizeError(error: unknown): AppError {
    return normalizeError(error);
  }
}
