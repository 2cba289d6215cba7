// This module carries JSON-RPC messages over HTTP(S) with Node's native fetch.

import type { HttpMessage, InvokeOptions, Transport, TransportReply } from '../rpc/transport.js';
import { AppError, normalizeError } from '../utils/errors.js';

type FetchResponse = Awaited<ReturnType<typeof fetch>>;

export interface FetchTransportOptions {
  // When set, only https: endpoints are dialed.
  secure?: boolean;
}

// This helper streams the fetch body chunk by chunk so the client owns buffering.
async function* readBody(response: FetchResponse): AsyncIterable<Uint8Array> {
  if (!response.body) {
    return;
  }

  const reader = response.body.getReader();
  try {
    while (true) {
      const { done, value } = await reader.read();
      if (done) {
        return;
      }
      if (value instanceof Uint8Array) {
        yield value;
      }
    }
  } finally {
    reader.releaseLock();
  }
}

function collectHeaders(response: FetchResponse): Record<string, string> {
  const headers: Record<string, string> = {};
  response.headers.forEach((value, key) => {
    headers[key] = value;
  });
  return headers;
}

export class FetchTransport implements Transport<AppError> {
  public readonly secure: boolean;

  public constructor(options: FetchTransportOptions = {}) {
    this.secure = options.secure ?? false;
  }

  public async invoke(message: HttpMessage, options?: InvokeOptions): Promise<TransportReply> {
    const target = new URL(message.url);
    if (this.secure && target.protocol !== 'https:') {
      throw new AppError('tls_required', `TLS transport refuses non-https endpoint ${target.protocol}//${target.host}.`);
    }

    const response = await fetch(target, {
      method: message.method,
      headers: { ...message.headers },
      body: message.body,
      signal: options?.signal
    });

    return {
      status: response.status,
      headers: collectHeaders(response),
      body: readBody(response)
    };
  }

  public normalizeError(error: unknown): AppError {
    return normalizeError(error);
  }
}
