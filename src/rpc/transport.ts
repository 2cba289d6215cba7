// This file defines the capability a network layer provides to carry one serialized request.

export interface HttpMessage {
  readonly method: 'POST';
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body: Uint8Array;
}

export interface TransportReply {
  readonly status: number;
  readonly headers: Readonly<Record<string, string>>;
  // Chunks as the transport receives them; the client buffers the whole body before decoding.
  readonly body: AsyncIterable<Uint8Array>;
}

export interface InvokeOptions {
  signal?: AbortSignal;
}

/**
 * A network layer usable by the client. `E` is the transport's own error type;
 * `normalizeError` maps anything thrown by `ready`, `invoke` or the body stream into it.
 *
 * Implementations may be invoked concurrently and must keep invocations independent.
 */
export interface Transport<E> {
  ready?(options?: InvokeOptions): Promise<void>;
  invoke(message: HttpMessage, options?: InvokeOptions): Promise<TransportReply>;
  normalizeError(error: unknown): E;
}

// This helper adapts one fully buffered payload to the chunked body shape.
export async function* singleChunk(payload: Uint8Array): AsyncIterable<Uint8Array> {
  if (payload.byteLength > 0) {
    yield payload;
  }
}
