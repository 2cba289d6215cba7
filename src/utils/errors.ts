// This module provides the typed application error every other error in the client derives from.

export class AppError extends Error {
  public readonly code: string;
  public readonly details?: unknown;

  public constructor(code: string, message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'AppError';
    this.code = code;
    this.details = details;
  }
}

// This helper recognizes abort rejections from fetch, fastify inject, and AbortSignal.timeout.
function isAbortError(error: unknown): boolean {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

// This helper normalizes unknown transport failures into an AppError while keeping the original as cause.
export function normalizeError(error: unknown): AppError {
  if (error instanceof AppError) {
    return error;
  }

  if (isAbortError(error)) {
    return new AppError('aborted', 'The request was aborted before a response arrived.', undefined, {
      cause: error
    });
  }

  if (error instanceof Error) {
    return new AppError('transport_error', error.message, undefined, { cause: error });
  }

  return new AppError('transport_error', 'An unexpected transport failure occurred.', {
    thrown: String(error)
  });
}
