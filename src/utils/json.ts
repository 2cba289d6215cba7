// This utility module keeps JSON parsing explicit so callers decide how a syntax error is reported.

export type JsonParseOutcome = { ok: true; value: unknown } | { ok: false; error: SyntaxError };

const decoder = new TextDecoder('utf-8', { fatal: true });

// This helper decodes UTF-8 bytes and parses them without throwing.
export function parseJson(input: Uint8Array | string): JsonParseOutcome {
  try {
    const text = typeof input === 'string' ? input : decoder.decode(input);
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    if (error instanceof SyntaxError) {
      return { ok: false, error };
    }

    // TextDecoder reports invalid UTF-8 as a TypeError; it is still malformed JSON input.
    const message = error instanceof Error ? error.message : String(error);
    return { ok: false, error: new SyntaxError(message) };
  }
}
