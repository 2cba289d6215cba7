// This test suite verifies request encoding and response decoding for the JSON-RPC wire format.

import { describe, expect, it } from 'vitest';
import { z } from 'zod';
import { ClientError } from '../src/rpc/errors.js';
import { decodeRequest, decodeResponse, Response, serializeRequest } from '../src/rpc/protocol.js';
import { buildRequest } from '../src/rpc/request-builder.js';

const infoSchema = z.object({ version: z.number() });

function decodeFailure(input: string): ClientError {
  try {
    decodeResponse(input);
  } catch (error) {
    if (error instanceof ClientError) {
      return error;
    }
    throw error;
  }
  throw new Error('expected decodeResponse to fail');
}

describe('request serialization', () => {
  it('writes method, params, id, jsonrpc in wire order', () => {
    const request = buildRequest().jsonrpc('2.0').id(1).params(null).method('getinfo').finish();

    expect(new TextDecoder().decode(serializeRequest(request))).toBe(
      '{"method":"getinfo","params":null,"id":1,"jsonrpc":"2.0"}'
    );
  });

  it('decodes a serialized request field for field', () => {
    const request = buildRequest()
      .method('sendrawtransaction')
      .params(['00ff', { maxfeerate: 0.1 }, [true, null]])
      .id('abc-7')
      .finish();

    expect(decodeRequest(serializeRequest(request))).toEqual(request);
  });

  it('rejects a request without an id', () => {
    expect(() => decodeRequest('{"method":"getinfo","params":null,"jsonrpc":"2.0"}')).toThrowError(ClientError);
  });
});

describe('response decoding', () => {
  it('decodes a result response and extracts a typed result', () => {
    const response = decodeResponse('{"result":{"version":1},"id":1,"jsonrpc":"2.0"}');

    expect(response).toBeInstanceOf(Response);
    expect(response.isResult()).toBe(true);
    expect(response.isError()).toBe(false);
    expect(response.id).toBe(1);
    expect(response.jsonrpc).toBe('2.0');
    expect(response.decodeResult(infoSchema)).toEqual({ version: 1 });
    expect(response.rpcError()).toBeUndefined();
  });

  it('decodes an error response with data', () => {
    const response = decodeResponse(
      '{"result":null,"error":{"code":-32601,"message":"Method not found","data":{"method":"nope"}},"id":"x"}'
    );

    expect(response.isResult()).toBe(false);
    expect(response.isError()).toBe(true);
    expect(response.rpcError()).toEqual({ code: -32601, message: 'Method not found', data: { method: 'nope' } });
    expect(response.jsonrpc).toBeUndefined();
    expect(response.decodeResult(infoSchema)).toBeUndefined();
  });

  it('treats a null error beside a result as absent', () => {
    const response = decodeResponse('{"result":42,"error":null,"id":5}');

    expect(response.isResult()).toBe(true);
    expect(response.isError()).toBe(false);
    expect(response.decodeResult(z.number())).toBe(42);
  });

  it('accepts a null id and ignores unknown fields', () => {
    const response = decodeResponse('{"error":{"code":-32700,"message":"Parse error"},"id":null,"extra":true}');

    expect(response.id).toBeNull();
    expect(response.error?.code).toBe(-32700);
  });

  it('treats a null jsonrpc member as absent', () => {
    const response = decodeResponse('{"result":1,"id":1,"jsonrpc":null}');

    expect(response.isResult()).toBe(true);
    expect(response.jsonrpc).toBeUndefined();
    expect(response.decodeResult(z.number())).toBe(1);
  });

  it('drops null error data', () => {
    const response = decodeResponse('{"error":{"code":-1,"message":"x","data":null},"id":1}');
    const rpcError = response.rpcError();

    expect(rpcError).toEqual({ code: -1, message: 'x' });
    expect(rpcError !== undefined && 'data' in rpcError).toBe(false);
  });

  it('accepts error codes at the 32-bit bounds and rejects codes beyond them', () => {
    expect(decodeResponse('{"error":{"code":-2147483648,"message":"low"},"id":1}').error?.code).toBe(-2147483648);
    expect(decodeResponse('{"error":{"code":2147483647,"message":"high"},"id":1}').error?.code).toBe(2147483647);
    expect(decodeFailure('{"error":{"code":2147483648,"message":"over"},"id":1}').kind).toBe('json');
    expect(decodeFailure('{"error":{"code":1e20,"message":"huge"},"id":1}').kind).toBe('json');
  });

  it('reports malformed bytes as a json error carrying the syntax error', () => {
    const failure = decodeFailure('not json at all');

    expect(failure.kind).toBe('json');
    expect(failure.variant.kind === 'json' && failure.variant.error).toBeInstanceOf(SyntaxError);
  });

  it('reports a response without id as a json error carrying the zod issues', () => {
    const failure = decodeFailure('{"result":1}');

    expect(failure.kind).toBe('json');
    expect(failure.variant.kind === 'json' && failure.variant.error).toBeInstanceOf(z.ZodError);
  });

  it('reports a non-integer error code as a json error', () => {
    expect(decodeFailure('{"error":{"code":1.5,"message":"odd"},"id":1}').kind).toBe('json');
  });

  it('reports invalid UTF-8 bytes as a json error', () => {
    expect(() => decodeResponse(new Uint8Array([0xff, 0xfe, 0x7b]))).toThrowError(ClientError);
  });

  it('throws a json error when the result does not fit the schema', () => {
    const response = decodeResponse('{"result":{"version":"one"},"id":1}');

    expect(() => response.decodeResult(infoSchema)).toThrowError(ClientError);
  });
});
