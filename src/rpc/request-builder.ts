// This module accumulates request fields in any order and validates completeness on finish.

import type { JsonValue, Request, RequestId } from '../types/jsonrpc.js';
import { JSONRPC_VERSION } from '../version.js';
import { IncompleteRequestError } from './errors.js';

export class RequestBuilder {
  private methodName?: string;
  private requestId?: RequestId;
  private paramsValue?: JsonValue;
  private version?: string;

  public method(name: string): this {
    this.methodName = name;
    return this;
  }

  public id(value: RequestId): this {
    this.requestId = value;
    return this;
  }

  public params(value: JsonValue): this {
    this.paramsValue = value;
    return this;
  }

  public jsonrpc(version: string): this {
    this.version = version;
    return this;
  }

  /**
   * Produces an immutable request. `params` defaults to `null` and `jsonrpc` to `"2.0"`.
   * Non-finite numbers inside `params` are the caller's to avoid; JSON writes them as `null`.
   *
   * @throws IncompleteRequestError when `method` was never set, or `id` was never set or is not a finite number.
   */
  public finish(): Request {
    const { methodName, requestId } = this;
    // NaN and Infinity serialize as null, which no longer identifies the request.
    const usableId = typeof requestId === 'number' && !Number.isFinite(requestId) ? undefined : requestId;

    const missing: Array<'method' | 'id'> = [];
    if (methodName === undefined) {
      missing.push('method');
    }
    if (usableId === undefined) {
      missing.push('id');
    }

    if (methodName === undefined || usableId === undefined) {
      throw new IncompleteRequestError(missing);
    }

    return Object.freeze({
      method: methodName,
      params: this.paramsValue === undefined ? null : this.paramsValue,
      id: usableId,
      jsonrpc: this.version ?? JSONRPC_VERSION
    });
  }
}

export function buildRequest(): RequestBuilder {
  return new RequestBuilder();
}
