// This test suite verifies environment-driven client configuration.

import { afterEach, describe, expect, it, vi } from 'vitest';
import { createClientFromConfig, loadClientConfig } from '../src/config/client-config.js';
import { AppError } from '../src/utils/errors.js';

describe('client config', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('loads url, credentials, and log level', () => {
    expect(
      loadClientConfig({
        RPC_URL: 'http://localhost:8332',
        RPC_USER: 'alice',
        RPC_PASSWORD: 'secret',
        LOG_LEVEL: 'debug'
      })
    ).toEqual({
      url: 'http://localhost:8332',
      user: 'alice',
      password: 'secret',
      tls: false,
      logLevel: 'debug'
    });
  });

  it('infers TLS from the scheme unless RPC_TLS overrides it', () => {
    expect(loadClientConfig({ RPC_URL: 'https://node.example' }).tls).toBe(true);
    expect(loadClientConfig({ RPC_URL: 'https://node.example', RPC_TLS: 'false' }).tls).toBe(false);
    expect(loadClientConfig({ RPC_URL: 'http://node.example', RPC_TLS: '1' }).tls).toBe(true);
  });

  it('treats empty credentials as unset and defaults the log level', () => {
    expect(loadClientConfig({ RPC_URL: 'http://localhost:8332', RPC_USER: '', RPC_PASSWORD: ' ' })).toEqual({
      url: 'http://localhost:8332',
      user: undefined,
      password: undefined,
      tls: false,
      logLevel: 'info'
    });
  });

  it('rejects a missing or non-http url with the validation issues', () => {
    try {
      loadClientConfig({ RPC_URL: 'ftp://node.example' });
      throw new Error('expected loadClientConfig to fail');
    } catch (error) {
      expect(error).toBeInstanceOf(AppError);
      expect(error).toMatchObject({
        code: 'invalid_config',
        details: { issues: [{ path: 'RPC_URL', message: 'RPC_URL must use http or https.' }] }
      });
    }

    expect(() => loadClientConfig({})).toThrowError('Client configuration is invalid.');
  });

  it('rejects a password without a user', () => {
    expect(() => loadClientConfig({ RPC_URL: 'http://localhost:8332', RPC_PASSWORD: 'secret' })).toThrowError(
      'RPC_PASSWORD is set but RPC_USER is missing.'
    );
  });

  it('builds a TLS client that refuses plaintext endpoints from a TLS config', async () => {
    const fetchMock = vi.fn();
    vi.stubGlobal('fetch', fetchMock);

    const client = createClientFromConfig({ url: 'http://localhost:8332', tls: true, logLevel: 'info' });

    await expect(client.call(client.buildRequest().method('getinfo').finish())).rejects.toMatchObject({
      code: 'connection'
    });
    expect(fetchMock).not.toHaveBeenCalled();
  });
});
