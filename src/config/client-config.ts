// This module reads client settings from the environment and builds a ready-to-use client from them.

import type { Logger } from 'pino';
import { z } from 'zod';
import { Client } from '../rpc/client.js';
import { AppError } from '../utils/errors.js';

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

// Empty variables are treated as unset so `RPC_PASSWORD=` in a .env file does not count as a password.
const optionalText = z
  .string()
  .optional()
  .transform((value) => (value === undefined || value.trim() === '' ? undefined : value));

// Refinements still run after a failed url() check, so the scheme probe must not throw.
function hasHttpScheme(value: string): boolean {
  try {
    const { protocol } = new URL(value);
    return protocol === 'http:' || protocol === 'https:';
  } catch {
    return false;
  }
}

const envSchema = z.object({
  RPC_URL: z.string().url().refine(hasHttpScheme, {
    message: 'RPC_URL must use http or https.'
  }),
  RPC_USER: optionalText,
  RPC_PASSWORD: optionalText,
  RPC_TLS: z.enum(['true', 'false', '1', '0']).optional(),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info')
});

export interface ClientConfig {
  url: string;
  user?: string;
  password?: string;
  tls: boolean;
  logLevel: (typeof LOG_LEVELS)[number];
}

/**
 * Validates client settings from `env`. TLS follows `RPC_TLS` when given and the URL scheme otherwise.
 *
 * @throws AppError `invalid_config` carrying the validation issues.
 */
export function loadClientConfig(env: NodeJS.ProcessEnv = process.env): ClientConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new AppError('invalid_config', 'Client configuration is invalid.', {
      issues: parsed.error.issues.map((issue) => ({
        path: issue.path.join('.'),
        message: issue.message
      }))
    });
  }

  const { RPC_URL, RPC_USER, RPC_PASSWORD, RPC_TLS, LOG_LEVEL } = parsed.data;
  const tls = RPC_TLS === undefined ? new URL(RPC_URL).protocol === 'https:' : RPC_TLS === 'true' || RPC_TLS === '1';

  if (RPC_PASSWORD !== undefined && RPC_USER === undefined) {
    throw new AppError('invalid_config', 'RPC_PASSWORD is set but RPC_USER is missing.', {
      issues: [{ path: 'RPC_USER', message: 'Required when RPC_PASSWORD is set.' }]
    });
  }

  return {
    url: RPC_URL,
    user: RPC_USER,
    password: RPC_PASSWORD,
    tls,
    logLevel: LOG_LEVEL
  };
}

export function createClientFromConfig(config: ClientConfig, logger?: Logger): Client<AppError> {
  logger?.debug(
    {
      event: 'rpc_client_configured',
      url: config.url,
      tls: config.tls,
      authenticated: config.user !== undefined
    },
    'rpc_client_configured'
  );

  const factory = config.tls ? Client.createTls : Client.create;
  return factory(config.url, config.user, config.password, { logger });
}
