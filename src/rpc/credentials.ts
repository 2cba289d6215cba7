// This module holds the endpoint credentials shared by every clone of a client.

import { AppError } from '../utils/errors.js';

export interface Credentials {
  readonly url: string;
  readonly user?: string;
  readonly password?: string;
}

function presentOrUndefined(value: string | undefined): string | undefined {
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Validates and freezes credentials. Empty strings count as unset.
 *
 * @throws AppError `invalid_credentials` when a password is given without a user.
 */
export function createCredentials(url: string, user?: string, password?: string): Credentials {
  const normalizedUser = presentOrUndefined(user);
  const normalizedPassword = presentOrUndefined(password);

  if (normalizedPassword !== undefined && normalizedUser === undefined) {
    throw new AppError('invalid_credentials', 'A password was configured without a username.', { url });
  }

  return Object.freeze({
    url,
    user: normalizedUser,
    password: normalizedPassword
  });
}

// This helper builds the Basic authorization value, or undefined when no user is configured.
export function basicAuthorization(credentials: Credentials): string | undefined {
  if (credentials.user === undefined) {
    return undefined;
  }

  const token = Buffer.from(`${credentials.user}:${credentials.password ?? ''}`, 'utf8').toString('base64');
  return `Basic ${token}`;
}
