// This module centralizes client identity values so logs and protocol defaults stay in sync.

export const CLIENT_NAME = 'jsonrpc-client-core';
export const CLIENT_VERSION = '0.1.0';
export const JSONRPC_VERSION = '2.0';
export const JSON_CONTENT_TYPE = 'application/json';
