import type { ServerConfig } from '../types/server.js';
import {
  DEFAULT_PORT,
  DEFAULT_STATIC_DIR,
  MAX_HEADER_SIZE,
  READ_TIMEOUT_MS,
  SHUTDOWN_TIMEOUT_MS,
  WRITE_TIMEOUT_MS,
} from '../common/consts.js';

function readVariable(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value === undefined || value === '' ? undefined : value;
}

function parsePort(raw: string | undefined): number {
  if (raw === undefined) {
    return DEFAULT_PORT;
  }

  if (!/^\d+$/.test(raw)) {
    throw new Error(`Invalid PORT: ${raw}`);
  }

  const port = Number.parseInt(raw, 10);
  if (port > 65535) {
    throw new Error(`Invalid PORT: ${raw}`);
  }

  return port;
}

/**
 * Resolves the server configuration from environment variables. Unset and empty
 * variables fall back to their defaults; timeouts and limits are fixed.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  const host = readVariable(env, 'HOST');

  return Object.freeze({
    port: parsePort(readVariable(env, 'PORT')),
    ...(host === undefined ? {} : { host }),
    staticDir: readVariable(env, 'STATIC_DIR') ?? DEFAULT_STATIC_DIR,
    readTimeoutMs: READ_TIMEOUT_MS,
    writeTimeoutMs: WRITE_TIMEOUT_MS,
    maxHeaderSize: MAX_HEADER_SIZE,
    shutdownTimeoutMs: SHUTDOWN_TIMEOUT_MS,
  });
}
