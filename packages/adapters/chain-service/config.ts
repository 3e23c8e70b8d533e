/**
 * Chain Service Configuration
 *
 * Resolves where the chain service lives and how hard to retry it.
 *
 * Environment variables:
 * - CHAIN_SERVICE_HOST: host name, default: localhost
 * - CHAIN_SERVICE_PORT: port, default: 3000
 * - CHAIN_SERVICE_TIMEOUT_MS: per-request timeout, default: 30000
 * - CHAIN_SERVICE_MAX_ATTEMPTS: retry attempt ceiling, default: 10
 */

import { z } from 'zod';
import type { Logger } from 'pino';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface ChainServiceConfig {
  host: string;
  port: string;
  timeoutMs: number;
  maxAttempts: number;
}

export type ChainServiceConfigOverrides = Partial<ChainServiceConfig>;

// --------------------------------------------------------------------------
// Environment Variables
// --------------------------------------------------------------------------

export const ENV_VARS = {
  HOST: 'CHAIN_SERVICE_HOST',
  PORT: 'CHAIN_SERVICE_PORT',
  TIMEOUT_MS: 'CHAIN_SERVICE_TIMEOUT_MS',
  MAX_ATTEMPTS: 'CHAIN_SERVICE_MAX_ATTEMPTS',
} as const;

export const DEFAULTS = {
  host: 'localhost',
  port: '3000',
  timeoutMs: 30_000,
  maxAttempts: 10,
} as const;

const positiveIntSchema = z.coerce.number().int().positive();

// --------------------------------------------------------------------------
// Configuration Loader
// --------------------------------------------------------------------------

/**
 * Read one variable, logging the value found or the fallback used.
 * Only an unset or empty variable falls back, so the result is never empty.
 */
export function resolveEnvVar(
  env: Record<string, string | undefined>,
  name: string,
  defaultValue: string,
  log: Logger
): string {
  const value = env[name];
  if (value) {
    log.info(`${name}=${value}`);
    return value;
  }
  log.info(`${name} env var not specified, defaulting to ${name}=${defaultValue}`);
  return defaultValue;
}

export function loadChainServiceConfig(
  log: Logger,
  env: Record<string, string | undefined> = process.env,
  overrides: ChainServiceConfigOverrides = {}
): ChainServiceConfig {
  return {
    host: overrides.host || resolveEnvVar(env, ENV_VARS.HOST, DEFAULTS.host, log),
    port: overrides.port || resolveEnvVar(env, ENV_VARS.PORT, DEFAULTS.port, log),
    timeoutMs:
      overrides.timeoutMs ??
      parsePositiveIntOrDefault(env[ENV_VARS.TIMEOUT_MS], ENV_VARS.TIMEOUT_MS, DEFAULTS.timeoutMs, log),
    maxAttempts:
      overrides.maxAttempts ??
      parsePositiveIntOrDefault(env[ENV_VARS.MAX_ATTEMPTS], ENV_VARS.MAX_ATTEMPTS, DEFAULTS.maxAttempts, log),
  };
}

export function buildBaseUrl(config: Pick<ChainServiceConfig, 'host' | 'port'>): string {
  return `http://${config.host}:${config.port}`;
}

// --------------------------------------------------------------------------
// Helper Functions
// --------------------------------------------------------------------------

function parsePositiveIntOrDefault(
  value: string | undefined,
  name: string,
  defaultValue: number,
  log: Logger
): number {
  if (value === undefined || value === '') {
    return defaultValue;
  }

  const parsed = positiveIntSchema.safeParse(value);
  if (!parsed.success) {
    log.warn({ name, value, defaultValue }, 'Invalid number in environment, using default');
    return defaultValue;
  }
  return parsed.data;
}
