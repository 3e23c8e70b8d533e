/**
 * Chain Service Client Factory
 *
 * Builds a ChainServiceClient from the environment. A `.env` file in the
 * working directory is loaded first when no explicit environment is passed.
 *
 * Usage:
 * ```typescript
 * const client = createChainServiceClient({ timelockEncryptor });
 * const block = await client.getCurrentBlock();
 * await client.close();
 * ```
 */

import { config as dotenvConfig } from 'dotenv';
import type { AxiosAdapter } from 'axios';
import type { Logger } from 'pino';
import type { TimelockEncryptor } from '@subnet-bridge/core/ports';
import { ChainServiceClient } from './chain-service-client.js';
import type { RetryPolicyOptions } from './retry-policy.js';
import { loadChainServiceConfig, type ChainServiceConfigOverrides } from './config.js';
import { logger as defaultLogger } from './logger.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface CreateChainServiceClientOptions {
  /** Environment to read; defaults to process.env after loading .env */
  env?: Record<string, string | undefined>;
  logger?: Logger;
  /** Values that win over the environment */
  overrides?: ChainServiceConfigOverrides;
  /** Backoff tuning; maxAttempts comes from the resolved config */
  retry?: Omit<RetryPolicyOptions, 'maxAttempts'>;
  timelockEncryptor?: TimelockEncryptor;
  adapter?: AxiosAdapter;
}

// --------------------------------------------------------------------------
// Factory Function
// --------------------------------------------------------------------------

export function createChainServiceClient(
  options: CreateChainServiceClientOptions = {}
): ChainServiceClient {
  const logger = options.logger ?? defaultLogger;
  const log = logger.child({ component: 'ChainServiceClientFactory' });

  let env = options.env;
  if (env === undefined) {
    dotenvConfig();
    env = process.env;
  }

  const config = loadChainServiceConfig(log, env, options.overrides);

  return new ChainServiceClient(logger, {
    host: config.host,
    port: config.port,
    timeoutMs: config.timeoutMs,
    retry: { ...options.retry, maxAttempts: config.maxAttempts },
    timelockEncryptor: options.timelockEncryptor,
    adapter: options.adapter,
  });
}
