/**
 * Chain Service Client
 *
 * Typed access to the chain service. Every call goes through the same path:
 *
 *   operation -> RetryPolicy -> RequestExecutor -> TransportSession
 *             <- classifyResponse <- envelope
 *
 * and the envelope `data` is then validated against the operation's record.
 */

import type { AxiosAdapter } from 'axios';
import type { Logger } from 'pino';
import type {
  AxonInfo,
  IChainServiceClient,
  KeyringPair,
  ResponseEnvelope,
  ServeAxonPayload,
  SetWeightsPayload,
  SubnetHyperparameters,
  SubnetMetagraph,
  TimelockEncryptor,
} from '@subnet-bridge/core/ports';
import {
  HotkeyCheckSchema,
  LatestBlockSchema,
  SignMessageSchema,
  VerifyMessageSchema,
  parseRecord,
  validateKeyringPair,
  validateSubnetHyperparameters,
  validateSubnetMetagraph,
} from './chain-service-types.js';
import { buildBaseUrl } from './config.js';
import { ChainServiceError, ConfigurationError, ValidationError, describeError } from './errors.js';
import { RequestExecutor, type EndpointRequest, type QueryParams } from './request-executor.js';
import { classifyResponse } from './response-classifier.js';
import { RetryPolicy, type RetryPolicyOptions } from './retry-policy.js';
import { TransportSession, type TransportSessionConfig } from './transport-session.js';
import { WeightSubmitter } from './weight-submission.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface ChainServiceClientConfig {
  host: string;
  port: string | number;
  /** Per-request timeout in milliseconds */
  timeoutMs?: number;
  retry?: RetryPolicyOptions;
  pool?: Pick<
    TransportSessionConfig,
    'maxConnections' | 'maxConnectionsPerHost' | 'cleanupStaleConnections' | 'idleSocketTimeoutMs'
  >;
  /** Required for subnets with commit-reveal weights */
  timelockEncryptor?: TimelockEncryptor;
  /** Replaces the HTTP adapter, for in-process transports */
  adapter?: AxiosAdapter;
}

export interface ChainServiceClientStats {
  totalRequests: number;
  successfulRequests: number;
  failedRequests: number;
  retries: number;
}

export const ENDPOINTS = {
  subnetMetagraph: (netuid: number) => `chain/subnet-metagraph/${netuid}`,
  subnetHyperparameters: (netuid: number) => `chain/subnet-hyperparameters/${netuid}`,
  latestBlock: 'chain/latest-block',
  checkHotkey: 'chain/check-hotkey',
  serveAxon: 'chain/serve-axon',
  signMessage: 'substrate/sign-message/sign',
  verifyMessage: 'substrate/sign-message/verify',
  keyringPairInfo: 'substrate/keyring-pair-info',
} as const;

/** Serve-axon fields the caller may leave out */
export const SERVE_AXON_DEFAULTS = {
  version: 1,
  ipType: 4,
  protocol: 4,
  placeholder1: 0,
  placeholder2: 0,
} as const;

const HEX_SIGNATURE_PREFIX = '0x';

// --------------------------------------------------------------------------
// ChainServiceClient
// --------------------------------------------------------------------------

export class ChainServiceClient implements IChainServiceClient {
  private readonly log: Logger;
  private readonly session: TransportSession;
  private readonly executor: RequestExecutor;
  private readonly retry: RetryPolicy;
  private readonly weights: WeightSubmitter;
  readonly baseUrl: string;

  private stats: ChainServiceClientStats = {
    totalRequests: 0,
    successfulRequests: 0,
    failedRequests: 0,
    retries: 0,
  };

  constructor(logger: Logger, config: ChainServiceClientConfig) {
    this.log = logger.child({ component: 'ChainServiceClient' });

    if (!config.host) {
      this.log.error({ host: config.host }, 'Could not resolve chain service host');
      throw new ConfigurationError('Could not resolve chain service host');
    }
    if (!config.port) {
      this.log.error({ port: config.port }, 'Could not resolve chain service port');
      throw new ConfigurationError('Could not resolve chain service port');
    }
    this.baseUrl = buildBaseUrl({ host: config.host, port: String(config.port) });

    this.session = new TransportSession(logger, {
      ...config.pool,
      baseUrl: this.baseUrl,
      timeoutMs: config.timeoutMs,
      adapter: config.adapter,
    });
    this.executor = new RequestExecutor(this.session, logger);

    const onRetry = config.retry?.onRetry;
    this.retry = new RetryPolicy(logger, {
      ...config.retry,
      onRetry: (event) => {
        this.stats.retries++;
        onRetry?.(event);
      },
    });

    this.weights = new WeightSubmitter({
      logger,
      getSubnetHyperparameters: (netuid) => this.getSubnetHyperparameters(netuid),
      getCurrentBlock: () => this.getCurrentBlock(),
      post: (path, body) => this.post(path, body),
      encryptor: config.timelockEncryptor,
    });

    this.log.info(
      { baseUrl: this.baseUrl, maxAttempts: this.retry.getMaxAttempts() },
      'ChainServiceClient initialized'
    );
  }

  // --------------------------------------------------------------------------
  // Subnet State
  // --------------------------------------------------------------------------

  /**
   * Fetch the subnet metagraph. Each axon is filled in place with the hotkey
   * and coldkey at the same uid.
   */
  async getMetagraph(netuid: number): Promise<SubnetMetagraph> {
    const envelope = await this.get(ENDPOINTS.subnetMetagraph(netuid));
    const metagraph = this.validated('subnet metagraph', () =>
      validateSubnetMetagraph(envelope.data ?? {})
    );

    metagraph.axons.forEach((axon, uid) => {
      axon.hotkey = metagraph.hotkeys[uid] ?? '';
      axon.coldkey = metagraph.coldkeys[uid] ?? '';
    });

    return metagraph;
  }

  async getHotkeys(netuid: number): Promise<string[]> {
    const metagraph = await this.getMetagraph(netuid);
    return metagraph.hotkeys;
  }

  /** Axons of the subnet; an empty subnet yields an empty list */
  async getAxons(netuid: number): Promise<AxonInfo[]> {
    const metagraph = await this.getMetagraph(netuid);
    if (metagraph.axons.length === 0) {
      this.log.warn({ netuid }, 'No axons found in metagraph response');
    }
    return metagraph.axons;
  }

  async getCurrentBlock(): Promise<number> {
    const envelope = await this.get(ENDPOINTS.latestBlock);
    const { blockNumber } = this.validated('latest block', () =>
      parseRecord(LatestBlockSchema, envelope.data ?? {}, 'latest block')
    );
    return blockNumber;
  }

  async getSubnetHyperparameters(netuid: number): Promise<SubnetHyperparameters> {
    const envelope = await this.get(ENDPOINTS.subnetHyperparameters(netuid));
    return this.validated('subnet hyperparameters', () =>
      validateSubnetHyperparameters(envelope.data ?? {})
    );
  }

  async isHotkeyRegistered(netuid: number, hotkey: string, block?: number): Promise<boolean> {
    const envelope = await this.get(ENDPOINTS.checkHotkey, { netuid, hotkey, block });
    const result = this.validated('hotkey check', () =>
      parseRecord(HotkeyCheckSchema, envelope.data ?? {}, 'hotkey check')
    );
    return result.isHotkeyValid ?? false;
  }

  // --------------------------------------------------------------------------
  // Submissions
  // --------------------------------------------------------------------------

  async serveAxon(payload: ServeAxonPayload): Promise<ResponseEnvelope> {
    return this.post(ENDPOINTS.serveAxon, {
      netuid: payload.netuid,
      version: payload.version ?? SERVE_AXON_DEFAULTS.version,
      ip: payload.ip,
      port: payload.port,
      ipType: payload.ipType ?? SERVE_AXON_DEFAULTS.ipType,
      protocol: payload.protocol ?? SERVE_AXON_DEFAULTS.protocol,
      placeholder1: payload.placeholder1 ?? SERVE_AXON_DEFAULTS.placeholder1,
      placeholder2: payload.placeholder2 ?? SERVE_AXON_DEFAULTS.placeholder2,
    });
  }

  /**
   * Submit validator weights, directly or as a time-locked commit depending
   * on the subnet's commit-reveal setting.
   */
  async setWeights(payload: SetWeightsPayload): Promise<ResponseEnvelope> {
    const result = await this.weights.submit(payload);
    return result.response;
  }

  // --------------------------------------------------------------------------
  // Signing Identity
  // --------------------------------------------------------------------------

  /**
   * Sign with the service's configured identity. A response without a
   * signature is logged and yields undefined rather than throwing.
   */
  async signMessage(message: string): Promise<string | undefined> {
    const envelope = await this.post(ENDPOINTS.signMessage, { message });
    const data = this.validated('sign response', () =>
      parseRecord(SignMessageSchema, envelope.data, 'sign response')
    );
    const signature = data?.signature;
    if (!signature) {
      this.log.error({ reason: data?.error }, 'Failed to sign message using chain service');
      return undefined;
    }
    return signature;
  }

  async verify(hotkey: string, message: string, signature: string): Promise<boolean> {
    if (!signature.startsWith(HEX_SIGNATURE_PREFIX)) {
      this.log.error({ hotkey }, 'Signature to verify is not a hex string');
      throw new ValidationError(`Expected signature to be a hex string, got: ${signature}`, {
        hotkey,
      });
    }

    const envelope = await this.post(ENDPOINTS.verifyMessage, {
      message,
      signature,
      signeeAddress: hotkey,
    });
    const data = this.validated('verify response', () =>
      parseRecord(VerifyMessageSchema, envelope.data, 'verify response')
    );
    if (!data) {
      this.log.error({ hotkey }, 'No response data from chain service while verifying signature');
      return false;
    }
    return data.valid ?? false;
  }

  async getKeyringPair(): Promise<KeyringPair> {
    const envelope = await this.get(ENDPOINTS.keyringPairInfo);
    return this.validated('keyring pair', () => validateKeyringPair(envelope.data ?? {}));
  }

  // --------------------------------------------------------------------------
  // Lifecycle
  // --------------------------------------------------------------------------

  async close(): Promise<void> {
    this.log.info('Closing ChainServiceClient');
    await this.session.close();
  }

  getStats(): ChainServiceClientStats {
    return { ...this.stats };
  }

  // --------------------------------------------------------------------------
  // Private Methods
  // --------------------------------------------------------------------------

  private async get(path: string, query?: QueryParams): Promise<ResponseEnvelope> {
    return this.send({ method: 'GET', path, query });
  }

  private async post(path: string, body: unknown): Promise<ResponseEnvelope> {
    return this.send({ method: 'POST', path, body });
  }

  /** Run a record validation, logging the failure before it propagates */
  private validated<T>(record: string, validate: () => T): T {
    try {
      return validate();
    } catch (error) {
      this.log.error(
        {
          record,
          error: describeError(error),
          details: error instanceof ChainServiceError ? error.details : undefined,
        },
        'Invalid chain service record'
      );
      throw error;
    }
  }

  /** One retried, classified request */
  private async send(request: EndpointRequest): Promise<ResponseEnvelope> {
    this.stats.totalRequests++;
    try {
      const envelope = await this.retry.execute(request.path, async () =>
        classifyResponse(await this.executor.execute(request))
      );
      this.stats.successfulRequests++;
      return envelope;
    } catch (error) {
      this.stats.failedRequests++;
      throw error;
    }
  }
}
