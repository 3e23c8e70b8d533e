/**
 * Transport Session
 *
 * Owns the pooled keep-alive connection context used for every chain service
 * request. Created on first use, shared by all concurrent calls of one client,
 * and recreated transparently after it has been closed.
 */

import { Agent } from 'node:http';
import axios from 'axios';
import type { AxiosAdapter, AxiosInstance } from 'axios';
import type { Logger } from 'pino';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export interface TransportSessionConfig {
  /** e.g. http://localhost:3000 */
  baseUrl: string;
  /** Total pooled connections across hosts (default: 256) */
  maxConnections?: number;
  /** Pooled connections per destination host (default: 10) */
  maxConnectionsPerHost?: number;
  /** Drop idle keep-alive sockets after `idleSocketTimeoutMs` (default: true) */
  cleanupStaleConnections?: boolean;
  /** Idle time before a pooled socket is discarded (default: 15000) */
  idleSocketTimeoutMs?: number;
  /** Per-request timeout (default: 30000) */
  timeoutMs?: number;
  /** Replaces the HTTP adapter, for in-process transports */
  adapter?: AxiosAdapter;
}

type ResolvedTransportSessionConfig = Required<Omit<TransportSessionConfig, 'adapter'>> &
  Pick<TransportSessionConfig, 'adapter'>;

interface ActiveSession {
  agent: Agent;
  client: AxiosInstance;
}

// --------------------------------------------------------------------------
// Constants
// --------------------------------------------------------------------------

export const DEFAULT_TRANSPORT_CONFIG = {
  maxConnections: 256,
  maxConnectionsPerHost: 10,
  cleanupStaleConnections: true,
  idleSocketTimeoutMs: 15_000,
  timeoutMs: 30_000,
} as const;

export const JSON_HEADERS = {
  'Content-Type': 'application/json',
  Accept: 'application/json',
} as const;

// --------------------------------------------------------------------------
// TransportSession
// --------------------------------------------------------------------------

export class TransportSession {
  private readonly log: Logger;
  private readonly config: ResolvedTransportSessionConfig;
  private session: ActiveSession | null = null;
  private sessionsCreated = 0;

  constructor(logger: Logger, config: TransportSessionConfig) {
    this.log = logger.child({ component: 'TransportSession' });
    this.config = {
      baseUrl: config.baseUrl,
      maxConnections: config.maxConnections ?? DEFAULT_TRANSPORT_CONFIG.maxConnections,
      maxConnectionsPerHost:
        config.maxConnectionsPerHost ?? DEFAULT_TRANSPORT_CONFIG.maxConnectionsPerHost,
      cleanupStaleConnections:
        config.cleanupStaleConnections ?? DEFAULT_TRANSPORT_CONFIG.cleanupStaleConnections,
      idleSocketTimeoutMs: config.idleSocketTimeoutMs ?? DEFAULT_TRANSPORT_CONFIG.idleSocketTimeoutMs,
      timeoutMs: config.timeoutMs ?? DEFAULT_TRANSPORT_CONFIG.timeoutMs,
      adapter: config.adapter,
    };
  }

  /**
   * Return the live HTTP client, creating the pool if there is none.
   * Callers beyond the connection limits queue inside the agent.
   */
  acquire(): AxiosInstance {
    if (this.session === null) {
      this.session = this.createSession();
    }
    return this.session.client;
  }

  isOpen(): boolean {
    return this.session !== null;
  }

  /**
   * Release every pooled connection. Safe with no session and safe to call
   * repeatedly or concurrently.
   */
  async close(): Promise<void> {
    const current = this.session;
    if (current === null) {
      return;
    }
    this.session = null;
    current.agent.destroy();
    this.log.debug({ generation: this.sessionsCreated }, 'Transport session closed');
  }

  private createSession(): ActiveSession {
    const agent = new Agent({
      keepAlive: true,
      maxSockets: this.config.maxConnectionsPerHost,
      maxTotalSockets: this.config.maxConnections,
      scheduling: 'lifo',
      ...(this.config.cleanupStaleConnections ? { timeout: this.config.idleSocketTimeoutMs } : {}),
    });

    const client = axios.create({
      baseURL: this.config.baseUrl,
      headers: { ...JSON_HEADERS },
      httpAgent: agent,
      timeout: this.config.timeoutMs,
      // Status and body are judged by the executor and classifier, not axios
      validateStatus: () => true,
      responseType: 'text',
      transformResponse: [(data: unknown) => data],
      ...(this.config.adapter ? { adapter: this.config.adapter } : {}),
    });

    this.sessionsCreated++;
    this.log.debug(
      {
        baseUrl: this.config.baseUrl,
        maxConnections: this.config.maxConnections,
        maxConnectionsPerHost: this.config.maxConnectionsPerHost,
        generation: this.sessionsCreated,
      },
      'Transport session created'
    );

    return { agent, client };
  }
}
