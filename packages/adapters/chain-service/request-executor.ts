/**
 * Request Executor
 *
 * Performs a single GET or POST against the chain service and parses the body
 * into a response envelope. No retries here; see RetryPolicy.
 */

import axios from 'axios';
import type { AxiosResponse } from 'axios';
import type { Logger } from 'pino';
import type { ResponseEnvelope } from '@subnet-bridge/core/ports';
import { validateEnvelope } from './chain-service-types.js';
import { ProtocolError, TransportError, describeError } from './errors.js';
import type { TransportSession } from './transport-session.js';

// --------------------------------------------------------------------------
// Types
// --------------------------------------------------------------------------

export type QueryParams = Record<string, string | number | boolean | undefined>;

export type EndpointRequest =
  | { readonly method: 'GET'; readonly path: string; readonly query?: QueryParams }
  | { readonly method: 'POST'; readonly path: string; readonly body?: unknown };

/** Longest body excerpt carried on a ProtocolError */
const BODY_PREVIEW_CHARS = 200;

// --------------------------------------------------------------------------
// RequestExecutor
// --------------------------------------------------------------------------

export class RequestExecutor {
  private readonly log: Logger;

  constructor(
    private readonly session: TransportSession,
    logger: Logger
  ) {
    this.log = logger.child({ component: 'RequestExecutor' });
  }

  async get(path: string, query?: QueryParams): Promise<ResponseEnvelope> {
    return this.execute({ method: 'GET', path, query });
  }

  async post(path: string, body?: unknown): Promise<ResponseEnvelope> {
    return this.execute({ method: 'POST', path, body });
  }

  async execute(request: EndpointRequest): Promise<ResponseEnvelope> {
    const client = this.session.acquire();

    let response: AxiosResponse<unknown>;
    try {
      response =
        request.method === 'GET'
          ? await client.get(request.path, { params: compactQuery(request.query) })
          : await client.post(request.path, request.body ?? {});
    } catch (error) {
      if (axios.isAxiosError(error) && error.response === undefined) {
        this.log.error(
          { path: request.path, method: request.method, code: error.code, error: error.message },
          'Error connecting to chain service'
        );
        throw new TransportError(
          `Error connecting to chain service: ${error.message}`,
          { path: request.path, method: request.method, code: error.code },
          { cause: error }
        );
      }
      this.log.error(
        { path: request.path, method: request.method, error: describeError(error) },
        'Unexpected chain service request failure'
      );
      throw error;
    }

    return this.parseEnvelope(request, response);
  }

  private parseEnvelope(request: EndpointRequest, response: AxiosResponse<unknown>): ResponseEnvelope {
    const raw = response.data;
    let body: unknown = raw;
    if (typeof raw === 'string') {
      try {
        body = JSON.parse(raw);
      } catch (error) {
        this.log.error(
          { path: request.path, status: response.status, error: describeError(error) },
          'Error decoding chain service response'
        );
        throw new ProtocolError(
          `Chain service returned a non-JSON body (HTTP ${response.status})`,
          {
            path: request.path,
            status: response.status,
            bodyPreview: raw.slice(0, BODY_PREVIEW_CHARS),
          },
          { cause: error }
        );
      }
    }

    try {
      return validateEnvelope(body);
    } catch (error) {
      this.log.error({ path: request.path, status: response.status }, 'Malformed chain service envelope');
      throw error;
    }
  }
}

/** Drop absent values so optional parameters never reach the query string */
export function compactQuery(query?: QueryParams): Record<string, string | number | boolean> | undefined {
  if (!query) {
    return undefined;
  }
  const compacted: Record<string, string | number | boolean> = {};
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) {
      compacted[key] = value;
    }
  }
  return compacted;
}
