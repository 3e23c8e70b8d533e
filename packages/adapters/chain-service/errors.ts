/**
 * Chain Service Errors
 *
 * Transport and API errors are retryable; protocol, configuration and
 * validation errors fail on first occurrence.
 */

export const CHAIN_SERVICE_ERROR_CODES = {
  TRANSPORT: 'TRANSPORT_ERROR',
  PROTOCOL: 'PROTOCOL_ERROR',
  API: 'API_ERROR',
  CONFIGURATION: 'CONFIGURATION_ERROR',
  VALIDATION: 'VALIDATION_ERROR',
} as const;

export type ChainServiceErrorCode =
  (typeof CHAIN_SERVICE_ERROR_CODES)[keyof typeof CHAIN_SERVICE_ERROR_CODES];

export class ChainServiceError extends Error {
  constructor(
    message: string,
    public readonly code: ChainServiceErrorCode,
    public readonly retryable: boolean,
    public readonly details?: Record<string, unknown>,
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'ChainServiceError';
  }
}

/** Connection refused, timeout, DNS or TLS failure */
export class TransportError extends ChainServiceError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, CHAIN_SERVICE_ERROR_CODES.TRANSPORT, true, details, options);
    this.name = 'TransportError';
  }
}

/** Response body did not parse as the expected shape */
export class ProtocolError extends ChainServiceError {
  constructor(message: string, details?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, CHAIN_SERVICE_ERROR_CODES.PROTOCOL, false, details, options);
    this.name = 'ProtocolError';
  }
}

/**
 * Envelope parsed but carried an application error or an out-of-range
 * status. Retryable.
 */
export class ApiError extends ChainServiceError {
  constructor(
    public readonly errorMessage: string,
    public readonly errorType?: string,
    public readonly statusCode?: number
  ) {
    const typeLabel = errorType ? ` (${errorType})` : '';
    super(`Chain service API error${typeLabel}: ${errorMessage}`, CHAIN_SERVICE_ERROR_CODES.API, true, {
      errorType,
      statusCode,
    });
    this.name = 'ApiError';
  }
}

export class ConfigurationError extends ChainServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, CHAIN_SERVICE_ERROR_CODES.CONFIGURATION, false, details);
    this.name = 'ConfigurationError';
  }
}

/** Caller input failed a precondition, or commit generation came back empty */
export class ValidationError extends ChainServiceError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, CHAIN_SERVICE_ERROR_CODES.VALIDATION, false, details);
    this.name = 'ValidationError';
  }
}

export function isRetryableError(error: unknown): boolean {
  return error instanceof ChainServiceError && error.retryable;
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
