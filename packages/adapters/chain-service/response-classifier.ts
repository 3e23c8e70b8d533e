/**
 * Response Error Classifier
 *
 * Turns "transport succeeded but the envelope reports a failure" into an
 * ApiError. Runs after every successful request, inside the retry loop.
 */

import type { EnvelopeErrorVariant, ResponseEnvelope } from '@subnet-bridge/core/ports';
import { ApiError } from './errors.js';

const HTTP_OK_MIN = 200;
const HTTP_OK_MAX = 299;

/**
 * Parse the envelope `error` field. Empty values (empty string, null, false,
 * 0, {} and []) carry no error.
 */
export function parseEnvelopeError(error: unknown): EnvelopeErrorVariant {
  if (!error) {
    return { kind: 'none' };
  }

  if (typeof error === 'string') {
    return { kind: 'message', message: error };
  }

  if (Array.isArray(error)) {
    return error.length === 0 ? { kind: 'none' } : { kind: 'message', message: JSON.stringify(error) };
  }

  if (typeof error === 'object') {
    const fields = Object.entries(error);
    if (fields.length === 0) {
      return { kind: 'none' };
    }
    const record = Object.fromEntries(fields);
    const message =
      typeof record.message === 'string' && record.message.length > 0
        ? record.message
        : JSON.stringify(record);
    const type = record.type;
    if (typeof type === 'string' && type.length > 0) {
      return { kind: 'typed', message, type };
    }
    return { kind: 'message', message };
  }

  return { kind: 'message', message: String(error) };
}

/**
 * Return the envelope unchanged, or throw the ApiError it describes.
 */
export function classifyResponse<T extends ResponseEnvelope>(envelope: T): T {
  const variant = parseEnvelopeError(envelope.error);

  switch (variant.kind) {
    case 'typed':
      throw new ApiError(variant.message, variant.type, envelope.statusCode);
    case 'message':
      throw new ApiError(variant.message, undefined, envelope.statusCode);
    case 'none':
      break;
  }

  const { statusCode } = envelope;
  if (statusCode !== undefined && (statusCode < HTTP_OK_MIN || statusCode > HTTP_OK_MAX)) {
    const detail = envelope.message ? ` - ${envelope.message}` : '';
    throw new ApiError(`HTTP error: ${statusCode}${detail}`, undefined, statusCode);
  }

  return envelope;
}
