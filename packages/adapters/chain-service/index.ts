/**
 * Chain Service Adapter
 *
 * Resilient HTTP client for the chain service: pooled transport, envelope
 * classification, bounded retries and commit-reveal weight submission.
 */

// Client and Factory
export * from './chain-service-client.js';
export * from './client-factory.js';

// Configuration
export * from './config.js';

// Errors
export * from './errors.js';

// Request Pipeline
export * from './transport-session.js';
export * from './request-executor.js';
export * from './response-classifier.js';
export * from './retry-policy.js';

// Weight Submission
export * from './weight-submission.js';

// Wire Schemas
export * from './chain-service-types.js';

// Logging
export { createLogger } from './logger.js';
