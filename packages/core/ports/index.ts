/**
 * Core Ports
 *
 * Contracts between callers and the chain service adapter.
 */

// Chain Service Protocol Types
export * from './chain-service.js';
