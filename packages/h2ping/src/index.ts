/**
 * h2ping - PING frame codec for HTTP/2-style binary framing
 *
 * Parses and serializes connection-level PING frames and classifies their
 * 8-byte payloads as keep-alive, graceful-shutdown or correlated user pings.
 */

// Core types
export * from './types/index.js';

// PING codec
export * from './frame/index.js';

// Wire encoding
export * from './wire/index.js';

// Utilities
export * from './utils/index.js';

export { config } from './config.js';
export type { H2PingConfig } from './config.js';
