/**
 * Puffdown - Telegram setup wizard for a vaping-reduction plan
 */

// Wizard core
export * from './wizard/index.js';

// Transport
export * from './gateways/index.js';

// Per-user ordering
export * from './concurrency/index.js';

// Errors & logging
export * from './errors.js';
export { DebugLogger, setLogLevel, isLogLevel, type LogLevel } from './debug-logger.js';
