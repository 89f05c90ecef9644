/**
 * @quay/core
 *
 * Shared foundations for Quay packages: error taxonomy, structured logging,
 * provider registries, config helpers and tracing.
 */

export * from './errors/index.js';
export * from './logger/index.js';
export * from './providers/index.js';
export * from './utils/index.js';
export { withSpan, type SpanOptions } from './telemetry/span.js';
