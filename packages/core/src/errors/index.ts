/**
 * Main entry point for the error management system
 * Exports core types and utilities for error handling
 */

export { QuayBaseError } from './QuayBaseError.js';
export { QuayRuntimeError } from './QuayRuntimeError.js';
export { QuayValidationError } from './QuayValidationError.js';
export { ErrorScope, ErrorType } from './types.js';
export type { Issue, Severity } from './types.js';
export { ensureOk } from './result-bridge.js';
