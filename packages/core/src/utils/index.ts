export * from './result.js';
export * from './error-conversion.js';
export * from './env.js';
