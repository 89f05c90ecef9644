export { createMockLogger, createSilentMockLogger } from './logger/test-utils.js';
