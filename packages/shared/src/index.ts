export * from './types.js';
export { baseBindings, logger } from './logger.js';
export { getTracer, withSpan } from './tracing.js';
