/**
 * Utility functions for logging and tracing
 */

export { serializeForLog, errorToLog, describeArguments } from './logging.js';
export { withCallTracing, getTracingOptions, isSilentOperation } from './tracing.js';
