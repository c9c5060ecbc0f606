// Domain types and operations
export * from './types/index.js';

// Interfaces and contracts
export * from './interfaces/index.js';

// Errors
export { ValidationError } from './errors/index.js';

// Utilities
export {
  serializeForLog,
  errorToLog,
  describeArguments,
  withCallTracing,
  getTracingOptions,
  isSilentOperation,
} from './utils/index.js';
