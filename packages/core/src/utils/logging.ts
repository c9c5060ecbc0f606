/**
 * Logging Utilities - Safe value serialization for logging
 */

import { ValidationError } from '../errors/index.js';

// bigint (and so Money) has no JSON form; log it as its decimal string
const bigintReplacer = (_key: string, value: unknown): unknown =>
  typeof value === 'bigint' ? value.toString() : value;

/**
 * Safely serialize a value for logging
 * Money and other bigints become decimal strings; other primitives are returned unchanged.
 */
export function serializeForLog(value: unknown): unknown {
  try {
    if (value === null || value === undefined) return value;
    if (typeof value === 'bigint') return value.toString();
    if (typeof value !== 'object') return value;
    return JSON.parse(JSON.stringify(value, bigintReplacer));
  } catch (err) {
    const errorMsg = err instanceof Error ? err.message : 'unknown error';
    return `[Unserializable object: ${errorMsg}]`;
  }
}

/**
 * Create a safe log object from an error
 * Validation errors carry their details along.
 */
export function errorToLog(error: unknown): Record<string, unknown> {
  if (error instanceof ValidationError) {
    return {
      type: error.name,
      message: error.message,
      details: serializeForLog(error.details),
      stack: error.stack,
    };
  }

  if (error instanceof Error) {
    return {
      type: error.constructor.name,
      message: error.message,
      stack: error.stack,
    };
  }

  if (typeof error === 'object' && error !== null) {
    return { value: serializeForLog(error) };
  }

  return {
    type: typeof error,
    message: String(error),
  };
}

/**
 * Render operation arguments for a log entry
 * Transform functions are named rather than dropped.
 */
export function describeArguments(args: readonly unknown[]): unknown[] {
  return args.map((arg) => {
    if (typeof arg === 'function') {
      return `[Function ${arg.name || 'anonymous'}]`;
    }
    return serializeForLog(arg);
  });
}
