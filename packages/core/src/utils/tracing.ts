/**
 * Call tracing for operation records
 * Higher-order wrapper that logs every call made through it
 */

import type { Logger, TracingOptions } from '../interfaces/index.js';
import { describeArguments, errorToLog, serializeForLog } from './logging.js';

const DEFAULT_TRACING_OPTIONS: Required<TracingOptions> = {
  level: 'debug',
  silentOperations: [],
  logArguments: false,
};

/**
 * Get merged tracing options with defaults
 */
export function getTracingOptions(options?: TracingOptions): Required<TracingOptions> {
  return {
    ...DEFAULT_TRACING_OPTIONS,
    ...options,
  };
}

/**
 * Check if logging should be suppressed for this operation
 */
export function isSilentOperation(operationName: string, options?: TracingOptions): boolean {
  return getTracingOptions(options).silentOperations.includes(operationName);
}

/**
 * Create a proxy around a record of operations that logs each call
 *
 * Usage:
 * ```typescript
 * const money = withCallTracing(moneyOperations, logger, {
 *   silentOperations: ['toInt'],
 * });
 *
 * money.add(money.fromInt(3n), money.fromInt(2n));
 * // [debug] add called { operation: 'add', result: '5' }
 * ```
 *
 * Errors are logged at "error" and rethrown unchanged.
 * Without a logger the operations are returned as they are.
 */
export function withCallTracing<T extends object>(
  operations: T,
  logger?: Logger,
  options?: TracingOptions
): T {
  if (!logger) return operations;

  const resolved = getTracingOptions(options);

  return new Proxy(operations, {
    get(target, property, receiver) {
      const member: unknown = Reflect.get(target, property, receiver);

      if (typeof member !== 'function' || typeof property !== 'string') {
        return member;
      }
      if (isSilentOperation(property, resolved)) {
        return member;
      }

      return function tracedOperation(this: unknown, ...args: unknown[]): unknown {
        const argsMeta = resolved.logArguments ? { args: describeArguments(args) } : {};

        try {
          const result: unknown = Reflect.apply(member, this, args);
          logger[resolved.level](`${property} called`, {
            operation: property,
            ...argsMeta,
            result: serializeForLog(result),
          });
          return result;
        } catch (error) {
          logger.error(`${property} failed`, {
            operation: property,
            ...argsMeta,
            error: errorToLog(error),
          });
          throw error;
        }
      };
    },
  });
}
