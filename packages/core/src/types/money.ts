/**
 * Money domain type
 * An integral amount in the smallest currency unit (e.g., cents, fillér),
 * kept apart from plain integers at compile time.
 *
 * Representation: a zod-branded bigint. Arithmetic is arbitrary precision,
 * so there is no overflow, no wraparound and no precision loss; every
 * operation below is total. Negative zero does not exist for bigint.
 */

import { z } from 'zod';
import { ValidationError } from '../errors/index.js';

/**
 * Zod schema defining the Money representation
 * Any bigint, branded so a plain bigint is never assignable to Money
 */
export const MoneySchema = z.bigint().brand<'Money'>();

export type Money = z.infer<typeof MoneySchema>;

/**
 * Values accepted by parseMoney: a bigint, or a number that is a safe integer
 */
const MoneyInputSchema = z.union([z.bigint(), z.number().int()]);

export type MoneyFn1 = (a: bigint) => bigint;
export type MoneyFn2 = (a: bigint, b: bigint) => bigint;
export type MoneyFn3 = (a: bigint, b: bigint, c: bigint) => bigint;
export type MoneyFn4 = (a: bigint, b: bigint, c: bigint, d: bigint) => bigint;
export type MoneyFn5 = (a: bigint, b: bigint, c: bigint, d: bigint, e: bigint) => bigint;
export type MoneyFn6 = (a: bigint, b: bigint, c: bigint, d: bigint, e: bigint, f: bigint) => bigint;

/**
 * Wrap an integer as Money, negative amounts included
 */
export function fromInt(n: bigint): Money {
  return MoneySchema.parse(n);
}

/**
 * The additive identity
 */
export function zero(): Money {
  return fromInt(0n);
}

/**
 * Unwrap Money into the integer it holds
 */
export function toInt(m: Money): bigint {
  return m;
}

/**
 * Apply `f` to the wrapped integer and wrap the result.
 * Anything `f` throws reaches the caller untouched.
 */
export function map(f: MoneyFn1, m: Money): Money {
  return fromInt(f(toInt(m)));
}

/**
 * Apply `f` to both wrapped integers, in argument order, and wrap the result.
 * map3..map6 follow the same rule for more operands.
 */
export function map2(f: MoneyFn2, m1: Money, m2: Money): Money {
  return fromInt(f(toInt(m1), toInt(m2)));
}

export function map3(f: MoneyFn3, m1: Money, m2: Money, m3: Money): Money {
  return fromInt(f(toInt(m1), toInt(m2), toInt(m3)));
}

export function map4(f: MoneyFn4, m1: Money, m2: Money, m3: Money, m4: Money): Money {
  return fromInt(f(toInt(m1), toInt(m2), toInt(m3), toInt(m4)));
}

export function map5(
  f: MoneyFn5,
  m1: Money,
  m2: Money,
  m3: Money,
  m4: Money,
  m5: Money
): Money {
  return fromInt(f(toInt(m1), toInt(m2), toInt(m3), toInt(m4), toInt(m5)));
}

export function map6(
  f: MoneyFn6,
  m1: Money,
  m2: Money,
  m3: Money,
  m4: Money,
  m5: Money,
  m6: Money
): Money {
  return fromInt(f(toInt(m1), toInt(m2), toInt(m3), toInt(m4), toInt(m5), toInt(m6)));
}

export function add(a: Money, b: Money): Money {
  return map2((x, y) => x + y, a, b);
}

/**
 * `a - b`, so `subtract(a, b)` and `subtract(b, a)` are negations of each other
 */
export function subtract(a: Money, b: Money): Money {
  return map2((x, y) => x - y, a, b);
}

export function negate(m: Money): Money {
  return map((x) => -x, m);
}

export function equals(a: Money, b: Money): boolean {
  return toInt(a) === toInt(b);
}

/**
 * Ordering of two amounts, suitable as an Array#sort comparator
 */
export function compare(a: Money, b: Money): -1 | 0 | 1 {
  const x = toInt(a);
  const y = toInt(b);
  if (x < y) return -1;
  if (x > y) return 1;
  return 0;
}

/**
 * Sum a list of amounts; an empty list sums to zero
 */
export function sum(values: readonly Money[]): Money {
  return values.reduce<Money>((total, value) => add(total, value), zero());
}

export function isMoney(value: unknown): value is Money {
  return MoneySchema.safeParse(value).success;
}

/**
 * Validate an untyped value at a boundary (request bodies, config, storage rows)
 * A safe-integer number is converted to its exact bigint.
 *
 * @throws ValidationError listing the zod issues for anything else
 */
export function parseMoney(input: unknown): Money {
  const validated = MoneyInputSchema.safeParse(input);
  if (!validated.success) {
    throw new ValidationError(`Invalid money amount: ${validated.error.message}`, {
      input,
      issues: validated.error.issues,
    });
  }
  return fromInt(BigInt(validated.data));
}

/**
 * Every Money operation keyed by name
 * Pass to withCallTracing to log calls without touching call sites
 */
export const moneyOperations = {
  zero,
  fromInt,
  toInt,
  add,
  subtract,
  negate,
  map,
  map2,
  map3,
  map4,
  map5,
  map6,
  equals,
  compare,
  sum,
  isMoney,
  parseMoney,
};

export type MoneyOperations = typeof moneyOperations;
