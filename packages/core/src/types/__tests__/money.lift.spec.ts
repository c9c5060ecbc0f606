import { describe, it, expect, vi } from 'vitest';
import { fromInt, map, map2, map3, map4, map5, map6, toInt } from '../money.js';

// Positional weights make every argument position observable in the result
const digits = (...xs: bigint[]): bigint => xs.reduce((acc, x) => acc * 10n + x, 0n);

describe('Money map family', () => {
  describe('map', () => {
    it('should double 3 to 6', () => {
      expect(map((x) => x * 2n, fromInt(3n))).toBe(fromInt(6n));
    });

    it('should equal fromInt(f(toInt(m)))', () => {
      const f = (x: bigint) => x * x - 4n;
      for (const n of [-9n, -1n, 0n, 2n, 11n, 400n]) {
        expect(map(f, fromInt(n))).toBe(fromInt(f(toInt(fromInt(n)))));
      }
    });

    it('should call f once with the unwrapped integer', () => {
      const f = vi.fn((x: bigint) => x + 1n);
      map(f, fromInt(41n));
      expect(f).toHaveBeenCalledTimes(1);
      expect(f).toHaveBeenCalledWith(41n);
    });

    it('should let errors thrown by f propagate unchanged', () => {
      const failure = new RangeError('negative balance');
      const f = () => {
        throw failure;
      };
      expect(() => map(f, fromInt(1n))).toThrow(failure);
    });

    it('should wrap large results exactly', () => {
      expect(map((x) => x * 4n, fromInt(2n ** 52n))).toBe(fromInt(18_014_398_509_481_984n));
    });

    it('should truncate division the way bigint does', () => {
      expect(map((x) => x / 2n, fromInt(7n))).toBe(fromInt(3n));
      expect(map((x) => x / 2n, fromInt(-7n))).toBe(fromInt(-3n));
    });
  });

  describe('map2', () => {
    it('should add 3 and 2 to 5', () => {
      expect(map2((x, y) => x + y, fromInt(3n), fromInt(2n))).toBe(fromInt(5n));
    });

    it('should pass arguments in order', () => {
      expect(map2((x, y) => x - y, fromInt(10n), fromInt(4n))).toBe(fromInt(6n));
      expect(map2((x, y) => x - y, fromInt(4n), fromInt(10n))).toBe(fromInt(-6n));
      expect(map2(digits, fromInt(1n), fromInt(2n))).toBe(fromInt(12n));
    });
  });

  describe('map3', () => {
    it('should pass arguments in order', () => {
      expect(map3(digits, fromInt(1n), fromInt(2n), fromInt(3n))).toBe(fromInt(123n));
      expect(map3(digits, fromInt(3n), fromInt(2n), fromInt(1n))).toBe(fromInt(321n));
    });

    it('should equal fromInt(f(...)) for a non-commutative f', () => {
      const f = (a: bigint, b: bigint, c: bigint) => a - b * c;
      expect(map3(f, fromInt(100n), fromInt(7n), fromInt(3n))).toBe(fromInt(79n));
    });
  });

  describe('map4', () => {
    it('should pass arguments in order', () => {
      expect(map4(digits, fromInt(1n), fromInt(2n), fromInt(3n), fromInt(4n))).toBe(fromInt(1234n));
      expect(map4(digits, fromInt(4n), fromInt(3n), fromInt(2n), fromInt(1n))).toBe(fromInt(4321n));
    });
  });

  describe('map5', () => {
    it('should pass arguments in order', () => {
      expect(map5(digits, fromInt(1n), fromInt(2n), fromInt(3n), fromInt(4n), fromInt(5n))).toBe(
        fromInt(12345n)
      );
    });

    it('should equal fromInt(f(...)) for a non-commutative f', () => {
      const f = (a: bigint, b: bigint, c: bigint, d: bigint, e: bigint) => a - b - c - d - e;
      expect(map5(f, fromInt(50n), fromInt(1n), fromInt(2n), fromInt(3n), fromInt(4n))).toBe(
        fromInt(40n)
      );
    });
  });

  describe('map6', () => {
    it('should pass arguments in order', () => {
      expect(
        map6(digits, fromInt(1n), fromInt(2n), fromInt(3n), fromInt(4n), fromInt(5n), fromInt(6n))
      ).toBe(fromInt(123456n));
      expect(
        map6(digits, fromInt(6n), fromInt(5n), fromInt(4n), fromInt(3n), fromInt(2n), fromInt(1n))
      ).toBe(fromInt(654321n));
    });

    it('should hand f the unwrapped integers', () => {
      const f = vi.fn(
        (a: bigint, b: bigint, c: bigint, d: bigint, e: bigint, g: bigint) => a + b + c + d + e + g
      );
      const result = map6(f, fromInt(1n), fromInt(-2n), fromInt(3n), fromInt(-4n), fromInt(5n), fromInt(-6n));
      expect(f).toHaveBeenCalledWith(1n, -2n, 3n, -4n, 5n, -6n);
      expect(result).toBe(fromInt(-3n));
    });

    it('should let errors thrown by f propagate unchanged', () => {
      const failure = new Error('ledger closed');
      const f = () => {
        throw failure;
      };
      expect(() =>
        map6(f, fromInt(1n), fromInt(1n), fromInt(1n), fromInt(1n), fromInt(1n), fromInt(1n))
      ).toThrow(failure);
    });
  });
});
