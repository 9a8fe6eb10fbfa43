/**
 * Arithmetic handler tests
 *
 * Fixed examples plus the algebraic properties the handlers must keep:
 * recurrence, order-preserving filter, divisibility, lcm·hcf = a·b.
 */

import { describe, it, expect } from "vitest";
import { fibonacci, isPrime, filterPrimes, gcd, hcf, lcm } from "../../src/services/math.js";
import { ApiError } from "../../src/utils/errors.js";

function range(from: number, to: number): number[] {
  return Array.from({ length: to - from + 1 }, (_, i) => from + i);
}

describe("fibonacci", () => {
  it("returns an empty sequence for 0", () => {
    expect(fibonacci(0)).toEqual([]);
  });

  it("returns [0] for 1", () => {
    expect(fibonacci(1)).toEqual([0]);
  });

  it("returns the first ten numbers", () => {
    expect(fibonacci(10)).toEqual([0, 1, 1, 2, 3, 5, 8, 13, 21, 34]);
  });

  it("has length N and follows the recurrence for every N up to 79", () => {
    for (let n = 0; n <= 79; n++) {
      const seq = fibonacci(n);
      expect(seq).toHaveLength(n);
      if (n >= 2) {
        expect(seq.slice(0, 2)).toEqual([0, 1]);
      }
      for (let i = 2; i < n; i++) {
        expect(seq[i]).toBe(seq[i - 1] + seq[i - 2]);
      }
    }
  });

  it("keeps the 79th term exact", () => {
    const seq = fibonacci(79);
    expect(seq[78]).toBe(8944394323791464);
    expect(Number.isSafeInteger(seq[78])).toBe(true);
  });

  it("rejects negative or fractional counts", () => {
    expect(() => fibonacci(-1)).toThrow(RangeError);
    expect(() => fibonacci(2.5)).toThrow(RangeError);
  });
});

describe("isPrime", () => {
  it("rejects values below 2", () => {
    for (const v of [-7, -1, 0, 1]) {
      expect(isPrime(v)).toBe(false);
    }
  });

  it("accepts small primes", () => {
    for (const v of [2, 3, 5, 7, 11, 13, 17, 19, 23, 29, 31]) {
      expect(isPrime(v)).toBe(true);
    }
  });

  it("rejects composites including squares of primes", () => {
    for (const v of [4, 9, 15, 21, 25, 49, 91, 121, 169, 1001]) {
      expect(isPrime(v)).toBe(false);
    }
  });

  it("handles a large prime and a large composite", () => {
    expect(isPrime(2_147_483_647)).toBe(true);
    expect(isPrime(2_147_483_649)).toBe(false);
  });

  it("classifies values around 2^32 the same way trial division does", () => {
    const byTrialDivision = (n: number): boolean => {
      if (n < 2) return false;
      for (let d = 2; d * d <= n; d++) {
        if (n % d === 0) return false;
      }
      return true;
    };

    for (let v = 2 ** 32 - 100; v <= 2 ** 32 + 100; v++) {
      expect(isPrime(v)).toBe(byTrialDivision(v));
    }
  });

  it("handles primes and composites near Number.MAX_SAFE_INTEGER", () => {
    expect(isPrime(9_007_199_254_740_881)).toBe(true);
    // 6361 * 69431 * 20394401
    expect(isPrime(Number.MAX_SAFE_INTEGER)).toBe(false);
    // 1000003^2
    expect(isPrime(1_000_006_000_009)).toBe(false);
    // 2^32 + 1 = 641 * 6700417
    expect(isPrime(4_294_967_297)).toBe(false);
    expect(isPrime(4_294_967_311)).toBe(true);
  });

  it("stays fast for a full array of large primes", () => {
    const start = Date.now();
    const kept = filterPrimes(Array.from({ length: 1000 }, () => 9_007_199_254_740_881));

    expect(kept).toHaveLength(1000);
    expect(Date.now() - start).toBeLessThan(2000);
  });
});

describe("filterPrimes", () => {
  it("returns an empty array for empty input", () => {
    expect(filterPrimes([])).toEqual([]);
  });

  it("keeps primes in their original order", () => {
    expect(filterPrimes([10, 7, 2, 9, 13, 1, 0, -3, 7])).toEqual([7, 2, 13, 7]);
  });

  it("is idempotent", () => {
    const input = [31, 4, 17, 6, 2, 99, 97, -5, 1];
    const once = filterPrimes(input);
    expect(filterPrimes(once)).toEqual(once);
  });

  it("drops exactly the non-primes", () => {
    const input = range(-5, 30);
    const kept = filterPrimes(input);
    expect(kept.every(isPrime)).toBe(true);
    expect(input.filter((v) => !isPrime(v))).toHaveLength(input.length - kept.length);
  });
});

describe("gcd", () => {
  it("follows Euclid", () => {
    expect(gcd(12, 18)).toBe(6);
    expect(gcd(17, 5)).toBe(1);
    expect(gcd(0, 9)).toBe(9);
    expect(gcd(-12, 8)).toBe(4);
  });
});

describe("hcf", () => {
  it("computes the highest common factor", () => {
    expect(hcf([12, 18, 24])).toBe(6);
    expect(hcf([7])).toBe(7);
    expect(hcf([9, 28])).toBe(1);
  });

  it("divides every element and never exceeds the minimum", () => {
    const samples = [[12, 18, 24], [100, 75, 50], [14, 21], [36, 48, 60, 72]];
    for (const values of samples) {
      const h = hcf(values);
      for (const v of values) {
        expect(v % h).toBe(0);
      }
      expect(h).toBeLessThanOrEqual(Math.min(...values));
    }
  });

  it("rejects empty and non-positive input", () => {
    expect(() => hcf([])).toThrow(ApiError);
    expect(() => hcf([4, 0])).toThrow("hcf requires positive integers");
    expect(() => hcf([4, -2])).toThrow("hcf requires positive integers");
  });
});

describe("lcm", () => {
  it("computes the least common multiple", () => {
    expect(lcm([4, 6, 8])).toBe(24);
    expect(lcm([5])).toBe(5);
    expect(lcm([3, 7])).toBe(21);
  });

  it("is divisible by every element and at least the maximum", () => {
    const samples = [[4, 6, 8], [2, 3, 5, 7], [12, 15], [9, 6, 4]];
    for (const values of samples) {
      const l = lcm(values);
      for (const v of values) {
        expect(l % v).toBe(0);
      }
      expect(l).toBeGreaterThanOrEqual(Math.max(...values));
    }
  });

  it("satisfies lcm(a, b) * hcf(a, b) == a * b", () => {
    const pairs: Array<[number, number]> = [[4, 6], [21, 6], [17, 5], [100, 80], [1, 9]];
    for (const [a, b] of pairs) {
      expect(lcm([a, b]) * hcf([a, b])).toBe(a * b);
    }
  });

  it("orders hcf <= min <= lcm", () => {
    const values = [18, 24, 30];
    expect(hcf(values)).toBeLessThanOrEqual(Math.min(...values));
    expect(Math.min(...values)).toBeLessThanOrEqual(lcm(values));
  });

  it("stays exact near the safe integer limit", () => {
    expect(lcm(range(1, 40))).toBe(5342931457063200);
  });

  it("rejects results beyond the safe integer range", () => {
    expect(() => lcm(range(1, 41))).toThrow("lcm result exceeds the safe integer range");
    let caught: unknown;
    try {
      lcm([2 ** 52, 3]);
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ApiError);
    expect(caught).toMatchObject({ code: "UNPROCESSABLE_ENTITY" });
  });

  it("rejects empty and non-positive input", () => {
    expect(() => lcm([])).toThrow("lcm requires a non-empty array");
    expect(() => lcm([3, 0])).toThrow("lcm requires positive integers");
  });
});
