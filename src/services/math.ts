/**
 * Arithmetic handlers for POST /bfhl
 *
 * Pure functions over already-validated input. LCM is folded in bigint
 * so intermediate products cannot lose precision; results that do not
 * fit a JSON number exactly are rejected rather than rounded.
 */

import { unprocessable } from "../utils/errors.js";

const MAX_SAFE = BigInt(Number.MAX_SAFE_INTEGER);

/**
 * First `n` Fibonacci numbers, starting 0, 1, 1, 2, ...
 */
export function fibonacci(n: number): number[] {
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`fibonacci count must be a non-negative integer, got ${n}`);
  }

  const sequence: number[] = [];
  let current = 0;
  let next = 1;
  for (let i = 0; i < n; i++) {
    sequence.push(current);
    [current, next] = [next, current + next];
  }
  return sequence;
}

// Below this, trial division needs at most ~11k iterations
const TRIAL_DIVISION_LIMIT = 2 ** 32;

// Deterministic for every n < 2^64, which covers all safe integers
const MILLER_RABIN_BASES = [2n, 3n, 5n, 7n, 11n, 13n, 17n, 19n, 23n, 29n, 31n, 37n];

function modPow(base: bigint, exponent: bigint, modulus: bigint): bigint {
  let result = 1n;
  let b = base % modulus;
  let e = exponent;
  while (e > 0n) {
    if (e & 1n) result = (result * b) % modulus;
    b = (b * b) % modulus;
    e >>= 1n;
  }
  return result;
}

function isPrimeMillerRabin(value: number): boolean {
  const n = BigInt(value);
  let d = n - 1n;
  let s = 0;
  while ((d & 1n) === 0n) {
    d >>= 1n;
    s++;
  }

  witness: for (const a of MILLER_RABIN_BASES) {
    let x = modPow(a, d, n);
    if (x === 1n || x === n - 1n) continue;
    for (let r = 1; r < s; r++) {
      x = (x * x) % n;
      if (x === n - 1n) continue witness;
    }
    return false;
  }
  return true;
}

/**
 * Trial division over 6k±1 candidates for small values, deterministic
 * Miller-Rabin above 2^32. Cost per call is bounded for any safe integer.
 */
export function isPrime(value: number): boolean {
  if (!Number.isSafeInteger(value) || value < 2) return false;
  if (value < 4) return true;
  if (value % 2 === 0 || value % 3 === 0) return false;
  if (value >= TRIAL_DIVISION_LIMIT) return isPrimeMillerRabin(value);

  for (let i = 5; i * i <= value; i += 6) {
    if (value % i === 0 || value % (i + 2) === 0) return false;
  }
  return true;
}

/**
 * Keep only the primes, preserving input order
 */
export function filterPrimes(values: readonly number[]): number[] {
  return values.filter(isPrime);
}

function gcdBig(a: bigint, b: bigint): bigint {
  let x = a < 0n ? -a : a;
  let y = b < 0n ? -b : b;
  while (y !== 0n) {
    [x, y] = [y, x % y];
  }
  return x;
}

/**
 * Greatest common divisor of two integers (Euclid)
 */
export function gcd(a: number, b: number): number {
  let x = Math.abs(a);
  let y = Math.abs(b);
  while (y !== 0) {
    [x, y] = [y, x % y];
  }
  return x;
}

function requirePositive(values: readonly number[], operation: "lcm" | "hcf"): void {
  if (values.length === 0) {
    throw unprocessable(`${operation} requires a non-empty array`);
  }
  if (values.some((v) => !Number.isSafeInteger(v) || v <= 0)) {
    throw unprocessable(`${operation} requires positive integers`);
  }
}

/**
 * Highest common factor of all values
 *
 * @throws ApiError UNPROCESSABLE_ENTITY on empty input or non-positive values
 */
export function hcf(values: readonly number[]): number {
  requirePositive(values, "hcf");
  return values.reduce(gcd);
}

/**
 * Least common multiple of all values, folded left as a / gcd(a, b) * b
 *
 * @throws ApiError UNPROCESSABLE_ENTITY on empty input, non-positive values,
 * or a result above Number.MAX_SAFE_INTEGER
 */
export function lcm(values: readonly number[]): number {
  requirePositive(values, "lcm");

  let acc = 1n;
  for (const value of values) {
    const b = BigInt(value);
    acc = (acc / gcdBig(acc, b)) * b;
    if (acc > MAX_SAFE) {
      throw unprocessable("lcm result exceeds the safe integer range");
    }
  }
  return Number(acc);
}
