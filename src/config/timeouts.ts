const MIN_TIMEOUT_MS = 1_000; // 1s
const MAX_TIMEOUT_MS = 2 * 60_000; // 2m

export const DEFAULT_LLM_TIMEOUT_MS = 15_000;
export const DEFAULT_ROUTE_TIMEOUT_MS = 30_000;

/**
 * Clamp a configured timeout into the supported window.
 * Non-finite values fall back to the minimum.
 */
export function clampTimeout(value: number): number {
  if (!Number.isFinite(value)) return MIN_TIMEOUT_MS;
  return Math.max(MIN_TIMEOUT_MS, Math.min(MAX_TIMEOUT_MS, value));
}

export function getJitteredDelayMs(base: number, jitterPercent: number): number {
  // ±jitterPercent around base delay
  const jitter = Math.floor((base * jitterPercent) / 100);
  const min = Math.max(0, base - jitter);
  const max = base + jitter;
  if (max <= min) return base;
  return Math.floor(min + Math.random() * (max - min + 1));
}
