import type { CallOpts } from "./types.js";

/**
 * Abort handle for one provider call, fired after `opts.timeoutMs`
 */
export interface CallTimeout {
  readonly signal: AbortSignal;
  clear(): void;
}

export function startCallTimeout(opts: CallOpts): CallTimeout {
  const abortController = new AbortController();
  const timeoutId = setTimeout(() => abortController.abort(), opts.timeoutMs);

  return {
    signal: abortController.signal,
    clear() {
      clearTimeout(timeoutId);
    },
  };
}

/**
 * Read the HTTP status an SDK error carries, if any
 */
export function readErrorStatus(error: Error): number | undefined {
  return "status" in error && typeof error.status === "number" ? error.status : undefined;
}

export function readErrorString(error: Error, field: "code" | "type" | "request_id"): string | undefined {
  if (!(field in error)) return undefined;
  const value: unknown = Reflect.get(error, field);
  return typeof value === "string" ? value : undefined;
}
