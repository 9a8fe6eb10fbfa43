/**
 * POST /bfhl dispatcher
 *
 * Runs exactly one handler for a validated operation. Any failure of the
 * LLM adapter becomes UPSTREAM_ERROR with a provider-neutral message;
 * handler errors propagate to the server's error handler.
 */

import type { BfhlData, BfhlOperation } from "../schemas/bfhl.js";
import type { LLMAdapter } from "../adapters/llm/types.js";
import {
  UpstreamConfigurationError,
  UpstreamEmptyResponseError,
  UpstreamHTTPError,
  UpstreamTimeoutError,
} from "../adapters/llm/errors.js";
import { ApiError } from "../utils/errors.js";
import { fibonacci, filterPrimes, hcf, lcm } from "./math.js";

export interface DispatchDeps {
  adapter: LLMAdapter;
  requestId: string;
  llmTimeoutMs: number;
}

function upstreamMessage(error: unknown): string {
  if (error instanceof UpstreamTimeoutError) return "AI service timed out";
  if (error instanceof UpstreamHTTPError) return "AI service returned an error";
  if (error instanceof UpstreamEmptyResponseError) return "No response from AI service";
  if (error instanceof UpstreamConfigurationError) return "AI service is not configured";
  return "AI service error";
}

async function answerOneWord(question: string, deps: DispatchDeps): Promise<string> {
  try {
    const result = await deps.adapter.answerOneWord(
      { question },
      { requestId: deps.requestId, timeoutMs: deps.llmTimeoutMs }
    );
    return result.answer;
  } catch (error) {
    // Connection failures without a status still count as upstream failures
    throw new ApiError("UPSTREAM_ERROR", upstreamMessage(error), error);
  }
}

function assertNever(value: never): never {
  throw new Error(`Unhandled bfhl operation: ${JSON.stringify(value)}`);
}

/**
 * Dispatch a validated operation to its handler.
 */
export async function dispatchBfhl(operation: BfhlOperation, deps: DispatchDeps): Promise<BfhlData> {
  switch (operation.kind) {
    case "fibonacci":
      return fibonacci(operation.n);
    case "prime":
      return filterPrimes(operation.values);
    case "lcm":
      return lcm(operation.values);
    case "hcf":
      return hcf(operation.values);
    case "AI":
      return answerOneWord(operation.question, deps);
    default:
      return assertNever(operation);
  }
}
