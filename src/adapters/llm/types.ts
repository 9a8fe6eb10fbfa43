/**
 * Provider-agnostic LLM adapter interface.
 *
 * All adapters (OpenAI, Anthropic, fixtures) implement this interface so the
 * dispatcher can ask a one-word question without knowing which provider
 * answers it, and tests can substitute a fake.
 */

import type { LLMProviderName } from "../../config/index.js";

/**
 * Usage metrics returned by LLM calls for cost tracking and telemetry.
 */
export interface UsageMetrics {
  input_tokens: number;
  output_tokens: number;
}

/**
 * Per-call options.
 */
export interface CallOpts {
  requestId: string;
  timeoutMs: number;
}

export interface OneWordArgs {
  question: string;
}

export interface OneWordResult {
  /** Single word, trimmed and stripped of surrounding punctuation */
  answer: string;
  usage: UsageMetrics;
}

export interface LLMAdapter {
  readonly name: LLMProviderName;
  readonly model: string;

  /**
   * Ask a question that must be answered in one word.
   *
   * @throws UpstreamTimeoutError when the call times out
   * @throws UpstreamHTTPError on a non-2xx provider response
   * @throws UpstreamEmptyResponseError when no usable word comes back
   * @throws UpstreamConfigurationError when the provider has no API key
   */
  answerOneWord(args: OneWordArgs, opts: CallOpts): Promise<OneWordResult>;
}
