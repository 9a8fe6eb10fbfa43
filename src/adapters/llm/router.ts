/**
 * Provider router for LLM adapters.
 *
 * Selects the LLM adapter (OpenAI, Anthropic, Fixtures) from configuration
 * (LLM_PROVIDER, LLM_MODEL) and wraps it with the retry policy
 * (LLM_MAX_ATTEMPTS).
 */

import { log, emit, TelemetryEvents } from "../../utils/telemetry.js";
import { withRetry, DEFAULT_RETRY_CONFIG, type RetryConfig } from "../../utils/retry.js";
import type { Config, LLMProviderName } from "../../config/index.js";
import type { LLMAdapter, OneWordArgs, OneWordResult, CallOpts } from "./types.js";
import { AnthropicAdapter } from "./anthropic.js";
import { OpenAIAdapter } from "./openai.js";
import { extractSingleWord } from "./normalisation.js";

/**
 * Fixtures adapter for running without API keys.
 * Always answers with the same word.
 */
export class FixturesAdapter implements LLMAdapter {
  readonly name = "fixtures" as const;
  readonly model = "fixture-v1";

  constructor(private readonly fixtureAnswer: string = "Fixture") {}

  async answerOneWord(args: OneWordArgs, opts: CallOpts): Promise<OneWordResult> {
    log.debug({ request_id: opts.requestId, question_chars: args.question.length }, "fixtures adapter answering");
    return {
      answer: extractSingleWord(this.fixtureAnswer) ?? "Fixture",
      usage: { input_tokens: 0, output_tokens: 0 },
    };
  }
}

/**
 * Wraps an adapter with retry-with-backoff and completion telemetry.
 */
class RetryingAdapter implements LLMAdapter {
  readonly name: LLMProviderName;
  readonly model: string;

  constructor(
    private readonly inner: LLMAdapter,
    private readonly retryConfig: RetryConfig
  ) {
    this.name = inner.name;
    this.model = inner.model;
  }

  async answerOneWord(args: OneWordArgs, opts: CallOpts): Promise<OneWordResult> {
    const startTime = Date.now();
    const result = await withRetry(
      () => this.inner.answerOneWord(args, opts),
      { adapter: this.name, model: this.model, operation: "answer_one_word" },
      this.retryConfig
    );

    emit(TelemetryEvents.LlmAnswerCompleted, {
      adapter: this.name,
      model: this.model,
      request_id: opts.requestId,
      latency_ms: Date.now() - startTime,
      input_tokens: result.usage.input_tokens,
      output_tokens: result.usage.output_tokens,
    });

    return result;
  }
}

function createAdapter(provider: LLMProviderName, llm: Config["llm"]): LLMAdapter {
  switch (provider) {
    case "openai":
      return new OpenAIAdapter(llm.openaiApiKey, llm.model);
    case "anthropic":
      return new AnthropicAdapter(llm.anthropicApiKey, llm.model);
    case "fixtures":
      return new FixturesAdapter();
  }
}

// Cached per (frozen) llm config so SDK clients are reused across requests
let adapters = new WeakMap<Config["llm"], LLMAdapter>();

/**
 * Get the configured LLM adapter.
 *
 * @example
 * ```typescript
 * const adapter = getAdapter(getConfig().llm);
 * const { answer } = await adapter.answerOneWord({ question }, opts);
 * ```
 */
export function getAdapter(llm: Config["llm"]): LLMAdapter {
  const cached = adapters.get(llm);
  if (cached) {
    return cached;
  }

  const adapter = new RetryingAdapter(createAdapter(llm.provider, llm), {
    ...DEFAULT_RETRY_CONFIG,
    maxAttempts: llm.maxAttempts,
  });
  adapters.set(llm, adapter);

  log.info(
    { provider: adapter.name, model: adapter.model, max_attempts: llm.maxAttempts },
    "LLM adapter initialised"
  );
  return adapter;
}

/**
 * Reset adapter cache (useful for testing).
 */
export function resetAdapterCache(): void {
  adapters = new WeakMap();
}
