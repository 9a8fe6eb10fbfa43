import OpenAI from "openai";
import { log } from "../../utils/telemetry.js";
import type { LLMAdapter, OneWordArgs, OneWordResult, CallOpts } from "./types.js";
import {
  UpstreamTimeoutError,
  UpstreamHTTPError,
  UpstreamEmptyResponseError,
  UpstreamConfigurationError,
} from "./errors.js";
import { makeIdempotencyKey } from "./idempotency.js";
import { buildOneWordPrompt, extractSingleWord } from "./normalisation.js";
import { startCallTimeout, readErrorStatus, readErrorString } from "./call-timeout.js";

const DEFAULT_MODEL = "gpt-4o-mini";

// A one-word answer never needs more than a handful of tokens
const MAX_TOKENS = 16;

/**
 * OpenAI adapter implementing the LLMAdapter interface.
 * Uses the chat completions API at temperature 0.
 */
export class OpenAIAdapter implements LLMAdapter {
  readonly name = "openai" as const;
  readonly model: string;
  private client: OpenAI | null = null;

  constructor(
    private readonly apiKey: string | undefined,
    model?: string
  ) {
    this.model = model || DEFAULT_MODEL;
  }

  // Lazy initialization to allow building the server without an API key
  private getClient(): OpenAI {
    if (!this.apiKey) {
      throw new UpstreamConfigurationError("OPENAI_API_KEY is required but not set", "openai");
    }
    if (!this.client) {
      // Retries are handled by withRetry so backoff and telemetry stay in one place
      this.client = new OpenAI({ apiKey: this.apiKey, maxRetries: 0 });
    }
    return this.client;
  }

  async answerOneWord(args: OneWordArgs, opts: CallOpts): Promise<OneWordResult> {
    const apiClient = this.getClient();
    const prompt = buildOneWordPrompt(args.question);

    const idempotencyKey = makeIdempotencyKey(opts.requestId, args.question);
    const startTime = Date.now();

    log.info(
      {
        question_chars: args.question.length,
        model: this.model,
        provider: "openai",
        request_id: opts.requestId,
        idempotency_key: idempotencyKey,
      },
      "calling OpenAI for one-word answer"
    );

    const timeout = startCallTimeout(opts);

    try {
      const response = await apiClient.chat.completions.create(
        {
          model: this.model,
          messages: [{ role: "user", content: prompt }],
          temperature: 0,
          max_tokens: MAX_TOKENS,
        },
        {
          signal: timeout.signal,
          headers: { "Idempotency-Key": idempotencyKey },
        }
      );

      const answer = extractSingleWord(response.choices[0]?.message?.content);
      if (!answer) {
        log.warn({ request_id: opts.requestId, finish_reason: response.choices[0]?.finish_reason }, "OpenAI returned no usable word");
        throw new UpstreamEmptyResponseError("OpenAI returned empty content", "openai");
      }

      return {
        answer,
        usage: {
          input_tokens: response.usage?.prompt_tokens ?? 0,
          output_tokens: response.usage?.completion_tokens ?? 0,
        },
      };
    } catch (error) {
      const elapsedMs = Date.now() - startTime;

      if (error instanceof UpstreamEmptyResponseError) {
        throw error;
      }

      if (error instanceof Error) {
        // Throw typed UpstreamTimeoutError for timeout classification
        if (error.name === "AbortError" || timeout.signal.aborted) {
          log.error({ timeout_ms: opts.timeoutMs, elapsed_ms: elapsedMs }, "OpenAI one-word call timed out");
          throw new UpstreamTimeoutError(
            "OpenAI answer_one_word timed out",
            "openai",
            "answer_one_word",
            elapsedMs,
            error
          );
        }

        const status = readErrorStatus(error);
        if (status !== undefined) {
          const requestId = readErrorString(error, "request_id");
          log.error(
            { status, provider_request_id: requestId, elapsed_ms: elapsedMs },
            "OpenAI API returned non-2xx status"
          );
          throw new UpstreamHTTPError(
            `OpenAI answer_one_word failed: ${error.message || "unknown error"}`,
            "openai",
            status,
            readErrorString(error, "code") ?? readErrorString(error, "type"),
            requestId,
            elapsedMs,
            error
          );
        }
      }

      log.error({ error }, "OpenAI one-word call failed");
      throw error;
    } finally {
      timeout.clear();
    }
  }
}
