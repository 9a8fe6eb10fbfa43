import Anthropic from "@anthropic-ai/sdk";
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

const DEFAULT_MODEL = "claude-3-5-haiku-20241022";
const MAX_TOKENS = 16;

/**
 * Anthropic adapter implementing the LLMAdapter interface.
 */
export class AnthropicAdapter implements LLMAdapter {
  readonly name = "anthropic" as const;
  readonly model: string;
  private client: Anthropic | null = null;

  constructor(
    private readonly apiKey: string | undefined,
    model?: string
  ) {
    this.model = model || DEFAULT_MODEL;
  }

  private getClient(): Anthropic {
    if (!this.apiKey) {
      throw new UpstreamConfigurationError("ANTHROPIC_API_KEY is required but not set", "anthropic");
    }
    if (!this.client) {
      this.client = new Anthropic({ apiKey: this.apiKey, maxRetries: 0 });
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
        provider: "anthropic",
        request_id: opts.requestId,
        idempotency_key: idempotencyKey,
      },
      "calling Anthropic for one-word answer"
    );

    const timeout = startCallTimeout(opts);

    try {
      const response = await apiClient.messages.create(
        {
          model: this.model,
          max_tokens: MAX_TOKENS,
          temperature: 0,
          messages: [{ role: "user", content: prompt }],
        },
        {
          signal: timeout.signal,
          headers: { "Idempotency-Key": idempotencyKey },
        }
      );

      let text: string | undefined;
      for (const block of response.content) {
        if (block.type === "text") {
          text = block.text;
          break;
        }
      }

      const answer = extractSingleWord(text);
      if (!answer) {
        log.warn({ request_id: opts.requestId, stop_reason: response.stop_reason }, "Anthropic returned no usable word");
        throw new UpstreamEmptyResponseError("Anthropic returned empty content", "anthropic");
      }

      return {
        answer,
        usage: {
          input_tokens: response.usage.input_tokens,
          output_tokens: response.usage.output_tokens,
        },
      };
    } catch (error) {
      const elapsedMs = Date.now() - startTime;

      if (error instanceof UpstreamEmptyResponseError) {
        throw error;
      }

      if (error instanceof Error) {
        if (error.name === "AbortError" || timeout.signal.aborted) {
          log.error({ timeout_ms: opts.timeoutMs, elapsed_ms: elapsedMs }, "Anthropic one-word call timed out");
          throw new UpstreamTimeoutError(
            "Anthropic answer_one_word timed out",
            "anthropic",
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
            "Anthropic API returned non-2xx status"
          );
          throw new UpstreamHTTPError(
            `Anthropic answer_one_word failed: ${error.message || "unknown error"}`,
            "anthropic",
            status,
            readErrorString(error, "type"),
            requestId,
            elapsedMs,
            error
          );
        }
      }

      log.error({ error }, "Anthropic one-word call failed");
      throw error;
    } finally {
      timeout.clear();
    }
  }
}
