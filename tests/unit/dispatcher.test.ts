import { describe, it, expect } from "vitest";
import { dispatchBfhl, type DispatchDeps } from "../../src/services/bfhl.js";
import { ApiError } from "../../src/utils/errors.js";
import {
  UpstreamConfigurationError,
  UpstreamEmptyResponseError,
  UpstreamHTTPError,
  UpstreamTimeoutError,
} from "../../src/adapters/llm/errors.js";
import { FakeAdapter } from "../helpers/fake-adapter.js";

function deps(adapter: FakeAdapter): DispatchDeps {
  return { adapter, requestId: "req-dispatch", llmTimeoutMs: 15000 };
}

async function rejectionOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("Should have thrown");
}

describe("dispatchBfhl", () => {
  it("runs the arithmetic handlers without touching the adapter", async () => {
    const adapter = new FakeAdapter();

    await expect(dispatchBfhl({ kind: "fibonacci", n: 7 }, deps(adapter))).resolves.toEqual([0, 1, 1, 2, 3, 5, 8]);
    await expect(dispatchBfhl({ kind: "prime", values: [2, 4, 7, 9, 11] }, deps(adapter))).resolves.toEqual([2, 7, 11]);
    await expect(dispatchBfhl({ kind: "lcm", values: [4, 6, 8] }, deps(adapter))).resolves.toBe(24);
    await expect(dispatchBfhl({ kind: "hcf", values: [12, 18, 24] }, deps(adapter))).resolves.toBe(6);
    expect(adapter.calls).toEqual([]);
  });

  it("passes the question, request id and timeout to the adapter", async () => {
    const adapter = new FakeAdapter().answerWith("Paris");

    const data = await dispatchBfhl({ kind: "AI", question: "Capital of France?" }, deps(adapter));

    expect(data).toBe("Paris");
    expect(adapter.calls).toEqual([
      {
        args: { question: "Capital of France?" },
        opts: { requestId: "req-dispatch", timeoutMs: 15000 },
      },
    ]);
  });

  it.each([
    [new UpstreamTimeoutError("t", "openai", "answer_one_word", 15000), "AI service timed out"],
    [new UpstreamHTTPError("h", "openai", 503, undefined, undefined, 40), "AI service returned an error"],
    [new UpstreamEmptyResponseError("e", "openai"), "No response from AI service"],
    [new UpstreamConfigurationError("c", "openai"), "AI service is not configured"],
    [new Error("getaddrinfo ENOTFOUND api.example.com"), "AI service error"],
  ])("maps adapter failure %# to UPSTREAM_ERROR", async (cause, message) => {
    const adapter = new FakeAdapter().failWith(cause);

    const error = await rejectionOf(dispatchBfhl({ kind: "AI", question: "Q?" }, deps(adapter)));

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ code: "UPSTREAM_ERROR", message, cause });
  });

  it("lets handler errors through unchanged", async () => {
    const error = await rejectionOf(dispatchBfhl({ kind: "lcm", values: [2 ** 52, 3] }, deps(new FakeAdapter())));

    expect(error).toBeInstanceOf(ApiError);
    expect(error).toMatchObject({ code: "UNPROCESSABLE_ENTITY", message: "lcm result exceeds the safe integer range" });
  });
});
