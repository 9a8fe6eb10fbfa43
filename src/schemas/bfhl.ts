import { z } from "zod";
import type { Limits } from "../config/index.js";

/**
 * Operation keys accepted by POST /bfhl, in the order they are listed
 * back to clients.
 */
export const BFHL_OPERATIONS = ["fibonacci", "prime", "lcm", "hcf", "AI"] as const;

export type BfhlOperationKind = (typeof BFHL_OPERATIONS)[number];

export function isBfhlOperationKind(key: string): key is BfhlOperationKind {
  return BFHL_OPERATIONS.some((operation) => operation === key);
}

/**
 * Validated request, one variant per operation
 */
export type BfhlOperation =
  | { kind: "fibonacci"; n: number }
  | { kind: "prime"; values: number[] }
  | { kind: "lcm"; values: number[] }
  | { kind: "hcf"; values: number[] }
  | { kind: "AI"; question: string };

/**
 * Result payload placed in the success envelope's `data` field
 */
export type BfhlData = number[] | number | string;

function integerElement(kind: BfhlOperationKind) {
  const message = `${kind} array must contain only integers`;
  return z
    .number({ invalid_type_error: message, required_error: message })
    .int(message)
    .safe(message);
}

function integerArray(kind: BfhlOperationKind, element: z.ZodNumber, limits: Limits) {
  return z
    .array(element, {
      invalid_type_error: `${kind} requires an array`,
      required_error: `${kind} requires an array`,
    })
    .max(limits.maxArraySize, `Array size must be <= ${limits.maxArraySize}`);
}

function positiveIntegerArray(kind: "lcm" | "hcf", limits: Limits) {
  return integerArray(kind, integerElement(kind).positive(`${kind} requires positive integers`), limits)
    .min(1, `${kind} requires a non-empty array`);
}

/**
 * Build the per-operation value schemas for the configured limits
 */
export function buildValueSchemas(limits: Limits) {
  return {
    fibonacci: z
      .number({
        invalid_type_error: "fibonacci requires an integer",
        required_error: "fibonacci requires an integer",
      })
      .int("fibonacci requires an integer")
      .min(0, "fibonacci requires a non-negative integer")
      .max(limits.maxFibonacciN, `fibonacci N must be <= ${limits.maxFibonacciN}`),

    prime: integerArray("prime", integerElement("prime"), limits),

    lcm: positiveIntegerArray("lcm", limits),

    hcf: positiveIntegerArray("hcf", limits),

    AI: z
      .string({
        invalid_type_error: "AI requires a string",
        required_error: "AI requires a string",
      })
      .trim()
      .min(1, "AI requires a non-empty string")
      .max(limits.maxAiQuestionLength, `AI string must be <= ${limits.maxAiQuestionLength} characters`),
  } satisfies Record<BfhlOperationKind, z.ZodTypeAny>;
}

export type BfhlValueSchemas = ReturnType<typeof buildValueSchemas>;
