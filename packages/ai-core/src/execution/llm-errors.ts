// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-core/execution/llm-errors`
 * Purpose: Typed model-provider failures and their classification.
 * Scope: LlmError class plus toLlmError() for wrapping provider SDK errors at the model call boundary. Does not normalize to execution codes (see error-codes.ts).
 * Invariants:
 *   - LlmError captures kind + optional HTTP status at the call site
 *   - toLlmError is idempotent on LlmError
 * Side-effects: none
 * Links: error-codes.ts (normalizeErrorToExecutionCode)
 * @public
 */

export type LlmErrorKind =
  | "timeout"
  | "rate_limited"
  | "provider_4xx"
  | "provider_5xx"
  | "aborted"
  | "unknown";

export class LlmError extends Error {
  readonly kind: LlmErrorKind;
  readonly status: number | undefined;

  constructor(message: string, kind: LlmErrorKind, status?: number) {
    super(message);
    this.name = "LlmError";
    this.kind = kind;
    this.status = status;
  }
}

export function isLlmError(error: unknown): error is LlmError {
  return error instanceof LlmError;
}

export function classifyLlmErrorFromStatus(status: number): LlmErrorKind {
  if (status === 408) return "timeout";
  if (status === 429) return "rate_limited";
  if (status >= 400 && status < 500) return "provider_4xx";
  if (status >= 500 && status < 600) return "provider_5xx";
  return "unknown";
}

function readStatus(error: object): number | undefined {
  if ("status" in error && typeof error.status === "number") {
    return error.status;
  }
  return undefined;
}

/**
 * Wrap whatever a provider SDK threw into an LlmError.
 * AbortErrors pass through unchanged so cancellation stays recognizable.
 */
export function toLlmError(error: unknown): Error {
  if (isLlmError(error)) return error;
  if (!(error instanceof Error)) {
    return new LlmError(String(error), "unknown");
  }
  if (error.name === "AbortError") return error;

  const status = readStatus(error);
  if (status !== undefined) {
    return new LlmError(error.message, classifyLlmErrorFromStatus(status), status);
  }
  if (/timed? ?out/i.test(error.message) || error.name.includes("Timeout")) {
    return new LlmError(error.message, "timeout");
  }
  return new LlmError(error.message, "unknown");
}
