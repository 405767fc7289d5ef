// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-core/execution/error-codes`
 * Purpose: Canonical error codes, error class, and normalization for assistant request failures.
 * Scope: Single source of truth for execution error codes. Does NOT decide user-facing wording.
 * Invariants:
 *   - ERROR_NORMALIZATION_ONCE: normalizeErrorToExecutionCode() is the only normalizer
 *   - AiExecutionError carries a structured code through graph and service layers
 *   - Recognizes AiExecutionError (.code), LlmError (.kind, .status) and AbortError
 * Side-effects: none
 * Links: llm-errors.ts
 * @public
 */

import { isLlmError } from "./llm-errors";

/**
 * Canonical error codes for assistant request failures.
 * - invalid_request: input missing or malformed
 * - not_found: referenced resource (dataset, tool) does not exist
 * - timeout: model or tool exceeded its time limit
 * - aborted: caller cancelled the request
 * - rate_limit: provider rate limit exceeded (HTTP 429)
 * - loop_exceeded: agent kept requesting tools past the round cap
 * - internal: anything else
 */
export const AI_EXECUTION_ERROR_CODES = [
  "invalid_request",
  "not_found",
  "timeout",
  "aborted",
  "rate_limit",
  "loop_exceeded",
  "internal",
] as const;

export type AiExecutionErrorCode = (typeof AI_EXECUTION_ERROR_CODES)[number];

export class AiExecutionError extends Error {
  readonly code: AiExecutionErrorCode;

  constructor(code: AiExecutionErrorCode, message?: string) {
    super(message ?? `Assistant execution failed: ${code}`);
    this.name = "AiExecutionError";
    this.code = code;
  }
}

export function isAiExecutionError(error: unknown): error is AiExecutionError {
  return error instanceof AiExecutionError;
}

/**
 * Normalize any error to a stable AiExecutionErrorCode.
 *
 * Priority:
 * 1. AbortError → "aborted"
 * 2. AiExecutionError → its code
 * 3. LlmError → status first, then kind
 * 4. Default → "internal"
 */
export function normalizeErrorToExecutionCode(
  error: unknown
): AiExecutionErrorCode {
  if (error instanceof Error && error.name === "AbortError") {
    return "aborted";
  }

  if (isAiExecutionError(error)) {
    return error.code;
  }

  if (isLlmError(error)) {
    if (error.status === 429) return "rate_limit";
    if (error.status === 408) return "timeout";

    switch (error.kind) {
      case "rate_limited":
        return "rate_limit";
      case "timeout":
        return "timeout";
      case "aborted":
        return "aborted";
      default:
        return "internal";
    }
  }

  return "internal";
}
