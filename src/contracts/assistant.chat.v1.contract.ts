// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@contracts/assistant.chat.v1.contract`
 * Purpose: Wire contracts for the product assistant operations: chat, clear session, debug KV and tool listing.
 * Scope: Zod schemas and inferred types. Does not contain business logic.
 * Invariants: Contract remains stable; breaking changes require new version. All consumers use z.infer types.
 * Side-effects: none
 * Links: src/features/assistant/services/assistant.ts
 * @public
 */

import type { JSONSchema7 } from "json-schema";
import { z } from "zod";

export const DEFAULT_SESSION_ID = "default";

/** Blank, missing or non-string ids fall back to the shared default session. */
export function normalizeSessionId(raw: unknown): string {
  return (typeof raw === "string" && raw.trim()) || DEFAULT_SESSION_ID;
}

export const SessionIdSchema = z
  .string()
  .optional()
  .transform(normalizeSessionId);

const SeveritySchema = z.enum(["none", "low", "medium", "high", "critical"]);

const ExecutionErrorCodeSchema = z.enum([
  "invalid_request",
  "not_found",
  "timeout",
  "aborted",
  "rate_limit",
  "loop_exceeded",
  "internal",
]);

// ---------------------------------------------------------------------------
// Chat
// ---------------------------------------------------------------------------

export const AnswerPayloadSchema = z.object({
  final_answer: z.string(),
  confidence: z.enum(["High", "Medium", "Low", "Unknown"]),
  grounding: z.object({
    grounded: z.boolean(),
    hallucination: z.boolean(),
  }),
  safety: z.object({
    malicious: z.boolean(),
    reason: z.string().optional(),
  }),
  reasoning: z.string(),
  decision: z.object({
    tool: z.string(),
    designation: z.string().nullable(),
    field: z.string().nullable(),
  }),
  tool_call: z.object({
    name: z.array(z.string()),
    found: z.boolean(),
  }),
  evidence: z.array(z.string()),
  guardrails: z.object({
    input_severity: SeveritySchema,
    output_safe: z.boolean().nullable(),
    output_issues: z.array(z.string()),
    grounding_score: z.number().nullable(),
    appropriate: z.boolean().nullable(),
  }),
  session_id: z.string(),
});
export type AnswerPayload = z.infer<typeof AnswerPayloadSchema>;

export const ChatErrorSchema = z.object({
  ok: z.literal(false),
  error: ExecutionErrorCodeSchema,
  message: z.string(),
});
export type ChatError = z.infer<typeof ChatErrorSchema>;

export const chatOperation = {
  id: "assistant.chat.v1",
  summary: "Answer a product question within a session",
  input: z.object({
    query: z.string().min(1).max(20_000),
    session_id: SessionIdSchema,
  }),
  output: z.discriminatedUnion("ok", [
    z.object({ ok: z.literal(true), answer: AnswerPayloadSchema }),
    ChatErrorSchema,
  ]),
} as const;

export type ChatInput = z.input<typeof chatOperation.input>;
export type ChatOutput = z.infer<typeof chatOperation.output>;

// ---------------------------------------------------------------------------
// Clear session
// ---------------------------------------------------------------------------

export const clearSessionOperation = {
  id: "assistant.session.clear.v1",
  summary: "Drop the stored history of a session",
  input: z.object({ session_id: SessionIdSchema }),
  output: z.object({ ok: z.boolean(), message: z.string() }),
} as const;

export type ClearSessionOutput = z.infer<typeof clearSessionOperation.output>;

// ---------------------------------------------------------------------------
// Debug KV
// ---------------------------------------------------------------------------

export const debugKvOperation = {
  id: "assistant.debug.kv.v1",
  summary: "Raw flattened key-value evidence for one product or all of them",
  input: z.object({ designation: z.string().optional() }),
  output: z.unknown(),
} as const;

// ---------------------------------------------------------------------------
// Tool catalog
// ---------------------------------------------------------------------------

export const describeToolsOperation = {
  id: "assistant.tools.list.v1",
  summary: "JSON-schema specs of every tool the model may call",
  input: z.object({}),
  output: z.object({
    tools: z.array(
      z.object({
        name: z.string(),
        description: z.string(),
        effect: z.enum(["read_only", "state_change"]),
        inputSchema: z.custom<JSONSchema7>(
          (value) => typeof value === "object" && value !== null
        ),
      })
    ),
  }),
} as const;

export type DescribeToolsOutput = z.infer<typeof describeToolsOperation.output>;
