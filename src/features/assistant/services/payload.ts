// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/assistant/services/payload`
 * Purpose: Builders for the chat response envelope: answered, blocked and failed.
 * Scope: Pure mapping from agent metadata, guardrail results and context to contract types. Does not run checks.
 * Invariants:
 *   - Failure messages are fixed per error code and never include provider or stack details
 *   - decision.tool is the first tool used in the turn, or "no_tool"
 * Side-effects: none
 * Links: src/contracts/assistant.chat.v1.contract.ts
 * @internal
 */

import type { AiExecutionErrorCode } from "@prodassist/ai-core";
import type {
  ConversationContext,
  ResponseMetadata,
} from "@prodassist/langgraph-graphs";

import type { AnswerPayload, ChatError } from "@/contracts/assistant.chat.v1.contract";
import type { GroundingScore, OutputCheck, TopicCheck, Verdict } from "@/ports";

export const SAFETY_FILTER_TOOL = "safety_filter";
export const NO_TOOL = "no_tool";

export const REFUSAL_ANSWER =
  "I cannot assist with this request. I'm designed to provide product information only and cannot help with unauthorized access, hacking, or requests involving sensitive credentials.";

export const ERROR_MESSAGES: Readonly<Record<AiExecutionErrorCode, string>> = {
  invalid_request: "The request could not be processed.",
  not_found: "The requested resource was not found.",
  timeout: "The model did not respond in time. Please try again.",
  aborted: "The request was cancelled.",
  rate_limit: "The model provider is busy. Please try again shortly.",
  loop_exceeded:
    "I could not resolve this question within the allowed number of tool calls. Please rephrase or narrow it down.",
  internal: "Something went wrong while answering. Please try again.",
};

export function failurePayload(code: AiExecutionErrorCode): ChatError {
  return { ok: false, error: code, message: ERROR_MESSAGES[code] };
}

export function blockedPayload(verdict: Verdict, sessionId: string): AnswerPayload {
  return {
    final_answer: REFUSAL_ANSWER,
    confidence: "High",
    grounding: { grounded: false, hallucination: false },
    safety: { malicious: true, reason: verdict.reason },
    reasoning: `Blocked request: ${verdict.reason}`,
    decision: { tool: SAFETY_FILTER_TOOL, designation: null, field: null },
    tool_call: { name: [SAFETY_FILTER_TOOL], found: false },
    evidence: [],
    guardrails: {
      input_severity: verdict.severity,
      output_safe: null,
      output_issues: [],
      grounding_score: null,
      appropriate: null,
    },
    session_id: sessionId,
  };
}

/** Answer after output guardrails: off-topic replacement wins over redaction. */
export function guardedAnswer(
  answer: string,
  output: OutputCheck,
  topic: TopicCheck
): string {
  if (!topic.appropriate) return topic.suggestedResponse;
  return output.safe ? answer : output.filteredAnswer;
}

export interface AnsweredPayloadInput {
  readonly finalAnswer: string;
  readonly metadata: ResponseMetadata;
  readonly context: ConversationContext;
  readonly verdict: Verdict;
  readonly output: OutputCheck;
  readonly topic: TopicCheck;
  readonly grounding: GroundingScore;
  readonly sessionId: string;
}

export function answeredPayload(input: AnsweredPayloadInput): AnswerPayload {
  const { metadata, context } = input;
  const toolsUsed = [...metadata.toolsUsed];

  return {
    final_answer: input.finalAnswer,
    confidence: metadata.confidence,
    grounding: {
      grounded: metadata.grounded,
      hallucination: metadata.hallucination,
    },
    safety: { malicious: false },
    reasoning: `Used tools: ${toolsUsed.join(", ") || "none"}`,
    decision: {
      tool: toolsUsed[0] ?? NO_TOOL,
      designation: context.designations[0] ?? null,
      field: context.lastField ?? null,
    },
    tool_call: { name: toolsUsed, found: metadata.grounded },
    evidence: [...metadata.evidenceIds],
    guardrails: {
      input_severity: input.verdict.severity,
      output_safe: input.output.safe,
      output_issues: [...input.output.issues],
      grounding_score: input.grounding.score,
      appropriate: input.topic.appropriate,
    },
    session_id: input.sessionId,
  };
}
