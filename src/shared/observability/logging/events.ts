// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/events`
 * Purpose: Event names and payload shapes for assistant structured logs.
 * Scope: Type and constant definitions only.
 * Invariants: Every event carries reqId and sessionId through the request child logger; payload fields are flat.
 * Side-effects: none
 * Links: features/assistant/services/assistant.ts, @prodassist/langgraph-graphs (agent.* and tool.* events)
 * @public
 */

export const EVENT_NAMES = {
  ASSISTANT_REQUEST: "assistant.request",
  ASSISTANT_BLOCKED: "assistant.blocked",
  ASSISTANT_COMPLETE: "assistant.complete",
  ASSISTANT_FAILED: "assistant.failed",
  AGENT_TOOL_ROUND: "agent.tool_round",
  AGENT_VERIFY_FALLBACK: "agent.verify_fallback",
  TOOL_FAILED: "tool.failed",
  TOOL_INVOKED: "tool.invoked",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];

export interface AssistantRequestEvent {
  event: typeof EVENT_NAMES.ASSISTANT_REQUEST;
  textChars: number;
}

export interface AssistantBlockedEvent {
  event: typeof EVENT_NAMES.ASSISTANT_BLOCKED;
  severity: string;
  violations: readonly string[];
}

export interface AssistantCompleteEvent {
  event: typeof EVENT_NAMES.ASSISTANT_COMPLETE;
  durationMs: number;
  toolsUsed: readonly string[];
  grounded: boolean;
  confidence: string;
  outputSafe: boolean;
  appropriate: boolean;
}

export interface AssistantFailedEvent {
  event: typeof EVENT_NAMES.ASSISTANT_FAILED;
  durationMs: number;
  errorCode: string;
  err: string;
}

export interface ToolInvokedEvent {
  event: typeof EVENT_NAMES.TOOL_INVOKED;
  tool: string;
  toolCallId: string;
  durationMs: number;
  errorCode?: string;
}

export type AssistantLogEvent =
  | AssistantRequestEvent
  | AssistantBlockedEvent
  | AssistantCompleteEvent
  | AssistantFailedEvent;
