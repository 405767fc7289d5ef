// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-core/chat/message`
 * Purpose: Canonical conversation message union shared by the agent loop, session store and extractors.
 * Scope: Types plus pure helpers over message history. Does NOT depend on LangChain; converters live in langgraph-graphs.
 * Invariants:
 *   - TOOL_RESULT_PAIRING: every tool message answers a call id of the nearest preceding assistant message that has tool calls
 *   - ARGS_ON_WIRE_FORM: tool call arguments stay a JSON string; parse with parseToolArguments()
 * Side-effects: none
 * @public
 */

export interface MessageToolCall {
  /** Provider-issued id, echoed back by the matching tool message */
  readonly id: string;
  readonly name: string;
  /** JSON-encoded arguments as the model produced them */
  readonly arguments: string;
}

export interface SystemChatMessage {
  readonly role: "system";
  readonly content: string;
}

export interface UserChatMessage {
  readonly role: "user";
  readonly content: string;
}

export interface AssistantChatMessage {
  readonly role: "assistant";
  readonly content: string;
  readonly toolCalls?: readonly MessageToolCall[];
}

export interface ToolChatMessage {
  readonly role: "tool";
  readonly content: string;
  readonly toolCallId: string;
  readonly name?: string;
}

export type Message =
  | SystemChatMessage
  | UserChatMessage
  | AssistantChatMessage
  | ToolChatMessage;

export type MessageRole = Message["role"];

export type ToolCallingMessage = AssistantChatMessage & {
  readonly toolCalls: readonly MessageToolCall[];
};

export function hasToolCalls(message: Message): message is ToolCallingMessage {
  return (
    message.role === "assistant" &&
    message.toolCalls !== undefined &&
    message.toolCalls.length > 0
  );
}

export type ToolArguments = Readonly<Record<string, unknown>>;

/**
 * Parse the wire-form arguments of a tool call.
 * Returns undefined when the payload is not a JSON object.
 */
export function parseToolArguments(raw: string): ToolArguments | undefined {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    return undefined;
  }
  if (typeof parsed !== "object" || parsed === null || Array.isArray(parsed)) {
    return undefined;
  }
  return Object.fromEntries(Object.entries(parsed));
}

/** Non-blank string argument, or undefined. */
export function readStringArgument(
  args: ToolArguments,
  key: string
): string | undefined {
  const value = args[key];
  return typeof value === "string" && value.trim() !== "" ? value : undefined;
}

/**
 * Check TOOL_RESULT_PAIRING over a whole history.
 * Returns a description of the first violation, or null when the history is well-formed.
 */
export function findToolPairingViolation(
  history: readonly Message[]
): string | null {
  let open: Set<string> | null = null;
  for (const [index, message] of history.entries()) {
    if (message.role === "tool") {
      if (!open?.has(message.toolCallId)) {
        return `tool message at ${index} answers unknown call '${message.toolCallId}'`;
      }
      open.delete(message.toolCallId);
      continue;
    }
    if (open && open.size > 0) {
      return `assistant tool calls left unanswered before message ${index}`;
    }
    open = hasToolCalls(message)
      ? new Set(message.toolCalls.map((call) => call.id))
      : null;
  }
  if (open && open.size > 0) {
    return "history ends with unanswered tool calls";
  }
  return null;
}
