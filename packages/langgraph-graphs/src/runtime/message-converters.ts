// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs/runtime/message-converters`
 * Purpose: Convert between the ai-core Message union and LangChain BaseMessage.
 * Scope: Pure mapping. Complex (multi-part) content is reduced to its text parts.
 * Invariants:
 *   - Tool call arguments cross as a JSON string in the domain and as an object in LangChain
 *   - Unparseable domain arguments become {} rather than throwing
 * Side-effects: none
 * @public
 */

import {
  type Message,
  type MessageToolCall,
  parseToolArguments,
} from "@prodassist/ai-core";
import {
  AIMessage,
  type BaseMessage,
  HumanMessage,
  isAIMessage,
  isToolMessage,
  type MessageContent,
  SystemMessage,
  ToolMessage,
} from "@langchain/core/messages";

/** Text of a message content, joining the text parts of multi-part content. */
export function messageText(content: MessageContent): string {
  if (typeof content === "string") return content;
  let text = "";
  for (const part of content) {
    if (part.type === "text" && "text" in part && typeof part.text === "string") {
      text += part.text;
    }
  }
  return text;
}

export function toBaseMessage(message: Message): BaseMessage {
  switch (message.role) {
    case "user":
      return new HumanMessage({ content: message.content });
    case "system":
      return new SystemMessage({ content: message.content });
    case "assistant":
      return new AIMessage({
        content: message.content,
        tool_calls: (message.toolCalls ?? []).map((tc) => ({
          id: tc.id,
          name: tc.name,
          args: { ...parseToolArguments(tc.arguments) },
          type: "tool_call" as const,
        })),
      });
    case "tool":
      return new ToolMessage({
        content: message.content,
        tool_call_id: message.toolCallId,
        ...(message.name ? { name: message.name } : {}),
      });
    default: {
      const _exhaustive: never = message;
      throw new Error(`Unknown message: ${JSON.stringify(_exhaustive)}`);
    }
  }
}

export function fromBaseMessage(message: BaseMessage): Message {
  const content = messageText(message.content);

  if (isAIMessage(message)) {
    const toolCalls: MessageToolCall[] = (message.tool_calls ?? []).map((tc) => ({
      id: tc.id ?? "",
      name: tc.name,
      arguments: JSON.stringify(tc.args),
    }));
    return {
      role: "assistant",
      content,
      ...(toolCalls.length > 0 ? { toolCalls } : {}),
    };
  }

  if (isToolMessage(message)) {
    return {
      role: "tool",
      content,
      toolCallId: message.tool_call_id,
      ...(message.name ? { name: message.name } : {}),
    };
  }

  const type = message.getType();
  switch (type) {
    case "human":
      return { role: "user", content };
    case "system":
      return { role: "system", content };
    default:
      throw new Error(`Unsupported message type in history: ${type}`);
  }
}
