// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs/graphs/product-lookup/context`
 * Purpose: Recover the designations and field the conversation was last about, from earlier tool calls.
 * Scope: Pure scan of domain messages, newest first.
 * Invariants:
 *   - Stops at the first tool-calling assistant turn that yields a designation
 *   - At most 3 designations, in the order the calls appear within that turn
 *   - lastField is the newest `field` argument among the turns scanned
 * Side-effects: none
 * @public
 */

import {
  hasToolCalls,
  type Message,
  parseToolArguments,
  readStringArgument,
} from "@prodassist/ai-core";

export const MAX_CONTEXT_DESIGNATIONS = 3;

export interface ConversationContext {
  readonly designations: readonly string[];
  readonly lastField?: string;
}

function isProductTool(name: string): boolean {
  const lower = name.toLowerCase();
  return lower.includes("product") || lower.includes("kv");
}

export function extractContext(history: readonly Message[]): ConversationContext {
  const designations: string[] = [];
  let lastField: string | undefined;

  for (let i = history.length - 1; i >= 0; i--) {
    const message = history[i];
    if (!message || !hasToolCalls(message)) continue;

    let turnField: string | undefined;
    for (const call of message.toolCalls) {
      const args = parseToolArguments(call.arguments);
      if (!args) continue;
      const designation = readStringArgument(args, "designation");
      if (designation && isProductTool(call.name)) designations.push(designation);
      turnField = readStringArgument(args, "field") ?? turnField;
    }
    lastField ??= turnField;

    if (designations.length > 0) break;
  }

  return {
    designations: designations.slice(0, MAX_CONTEXT_DESIGNATIONS),
    ...(lastField ? { lastField } : {}),
  };
}
