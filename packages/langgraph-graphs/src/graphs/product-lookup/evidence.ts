// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs/graphs/product-lookup/evidence`
 * Purpose: Rebuild the bounded window of tool evidence used by the verifier and the grounding score.
 * Scope: Pure scan of domain messages.
 * Invariants:
 *   - One block per tool-calling assistant turn: its consecutive tool results joined by a space
 *   - Snippets longer than 600 chars are cut and end with "…"
 *   - Newest N turns kept, returned oldest first; empty snippets never count
 * Side-effects: none
 * @public
 */

import { hasToolCalls, type Message } from "@prodassist/ai-core";

import { NO_EVIDENCE_PLACEHOLDER } from "./prompts";

export const DEFAULT_EVIDENCE_WINDOW = 3;
export const EVIDENCE_SNIPPET_CHARS = 600;

export interface EvidenceBlock {
  /** Tool names of the turn, comma separated */
  readonly label: string;
  readonly text: string;
}

export function collectEvidenceBlocks(
  history: readonly Message[],
  maxBlocks: number = DEFAULT_EVIDENCE_WINDOW
): EvidenceBlock[] {
  const blocks: EvidenceBlock[] = [];

  for (let i = history.length - 1; i >= 0 && blocks.length < maxBlocks; i--) {
    const message = history[i];
    if (!message || !hasToolCalls(message)) continue;

    const collected: string[] = [];
    for (let j = i + 1; j < history.length; j++) {
      const next = history[j];
      if (next?.role !== "tool") break;
      collected.push(next.content);
    }

    const joined = collected.join(" ").trim();
    if (!joined) continue;
    const text =
      joined.length > EVIDENCE_SNIPPET_CHARS
        ? `${joined.slice(0, EVIDENCE_SNIPPET_CHARS)}…`
        : joined;
    const label = message.toolCalls.map((c) => c.name).join(", ") || "tool_call";
    blocks.push({ label, text });
  }

  return blocks.reverse();
}

/** `[E1 • label]\ntext` blocks separated by blank lines. */
export function formatEvidenceBlocks(blocks: readonly EvidenceBlock[]): string {
  if (blocks.length === 0) return NO_EVIDENCE_PLACEHOLDER;
  return blocks
    .map((block, index) => `[E${index + 1} • ${block.label}]\n${block.text}`)
    .join("\n\n");
}
