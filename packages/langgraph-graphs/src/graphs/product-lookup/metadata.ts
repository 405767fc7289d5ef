// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs/graphs/product-lookup/metadata`
 * Purpose: Derive confidence, grounding and citation metadata from the final answer and history.
 * Scope: Pure text parsing and history scan.
 * Invariants:
 *   - grounded requires both a tool call in the current turn and at least one cited evidence id
 *   - A no-evidence phrase in the answer forces hallucination=true
 *   - tools_used never looks past the latest user message
 * Side-effects: none
 * @public
 */

import { hasToolCalls, type Message } from "@prodassist/ai-core";

export type ConfidenceLabel = "High" | "Medium" | "Low" | "Unknown";

export interface ResponseMetadata {
  readonly confidence: ConfidenceLabel;
  readonly grounded: boolean;
  readonly hallucination: boolean;
  readonly toolsUsed: readonly string[];
  readonly evidenceIds: readonly string[];
}

const CONFIDENCE_PATTERN = /Confidence:\s*([0-9.]+|High|Medium|Low)/i;
const EVIDENCE_LINE = /Evidence:[ \t]*([^\r\n]*)/i;
const EVIDENCE_ID = /\bE\d+\b/gi;
const NUMERIC_PATTERN = /^[0-9]*\.?[0-9]+$/;

export const NO_EVIDENCE_PHRASES: readonly string[] = [
  "don't have enough evidence",
  "not found in evidence",
  "no evidence",
  "cannot find",
  "not available in the data",
  "lack evidence",
];

export function parseConfidence(text: string): ConfidenceLabel {
  // A sentence-ending period is not part of the number
  const raw = CONFIDENCE_PATTERN.exec(text)?.[1]?.replace(/\.$/, "");
  if (!raw) return "Unknown";

  if (NUMERIC_PATTERN.test(raw)) {
    const value = Number.parseFloat(raw);
    if (value >= 0.8) return "High";
    if (value >= 0.5) return "Medium";
    return "Low";
  }

  switch (raw.toLowerCase()) {
    case "high":
      return "High";
    case "medium":
      return "Medium";
    case "low":
      return "Low";
    default:
      return "Unknown";
  }
}

/** Citation ids on the `Evidence:` line only; prose after the line break is ignored. */
export function parseEvidenceIds(text: string): string[] {
  const line = EVIDENCE_LINE.exec(text)?.[1];
  if (!line) return [];
  return line.match(EVIDENCE_ID) ?? [];
}

/** Tool names of the newest tool-calling assistant turn since the latest user message. */
export function toolsUsedInCurrentTurn(history: readonly Message[]): string[] {
  for (let i = history.length - 1; i >= 0; i--) {
    const message = history[i];
    if (!message || message.role === "user") break;
    if (hasToolCalls(message)) return message.toolCalls.map((call) => call.name);
  }
  return [];
}

export function containsNoEvidencePhrase(text: string): boolean {
  const lower = text.toLowerCase();
  return NO_EVIDENCE_PHRASES.some((phrase) => lower.includes(phrase));
}

export function extractMetadata(
  finalText: string,
  history: readonly Message[]
): ResponseMetadata {
  const toolsUsed = toolsUsedInCurrentTurn(history);
  const evidenceIds = parseEvidenceIds(finalText);
  const grounded = toolsUsed.length > 0 && evidenceIds.length > 0;

  return {
    confidence: parseConfidence(finalText),
    grounded,
    hallucination: !grounded || containsNoEvidencePhrase(finalText),
    toolsUsed,
    evidenceIds,
  };
}
