// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs/tests/metadata`
 * Purpose: Confidence, citation and grounding extraction from final answers.
 * Side-effects: none
 * @internal
 */

import { describe, expect, it } from "vitest";

import {
  extractMetadata,
  parseConfidence,
  parseEvidenceIds,
  toolsUsedInCurrentTurn,
} from "../src/graphs/product-lookup/metadata";
import { assistant, toolRound, user } from "./fixtures";

const KV_TURN = toolRound([
  { id: "c1", name: "get_product_kv_pairs_tool", args: { designation: "6205" }, result: "{}" },
]);

describe("parseConfidence", () => {
  it.each([
    ["Confidence: 0.85", "High"],
    ["Confidence: 0.8", "High"],
    ["Confidence: 0.5", "Medium"],
    ["Confidence: 0.49", "Low"],
    ["Confidence: 0.9.", "High"],
    ["confidence: medium", "Medium"],
    ["Confidence: HIGH", "High"],
    ["no footer", "Unknown"],
    ["Confidence: 1.2.3", "Unknown"],
  ])("%s → %s", (text, expected) => {
    expect(parseConfidence(text)).toBe(expected);
  });
});

describe("parseEvidenceIds", () => {
  it("splits and trims the cited ids", () => {
    expect(parseEvidenceIds("x\nEvidence: E1, E2\n\nTools used: y")).toEqual(["E1", "E2"]);
  });

  it("stops at the end of the evidence line", () => {
    expect(parseEvidenceIds("Evidence: E1\nExtra note")).toEqual(["E1"]);
    expect(parseEvidenceIds("Evidence: E1 and E3.\nConfidence: 0.9")).toEqual(["E1", "E3"]);
  });

  it("ignores an evidence line without ids", () => {
    expect(parseEvidenceIds("Evidence: none\nE2 appears later")).toEqual([]);
  });

  it("returns an empty list without a footer", () => {
    expect(parseEvidenceIds("nothing cited")).toEqual([]);
  });
});

describe("toolsUsedInCurrentTurn", () => {
  it("reads the newest tool-calling turn", () => {
    const history = [
      user("q"),
      ...toolRound([{ id: "a", name: "time_tool", args: {}, result: "{}" }]),
      ...KV_TURN,
    ];
    expect(toolsUsedInCurrentTurn(history)).toEqual(["get_product_kv_pairs_tool"]);
  });

  it("does not look past the latest user message", () => {
    const history = [user("q1"), ...KV_TURN, assistant("a1"), user("thanks")];
    expect(toolsUsedInCurrentTurn(history)).toEqual([]);
  });
});

describe("extractMetadata", () => {
  it("grounds a cited answer after a tool turn", () => {
    const history = [user("width of 6205?"), ...KV_TURN];
    const text = "The width of 6205 is 15 mm.\nConfidence: 0.85\nEvidence: E1, E2";

    expect(extractMetadata(text, history)).toEqual({
      confidence: "High",
      grounded: true,
      hallucination: false,
      toolsUsed: ["get_product_kv_pairs_tool"],
      evidenceIds: ["E1", "E2"],
    });
  });

  it("flags a no-evidence phrase even when citations are present", () => {
    const history = [user("limiting speed of 6205?"), ...KV_TURN];
    const text = "Limiting speed: not found in evidence.\nConfidence: 0.9\nEvidence: E1";

    const meta = extractMetadata(text, history);
    expect(meta.grounded).toBe(true);
    expect(meta.hallucination).toBe(true);
  });

  it("is ungrounded without tools even when ids are cited", () => {
    const meta = extractMetadata("Hi.\nEvidence: E1", [user("hello")]);
    expect(meta.grounded).toBe(false);
    expect(meta.hallucination).toBe(true);
    expect(meta.confidence).toBe("Unknown");
  });
});
