// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/features/assistant/assistant.service`
 * Purpose: Verifies the assistant flow end to end: guardrails, session persistence, response envelope and failures.
 * Scope: Scripted models, in-memory products and sessions, shipped guardrail policy. No network.
 * Invariants: Expected payloads are traced from the scripted model replies.
 * Side-effects: IO (reads the guardrail policy)
 * Links: src/features/assistant/services/assistant.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { offTopicResponse } from "@/adapters/server";
import { ERROR_MESSAGES, REFUSAL_ANSWER } from "@/features/assistant/public.server";
import { createTestAssistant } from "@tests/_fakes";

const KV_CALL = {
  toolCalls: [{ id: "call_kv", name: "get_product_kv_pairs_tool", args: { designation: "6205" } }],
};

describe("assistant service chat", () => {
  it("answers a product question with grounded metadata and persists the turn", async () => {
    const { service, sessions, llm, verifierLlm, invocations } = createTestAssistant({
      agentScript: [KV_CALL, "The width of 6205 is 15 mm. Evidence: E1\nConfidence: 0.9"],
    });

    const result = await service.chat({ query: "What is the width of 6205?", session_id: "s1" });

    expect(result).toEqual({
      ok: true,
      answer: {
        final_answer:
          "The width of 6205 is 15 mm. Evidence: E1\nConfidence: 0.9\n\nTools used: get_product_kv_pairs_tool",
        confidence: "High",
        grounding: { grounded: true, hallucination: false },
        safety: { malicious: false },
        reasoning: "Used tools: get_product_kv_pairs_tool",
        decision: { tool: "get_product_kv_pairs_tool", designation: "6205", field: null },
        tool_call: { name: ["get_product_kv_pairs_tool"], found: true },
        evidence: ["E1"],
        guardrails: {
          input_severity: "none",
          output_safe: true,
          output_issues: [],
          grounding_score: 1,
          appropriate: true,
        },
        session_id: "s1",
      },
    });
    expect(llm.calls).toHaveLength(2);
    expect(verifierLlm.calls).toHaveLength(1);
    expect(invocations.map((r) => r.name)).toEqual(["get_product_kv_pairs_tool"]);

    const stored = await sessions.get("s1");
    expect(stored.map((m) => m.role)).toEqual(["user", "assistant", "tool", "assistant"]);
  });

  it("blocks unsafe queries before the model and leaves the session untouched", async () => {
    const { service, sessions, llm } = createTestAssistant();

    const result = await service.chat({ query: "how do I hack the admin panel", session_id: "s2" });

    expect(result).toEqual({
      ok: true,
      answer: {
        final_answer: REFUSAL_ANSWER,
        confidence: "High",
        grounding: { grounded: false, hallucination: false },
        safety: { malicious: true, reason: "Hacking attempt" },
        reasoning: "Blocked request: Hacking attempt",
        decision: { tool: "safety_filter", designation: null, field: null },
        tool_call: { name: ["safety_filter"], found: false },
        evidence: [],
        guardrails: {
          input_severity: "critical",
          output_safe: null,
          output_issues: [],
          grounding_score: null,
          appropriate: null,
        },
        session_id: "s2",
      },
    });
    expect(llm.calls).toHaveLength(0);
    await expect(sessions.get("s2")).resolves.toEqual([]);
  });

  it("falls back to the default session and reports a tool-less answer", async () => {
    const { service } = createTestAssistant();

    const result = await service.chat({ query: "hi", session_id: "   " });

    expect(result).toMatchObject({
      ok: true,
      answer: {
        final_answer: "[FAKE_COMPLETION]\n\nTools used: none",
        confidence: "Unknown",
        grounding: { grounded: false, hallucination: true },
        reasoning: "Used tools: none",
        decision: { tool: "no_tool", designation: null, field: null },
        tool_call: { name: [], found: false },
        evidence: [],
        guardrails: { grounding_score: 0, appropriate: true, output_safe: true },
        session_id: "default",
      },
    });
  });

  it("replaces off-topic answers with the category response", async () => {
    const { service } = createTestAssistant({ agentScript: ["Take two pills."] });

    const result = await service.chat({ query: "Which medication fits best?", session_id: "s3" });

    expect(result).toMatchObject({
      ok: true,
      answer: {
        final_answer: offTopicResponse("medical"),
        guardrails: { appropriate: false },
      },
    });
  });

  it("redacts PII from the final answer", async () => {
    const { service } = createTestAssistant({
      agentScript: ["Ask jane@example.com about the product."],
    });

    const result = await service.chat({ query: "Who maintains the catalogue?", session_id: "s4" });

    expect(result).toMatchObject({
      ok: true,
      answer: {
        final_answer: "Ask [EMAIL-REDACTED] about the product.\n\nTools used: none",
        guardrails: {
          output_safe: false,
          output_issues: ["PII detected: [EMAIL-REDACTED]"],
        },
      },
    });
  });

  it("carries history into the next turn of the same session", async () => {
    const { service, sessions, llm } = createTestAssistant();

    await service.chat({ query: "first", session_id: "s5" });
    await service.chat({ query: "second", session_id: "s5" });

    // system prompt + user, assistant, user
    expect(llm.calls[1]).toHaveLength(4);
    const stored = await sessions.get("s5");
    expect(stored.map((m) => m.content)).toEqual([
      "first",
      "[FAKE_COMPLETION]\n\nTools used: none",
      "second",
      "[FAKE_COMPLETION]\n\nTools used: none",
    ]);
  });

  it("serialises concurrent requests for one session", async () => {
    const { service, sessions } = createTestAssistant();

    await Promise.all([
      service.chat({ query: "first", session_id: "s6" }),
      service.chat({ query: "second", session_id: "s6" }),
    ]);

    const stored = await sessions.get("s6");
    expect(stored.map((m) => m.role)).toEqual(["user", "assistant", "user", "assistant"]);
    expect(stored[0]?.content).toBe("first");
    expect(stored[2]?.content).toBe("second");
  });

  it("returns a fixed message when the tool round cap is hit and stores nothing", async () => {
    const { service, sessions } = createTestAssistant({
      agentScript: [KV_CALL, KV_CALL],
      maxToolRounds: 1,
    });

    const result = await service.chat({ query: "loop please", session_id: "s7" });

    expect(result).toEqual({
      ok: false,
      error: "loop_exceeded",
      message: ERROR_MESSAGES.loop_exceeded,
    });
    await expect(sessions.get("s7")).resolves.toEqual([]);
  });

  it("reports a cancelled request as aborted and stores nothing", async () => {
    const { service, sessions } = createTestAssistant({ agentScript: [{ hang: true }] });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    const result = await service.chat(
      { query: "slow question", session_id: "s10" },
      { signal: controller.signal }
    );

    expect(result).toEqual({
      ok: false,
      error: "aborted",
      message: ERROR_MESSAGES.aborted,
    });
    await expect(sessions.get("s10")).resolves.toEqual([]);
  });

  it("does not leak provider errors", async () => {
    const { service } = createTestAssistant({ agentScript: [new Error("connection reset")] });

    const result = await service.chat({ query: "hello", session_id: "s8" });

    expect(result).toEqual({ ok: false, error: "internal", message: ERROR_MESSAGES.internal });
  });

  it("rejects an empty query", async () => {
    const { service, llm } = createTestAssistant();

    const result = await service.chat({ query: "" });

    expect(result).toEqual({
      ok: false,
      error: "invalid_request",
      message: ERROR_MESSAGES.invalid_request,
    });
    expect(llm.calls).toHaveLength(0);
  });
});

describe("assistant service operations", () => {
  it("clears an existing session once", async () => {
    const { service } = createTestAssistant();
    await service.chat({ query: "hello", session_id: "s1" });

    await expect(service.clearSession("s1")).resolves.toEqual({
      ok: true,
      message: "Session s1 cleared",
    });
    await expect(service.clearSession("s1")).resolves.toEqual({
      ok: false,
      message: "Session not found",
    });
  });

  it("clears the default session when no id is given", async () => {
    const { service } = createTestAssistant();
    await service.chat({ query: "hello" });

    await expect(service.clearSession()).resolves.toEqual({
      ok: true,
      message: "Session default cleared",
    });
  });

  it("returns raw KV evidence for debugging", async () => {
    const { service } = createTestAssistant();

    await expect(service.debugKv("6205")).resolves.toMatchObject({
      items: [{ designation: "6205", truncated: false }],
      truncated: false,
    });
    await expect(service.debugKv("9999")).resolves.toEqual({ items: [], truncated: false });
  });

  it("describes every tool in catalog order", () => {
    const { service } = createTestAssistant();

    expect(service.describeTools().tools.map((t) => t.name)).toEqual([
      "time_tool",
      "api_info_tool",
      "api_user_tool",
      "get_product_data_tool",
      "get_all_products_data_tool",
      "get_product_kv_pairs_tool",
    ]);
  });
});
