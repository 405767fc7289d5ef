// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs/tests/product-lookup-graph`
 * Purpose: End-to-end runs of the product lookup loop over scripted models and the real tool catalog.
 * Scope: No network; models are ScriptedChatModel, product data is in memory.
 * Side-effects: none
 * @internal
 */

import { SystemMessage } from "@langchain/core/messages";
import { describe, expect, it, vi } from "vitest";

import { createProductLookupRunner } from "../src/graphs/product-lookup/runner";
import { ScriptedChatModel } from "../src/testing";
import { createProductToolHarness, toolRound, user } from "./fixtures";

const KV_CALL = {
  toolCalls: [
    { id: "call_a", name: "get_product_kv_pairs_tool", args: { designation: "6205" } },
  ],
};

function setup(primary: ConstructorParameters<typeof ScriptedChatModel>[0], verifier: string[] = []) {
  const harness = createProductToolHarness();
  const llm = new ScriptedChatModel(primary);
  const verifierLlm = new ScriptedChatModel(verifier);
  const logger = { debug: vi.fn(), warn: vi.fn() };
  return { harness, llm, verifierLlm, logger };
}

describe("product lookup runner", () => {
  it("answers a width question in two model calls and three appended turns", async () => {
    const { harness, llm, verifierLlm, logger } = setup(
      [KV_CALL, "The width of 6205 is 15 mm."],
      ["The width of 6205 is 15 mm.\nConfidence: 0.92\nEvidence: E1"]
    );
    const runner = createProductLookupRunner({
      llm,
      verifierLlm,
      tools: harness.specs,
      toolExec: harness.runner.exec,
      logger,
    });

    const result = await runner.run({ history: [user("width of 6205?")] });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(llm.calls).toHaveLength(2);
    expect(verifierLlm.calls).toHaveLength(1);
    expect(result.appended).toHaveLength(3);

    const [request, toolResult, final] = result.appended;
    expect(request).toEqual({
      role: "assistant",
      content: "",
      toolCalls: [
        { id: "call_a", name: "get_product_kv_pairs_tool", arguments: '{"designation":"6205"}' },
      ],
    });
    expect(toolResult).toMatchObject({
      role: "tool",
      toolCallId: "call_a",
      name: "get_product_kv_pairs_tool",
    });
    const payload: unknown = JSON.parse(toolResult?.content ?? "null");
    expect(payload).toMatchObject({
      items: [
        {
          designation: "6205",
          truncated: false,
          kv: expect.arrayContaining([
            { path: "dimensions[2].symbol", value: "B" },
            { path: "dimensions[2].value", value: 15 },
            { path: "dimensions[2].unit", value: "mm" },
          ]),
        },
      ],
      truncated: false,
    });

    expect(final).toEqual({
      role: "assistant",
      content:
        "The width of 6205 is 15 mm.\nConfidence: 0.92\nEvidence: E1\n\nTools used: get_product_kv_pairs_tool",
    });
    expect(result.metadata).toEqual({
      confidence: "High",
      grounded: true,
      hallucination: false,
      toolsUsed: ["get_product_kv_pairs_tool"],
      evidenceIds: ["E1"],
    });
    expect(harness.invocations.map((r) => r.toolCallId)).toEqual(["call_a"]);
    expect(logger.debug).toHaveBeenCalledWith(
      { event: "agent.tool_round", round: 1, tools: ["get_product_kv_pairs_tool"] },
      "tool round complete"
    );
  });

  it("binds every tool spec to the primary model and prompts with a fresh context", async () => {
    const { harness, llm, verifierLlm } = setup(["Hello."], ["Hello."]);
    const runner = createProductLookupRunner({
      llm,
      verifierLlm,
      tools: harness.specs,
      toolExec: harness.runner.exec,
    });

    await runner.run({ history: [user("hi")] });

    expect(llm.boundTools).toHaveLength(6);
    expect(llm.boundTools[0]).toMatchObject({ type: "function", function: { name: "time_tool" } });
    const [system] = llm.calls[0] ?? [];
    expect(system).toBeInstanceOf(SystemMessage);
    expect(system?.content).toContain("Recent context: none\n");
  });

  it("injects designations from earlier turns into the next prompt", async () => {
    const { harness, llm, verifierLlm } = setup(["It is 52 mm."], ["It is 52 mm."]);
    const runner = createProductLookupRunner({
      llm,
      verifierLlm,
      tools: harness.specs,
      toolExec: harness.runner.exec,
    });
    const history = [
      user("width of 6205?"),
      ...toolRound([
        { id: "c1", name: "get_product_kv_pairs_tool", args: { designation: "6205" }, result: "{}" },
      ]),
      { role: "assistant" as const, content: "15 mm.\n\nTools used: get_product_kv_pairs_tool" },
      user("and its outer diameter?"),
    ];

    const result = await runner.run({ history });

    expect(llm.calls[0]?.[0]?.content).toContain("Recent designations discussed: 6205");
    expect(result.ok && result.appended).toEqual([
      { role: "assistant", content: "It is 52 mm.\n\nTools used: none" },
    ]);
    expect(result.ok && result.metadata.grounded).toBe(false);
  });

  it("surfaces tool failures to the model as error payloads", async () => {
    const { harness, llm, verifierLlm, logger } = setup(
      [{ toolCalls: [{ id: "u1", name: "launch_rocket", args: {} }] }, "I cannot do that."],
      ["I cannot do that."]
    );
    const runner = createProductLookupRunner({
      llm,
      verifierLlm,
      tools: harness.specs,
      toolExec: harness.runner.exec,
      logger,
    });

    const result = await runner.run({ history: [user("launch")] });

    expect(result.ok && result.appended[1]).toEqual({
      role: "tool",
      content: '{"error":"Unknown tool: launch_rocket"}',
      toolCallId: "u1",
      name: "launch_rocket",
    });
    expect(logger.warn).toHaveBeenCalledWith(
      { event: "tool.failed", tool: "launch_rocket", errorCode: "unknown_tool" },
      "Unknown tool: launch_rocket"
    );
  });

  it("keeps request order for concurrent read-only calls", async () => {
    const { harness, llm, verifierLlm } = setup(
      [
        {
          toolCalls: [
            { id: "t1", name: "get_product_kv_pairs_tool", args: { designation: "6205" } },
            { id: "t2", name: "time_tool", args: {} },
          ],
        },
        "Done.",
      ],
      ["Done."]
    );
    const runner = createProductLookupRunner({
      llm,
      verifierLlm,
      tools: harness.specs,
      toolExec: harness.runner.exec,
    });

    const result = await runner.run({ history: [user("both")] });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.appended.map((m) => (m.role === "tool" ? m.toolCallId : m.role))).toEqual([
      "assistant",
      "t1",
      "t2",
      "assistant",
    ]);
    expect(result.appended[2]?.content).toBe('{"current_time":"2025-01-02T03:04:05.000Z"}');
    expect(result.finalText).toBe("Done.\n\nTools used: get_product_kv_pairs_tool, time_tool");
  });

  it("answers with the insufficient-evidence text when the draft is empty", async () => {
    const { harness, llm, verifierLlm } = setup([""]);
    const runner = createProductLookupRunner({
      llm,
      verifierLlm,
      tools: harness.specs,
      toolExec: harness.runner.exec,
    });

    const result = await runner.run({ history: [user("?")] });

    expect(result.ok && result.finalText).toBe(
      "I don't have enough evidence from the loaded data.\n\nTools used: none"
    );
    expect(verifierLlm.calls).toHaveLength(0);
  });

  it("fails with loop_exceeded once the round cap is reached", async () => {
    const { harness, llm, verifierLlm } = setup([KV_CALL, KV_CALL]);
    const runner = createProductLookupRunner({
      llm,
      verifierLlm,
      tools: harness.specs,
      toolExec: harness.runner.exec,
      maxToolRounds: 1,
    });

    const result = await runner.run({ history: [user("loop")] });

    expect(result).toMatchObject({ ok: false, error: "loop_exceeded" });
    expect(llm.calls).toHaveLength(2);
    expect(harness.invocations).toHaveLength(1);
  });

  it("fails with timeout when the primary model exceeds its deadline", async () => {
    const { harness, llm, verifierLlm } = setup([{ hang: true }]);
    const runner = createProductLookupRunner({
      llm,
      verifierLlm,
      tools: harness.specs,
      toolExec: harness.runner.exec,
      modelTimeoutMs: 20,
    });

    const result = await runner.run({ history: [user("slow")] });

    expect(result).toMatchObject({ ok: false, error: "timeout" });
  });

  it("fails with aborted when the caller cancels a pending model call", async () => {
    const { harness, llm, verifierLlm } = setup([{ hang: true }]);
    const runner = createProductLookupRunner({
      llm,
      verifierLlm,
      tools: harness.specs,
      toolExec: harness.runner.exec,
    });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    const result = await runner.run({ history: [user("slow")], signal: controller.signal });

    expect(result).toMatchObject({ ok: false, error: "aborted" });
    expect(llm.calls).toHaveLength(1);
  });

  it("fails with aborted when the caller cancels during verification", async () => {
    const { harness, llm, verifierLlm, logger } = setup(["Draft answer."], []);
    const hangingVerifier = new ScriptedChatModel([{ hang: true }]);
    const runner = createProductLookupRunner({
      llm,
      verifierLlm: hangingVerifier,
      tools: harness.specs,
      toolExec: harness.runner.exec,
      logger,
    });
    const controller = new AbortController();
    setTimeout(() => controller.abort(), 20);

    const result = await runner.run({ history: [user("q")], signal: controller.signal });

    expect(result).toMatchObject({ ok: false, error: "aborted" });
    expect(hangingVerifier.calls).toHaveLength(1);
    expect(verifierLlm.calls).toHaveLength(0);
    expect(logger.warn).not.toHaveBeenCalled();
  });

  it("fails with aborted when the signal is already cancelled", async () => {
    const { harness, llm, verifierLlm } = setup(["never used"]);
    const runner = createProductLookupRunner({
      llm,
      verifierLlm,
      tools: harness.specs,
      toolExec: harness.runner.exec,
    });

    const result = await runner.run({ history: [user("q")], signal: AbortSignal.abort() });

    expect(result).toMatchObject({ ok: false, error: "aborted" });
  });

  it("fails with internal when the primary model errors", async () => {
    const { harness, llm, verifierLlm } = setup([new Error("connection reset")]);
    const runner = createProductLookupRunner({
      llm,
      verifierLlm,
      tools: harness.specs,
      toolExec: harness.runner.exec,
    });

    const result = await runner.run({ history: [user("hi")] });

    expect(result).toMatchObject({
      ok: false,
      error: "internal",
      errorMessage: "LlmError: connection reset",
    });
  });

  it("rejects a history with unanswered tool calls", async () => {
    const { harness, llm, verifierLlm } = setup([]);
    const runner = createProductLookupRunner({
      llm,
      verifierLlm,
      tools: harness.specs,
      toolExec: harness.runner.exec,
    });

    const result = await runner.run({
      history: [
        user("q"),
        {
          role: "assistant",
          content: "",
          toolCalls: [{ id: "x", name: "time_tool", arguments: "{}" }],
        },
      ],
    });

    expect(result).toEqual({
      ok: false,
      error: "invalid_request",
      errorMessage: "history ends with unanswered tool calls",
    });
    expect(llm.calls).toHaveLength(0);
  });
});
