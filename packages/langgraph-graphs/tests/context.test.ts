// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs/tests/context`
 * Purpose: Recovery of recent designations and field from earlier tool calls.
 * Side-effects: none
 * @internal
 */

import { describe, expect, it } from "vitest";

import { extractContext } from "../src/graphs/product-lookup/context";
import { assistant, toolRound, user } from "./fixtures";

describe("extractContext", () => {
  it("returns the designation of the latest KV call without a field", () => {
    const history = [
      user("width of 6205?"),
      ...toolRound([
        {
          id: "c1",
          name: "get_product_kv_pairs_tool",
          args: { designation: "6205" },
          result: "{}",
        },
      ]),
      assistant("The width of 6205 is 15 mm."),
    ];

    expect(extractContext(history)).toEqual({ designations: ["6205"] });
  });

  it("reports the field argument alongside the designation", () => {
    const history = toolRound([
      {
        id: "c1",
        name: "get_product_kv_pairs_tool",
        args: { designation: "6205", field: "Width" },
        result: "{}",
      },
    ]);

    expect(extractContext(history)).toEqual({
      designations: ["6205"],
      lastField: "Width",
    });
  });

  it("stops at the newest turn with designations and caps them at three", () => {
    const older = toolRound([
      { id: "o1", name: "get_product_kv_pairs_tool", args: { designation: "6000" }, result: "{}" },
    ]);
    const newer = toolRound(
      ["6205", "6305", "6405", "6505"].map((d, i) => ({
        id: `n${i}`,
        name: "get_product_kv_pairs_tool",
        args: { designation: d },
        result: "{}",
      }))
    );

    expect(extractContext([...older, user("and those?"), ...newer]).designations).toEqual([
      "6205",
      "6305",
      "6405",
    ]);
  });

  it("skips tool turns without designations and keeps scanning older turns", () => {
    const history = [
      ...toolRound([
        { id: "a", name: "get_product_kv_pairs_tool", args: { designation: "6205" }, result: "{}" },
      ]),
      ...toolRound([{ id: "b", name: "time_tool", args: {}, result: "{}" }]),
    ];

    expect(extractContext(history).designations).toEqual(["6205"]);
  });

  it("ignores designations passed to tools that are not product or KV tools", () => {
    const history = toolRound([
      { id: "a", name: "api_user_tool", args: { designation: "6205", APIname: "x" }, result: "{}" },
    ]);

    expect(extractContext(history)).toEqual({ designations: [] });
  });

  it("ignores malformed argument payloads", () => {
    const history: Parameters<typeof extractContext>[0] = [
      {
        role: "assistant",
        content: "",
        toolCalls: [{ id: "x", name: "get_product_kv_pairs_tool", arguments: "{not json" }],
      },
      { role: "tool", content: "{}", toolCallId: "x" },
    ];

    expect(extractContext(history)).toEqual({ designations: [] });
  });

  it("returns an empty context for an empty history", () => {
    expect(extractContext([])).toEqual({ designations: [] });
  });
});
