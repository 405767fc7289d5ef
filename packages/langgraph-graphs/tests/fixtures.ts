// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs/tests/fixtures`
 * Purpose: Tool runner over in-memory product data, plus message builders for graph tests.
 * Side-effects: none
 * @internal
 */

import {
  createStaticToolSource,
  createToolRunner,
  type Message,
  type ToolInvocationRecord,
  type ToolRunner,
  type ToolSpec,
} from "@prodassist/ai-core";
import {
  createFixedClock,
  createProductToolCatalog,
  createStaticApiRegistry,
  type JsonValue,
  PRODUCT_TOOL_CONTRACTS,
  ProductDataError,
  toBoundToolRuntimes,
  toToolSpecs,
} from "@prodassist/ai-tools";

export const BEARING_6205: JsonValue = {
  designation: "6205",
  dimensions: [
    { name: "Outside diameter", symbol: "D", value: 52, unit: "mm" },
    { name: "Bore diameter", symbol: "d", value: 25, unit: "mm" },
    { name: "Width", symbol: "B", value: 15, unit: "mm" },
  ],
};

export interface ProductToolHarness {
  readonly runner: ToolRunner;
  readonly specs: ToolSpec[];
  readonly invocations: ToolInvocationRecord[];
}

export function createProductToolHarness(
  documents: JsonValue[] = [BEARING_6205]
): ProductToolHarness {
  const catalog = createProductToolCatalog({
    clock: createFixedClock("2025-01-02T03:04:05.000Z"),
    apiRegistry: createStaticApiRegistry(),
    products: {
      async readOne(path = "sample.json") {
        throw new ProductDataError("not_found", `File not found: ${path}`);
      },
      async readAll() {
        return documents;
      },
    },
  });
  const invocations: ToolInvocationRecord[] = [];
  const runner = createToolRunner(
    createStaticToolSource(toBoundToolRuntimes(catalog)),
    { onInvocation: (record) => invocations.push(record) }
  );
  return { runner, specs: toToolSpecs(PRODUCT_TOOL_CONTRACTS), invocations };
}

export function user(content: string): Message {
  return { role: "user", content };
}

export function toolRound(
  calls: ReadonlyArray<{ id: string; name: string; args: Record<string, unknown>; result: string }>
): Message[] {
  return [
    {
      role: "assistant",
      content: "",
      toolCalls: calls.map((c) => ({
        id: c.id,
        name: c.name,
        arguments: JSON.stringify(c.args),
      })),
    },
    ...calls.map(
      (c): Message => ({ role: "tool", content: c.result, toolCallId: c.id, name: c.name })
    ),
  ];
}

export function assistant(content: string): Message {
  return { role: "assistant", content };
}
