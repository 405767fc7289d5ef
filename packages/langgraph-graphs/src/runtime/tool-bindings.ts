// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs/runtime/tool-bindings`
 * Purpose: Turn compiled ToolSpecs into the function-tool definitions a chat model binds.
 * Scope: Shape conversion only. Execution stays with the ToolRunner, never with LangChain tools.
 * Invariants:
 *   - Parameters are the JSON Schema compiled from the Zod contract, unchanged
 *   - Order follows the spec list
 * Side-effects: none
 * @public
 */

import type { ToolSpec } from "@prodassist/ai-core";
import type { JSONSchema7 } from "json-schema";

export interface ModelToolDefinition {
  readonly type: "function";
  readonly function: {
    readonly name: string;
    readonly description: string;
    readonly parameters: JSONSchema7;
  };
}

export function toModelToolDefinitions(
  specs: readonly ToolSpec[]
): ModelToolDefinition[] {
  return specs.map((spec) => ({
    type: "function",
    function: {
      name: spec.name,
      description: spec.description,
      parameters: spec.inputSchema,
    },
  }));
}
