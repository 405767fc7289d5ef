// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-tools/types`
 * Purpose: Contract / implementation / bound-tool types for product lookup tools.
 * Scope: Types only. Does NOT import LangChain; wrapping for the model happens in langgraph-graphs.
 * Invariants:
 *   - inputSchema is the single source of truth for tool arguments (validation + JSON schema)
 *   - Implementations receive validated input and may throw; the runner converts throws to ToolResult
 * Side-effects: none (types only)
 * @public
 */

import type { ToolEffect } from "@prodassist/ai-core";
import type { z } from "zod";

/**
 * Tool contract: schema and description without implementation.
 * Input type parameter on the Zod schemas is left open so `.default()` fields stay expressible.
 */
export interface ToolContract<TName extends string, TInput, TOutput> {
  /** Stable snake_case name the model calls */
  readonly name: TName;
  /** Human-readable description for the model */
  readonly description: string;
  readonly effect: ToolEffect;
  readonly inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  readonly outputSchema: z.ZodType<TOutput, z.ZodTypeDef, unknown>;
}

export interface ToolImplementation<TInput, TOutput> {
  execute(input: TInput): Promise<TOutput>;
}

export interface BoundTool<TName extends string, TInput, TOutput> {
  readonly contract: ToolContract<TName, TInput, TOutput>;
  readonly implementation: ToolImplementation<TInput, TOutput>;
}
