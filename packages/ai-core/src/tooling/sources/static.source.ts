// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-core/tooling/sources/static.source`
 * Purpose: Tool source over a fixed set of bound tools.
 * Scope: Implements ToolSourcePort for the product tool catalog. Does NOT import Zod or modify tools.
 * Invariants:
 *   - TOOL_ID_STABILITY: ids unique; no mutation after construction
 * Side-effects: none
 * @public
 */

import type { ToolSourcePort } from "../ports/tool-source.port";
import type { BoundToolRuntime, ToolSpec } from "../types";

export class StaticToolSource implements ToolSourcePort {
  private readonly toolMap: ReadonlyMap<string, BoundToolRuntime>;
  private readonly specs: readonly ToolSpec[];

  constructor(tools: ReadonlyMap<string, BoundToolRuntime>) {
    this.toolMap = tools;
    this.specs = Array.from(tools.values(), (t) => t.spec);
  }

  getBoundTool(toolId: string): BoundToolRuntime | undefined {
    return this.toolMap.get(toolId);
  }

  listToolSpecs(): readonly ToolSpec[] {
    return this.specs;
  }

  hasToolId(toolId: string): boolean {
    return this.toolMap.has(toolId);
  }

  get size(): number {
    return this.toolMap.size;
  }
}

/**
 * @throws If two runtimes share an id
 */
export function createStaticToolSource(
  tools: readonly BoundToolRuntime[]
): StaticToolSource {
  const map = new Map<string, BoundToolRuntime>();
  for (const tool of tools) {
    if (map.has(tool.id)) {
      throw new Error(
        `TOOL_ID_STABILITY violation: Duplicate tool ID "${tool.id}".`
      );
    }
    map.set(tool.id, tool);
  }
  return new StaticToolSource(map);
}
