// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-core/tooling/ports/tool-source.port`
 * Purpose: Port interface for tool sources.
 * Scope: Abstracts tool lookup and listing. Does NOT import Zod or execute tools.
 * Invariants:
 *   - getBoundTool returns an executable BoundToolRuntime or undefined
 *   - All tool execution flows through the tool runner
 * Side-effects: none (types only)
 * @public
 */

import type { BoundToolRuntime, ToolSpec } from "../types";

export interface ToolSourcePort {
  /** Executable tool by name, or undefined when this source does not have it. */
  getBoundTool(toolId: string): BoundToolRuntime | undefined;

  /** Specs for every tool in the source, in registration order. */
  listToolSpecs(): readonly ToolSpec[];

  hasToolId(toolId: string): boolean;
}
