// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs/graphs`
 * Purpose: Barrel for graph factories and shared graph types.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export * from "./product-lookup/index";
export {
  asInvokableGraph,
  type GraphInvokeOptions,
  type GraphLogger,
  type InvokableGraph,
  type MessageGraphInput,
  type MessageGraphOutput,
} from "./types";
