// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs/graphs/types`
 * Purpose: Shared graph type definitions.
 * Scope: Type firewall for LangGraph generics. Does NOT implement graph logic.
 * Invariants:
 *   - SINGLE_INVOKABLE_INTERFACE: Graphs are consumed as InvokableGraph<I,O>
 *   - LANGCHAIN_ALIGNED: Uses RunnableConfig/RunnableInterface from @langchain/core
 * Side-effects: none (types + one runtime assertion)
 * @public
 */

import type { BaseMessage } from "@langchain/core/messages";
import type {
  RunnableConfig,
  RunnableInterface,
} from "@langchain/core/runnables";

/**
 * Options for graph invocation.
 * Includes: signal, configurable, metadata, tags, callbacks, recursionLimit, etc.
 */
export type GraphInvokeOptions = Partial<RunnableConfig>;

/**
 * Generic invokable graph interface.
 * Type firewall: exposes only invoke() from RunnableInterface.
 */
export type InvokableGraph<I, O> = Pick<RunnableInterface<I, O>, "invoke">;

/**
 * Centralized cast with runtime assertion.
 *
 * @throws Error if graph does not implement invoke()
 */
export function asInvokableGraph<I, O>(g: unknown): InvokableGraph<I, O> {
  if (!g || typeof (g as Record<string, unknown>).invoke !== "function") {
    const actualType = g === null ? "null" : typeof g;
    const keys = g && typeof g === "object" ? Object.keys(g).join(", ") : "n/a";
    throw new Error(
      `Graph does not implement invoke(). Got ${actualType} with keys: [${keys}]`
    );
  }
  return g as InvokableGraph<I, O>;
}

export type MessageGraphInput = { readonly messages: readonly BaseMessage[] };
export type MessageGraphOutput = { readonly messages: BaseMessage[] };

/**
 * Minimal structured logger graphs accept. A pino Logger satisfies it;
 * the package itself stays free of a logging dependency.
 */
export interface GraphLogger {
  debug(obj: Record<string, unknown>, msg?: string): void;
  warn(obj: Record<string, unknown>, msg?: string): void;
}
