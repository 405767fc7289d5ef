// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-core/tooling/types`
 * Purpose: Canonical semantic types for tool specs, invocations, and execution results.
 * Scope: Framework-agnostic types. Does NOT import Zod; ToolSpec carries JSONSchema7 compiled in ai-tools.
 * Invariants:
 *   - EFFECT_TYPED: every tool declares its side-effect level; the graph only fans out read_only calls
 *   - TOOLRUNNER_RESULT_SHAPE: {ok:true, value} | {ok:false, errorCode, safeMessage}
 * Side-effects: none (types only)
 * @public
 */

import type { JSONSchema7 } from "json-schema";

export type ToolEffect = "read_only" | "state_change";

/**
 * Compiled form of a ToolContract (Zod → JSONSchema7), used for describeTools()
 * and provider wire encoding.
 */
export interface ToolSpec {
  /** Stable snake_case tool name exposed to the model */
  readonly name: string;
  readonly description: string;
  readonly inputSchema: JSONSchema7;
  readonly effect: ToolEffect;
}

/**
 * Failure classes for a single tool call.
 * The model only ever sees the safeMessage; the code is for logs.
 */
export type ToolErrorCode = "unknown_tool" | "validation" | "execution" | "timeout";

export type ToolResult<T> =
  | { readonly ok: true; readonly value: T }
  | {
      readonly ok: false;
      readonly errorCode: ToolErrorCode;
      readonly safeMessage: string;
    };

/** Lifecycle record of one tool call, handed to the runner's observer. */
export interface ToolInvocationRecord {
  readonly toolCallId: string;
  readonly name: string;
  readonly args: unknown;
  readonly error?: {
    readonly code: ToolErrorCode;
    readonly message: string;
  };
  /** Epoch milliseconds */
  readonly startedAtMs: number;
  readonly endedAtMs: number;
}

/**
 * Executable tool as seen by the runner.
 * Implementations live in @prodassist/ai-tools (which owns Zod).
 */
export interface BoundToolRuntime {
  readonly id: string;
  readonly spec: ToolSpec;
  readonly effect: ToolEffect;
  /** @throws Error whose message is safe to show the model */
  validateInput(rawArgs: unknown): unknown;
  exec(validatedArgs: unknown): Promise<unknown>;
  /** @throws Error when the tool produced something outside its contract */
  validateOutput(rawOutput: unknown): unknown;
}

export interface ToolExecOptions {
  /** Model-provided tool call id; generated when absent */
  readonly modelToolCallId?: string;
}

/** Signature of the runner's exec; this is what graphs depend on. */
export type ToolExecFn = (
  toolName: string,
  rawArgs: unknown,
  options?: ToolExecOptions
) => Promise<ToolResult<unknown>>;
