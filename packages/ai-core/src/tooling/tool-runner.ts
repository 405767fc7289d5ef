// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-core/tooling/tool-runner`
 * Purpose: Single execution path for tool calls: lookup, argument validation, timed execution, output validation.
 * Scope: Converts every failure into a ToolResult so the agent loop can feed it back to the model. Does not log; callers observe via onInvocation.
 * Invariants:
 *   - TOOLRUNNER_PIPELINE_ORDER: lookup → validate args → execute (with timeout) → validate result → return
 *   - TOOLRUNNER_NEVER_THROWS: exec() resolves for every input
 *   - TOOLCALL_ID_STABLE: model-provided id reused when present
 * Side-effects: none (observer callback is the caller's responsibility)
 * @public
 */

import { randomUUID } from "node:crypto";

import type { ToolSourcePort } from "./ports/tool-source.port";
import type {
  ToolErrorCode,
  ToolExecFn,
  ToolExecOptions,
  ToolInvocationRecord,
  ToolResult,
} from "./types";

export interface ToolRunnerConfig {
  /** Per-call execution budget; omitted or 0 means unbounded */
  readonly timeoutMs?: number;
  /** Called once per exec() with the finished record */
  readonly onInvocation?: (record: ToolInvocationRecord) => void;
  /** Clock override for deterministic records */
  readonly now?: () => number;
}

export interface ToolRunner {
  readonly exec: ToolExecFn;
}

class ToolTimeoutError extends Error {
  constructor(toolName: string, timeoutMs: number) {
    super(`Tool '${toolName}' timed out after ${timeoutMs}ms`);
    this.name = "ToolTimeoutError";
  }
}

async function withTimeout<T>(
  work: Promise<T>,
  toolName: string,
  timeoutMs: number | undefined
): Promise<T> {
  if (!timeoutMs || timeoutMs <= 0) return work;
  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new ToolTimeoutError(toolName, timeoutMs)),
      timeoutMs
    );
  });
  try {
    return await Promise.race([work, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

function messageOf(err: unknown, fallback: string): string {
  return err instanceof Error && err.message ? err.message : fallback;
}

export function createToolRunner(
  source: ToolSourcePort,
  config?: ToolRunnerConfig
): ToolRunner {
  const now = config?.now ?? Date.now;
  const timeoutMs = config?.timeoutMs;
  const onInvocation = config?.onInvocation;

  async function exec(
    toolName: string,
    rawArgs: unknown,
    options?: ToolExecOptions
  ): Promise<ToolResult<unknown>> {
    const toolCallId = options?.modelToolCallId ?? `call_${randomUUID()}`;
    const startedAtMs = now();

    const finish = (result: ToolResult<unknown>): ToolResult<unknown> => {
      onInvocation?.({
        toolCallId,
        name: toolName,
        args: rawArgs,
        ...(result.ok
          ? {}
          : { error: { code: result.errorCode, message: result.safeMessage } }),
        startedAtMs,
        endedAtMs: now(),
      });
      return result;
    };
    const fail = (errorCode: ToolErrorCode, safeMessage: string) =>
      finish({ ok: false, errorCode, safeMessage });

    // 1. Lookup
    const boundTool = source.getBoundTool(toolName);
    if (!boundTool) {
      return fail("unknown_tool", `Unknown tool: ${toolName}`);
    }

    // 2. Validate args
    let validatedInput: unknown;
    try {
      validatedInput = boundTool.validateInput(rawArgs);
    } catch (err) {
      return fail("validation", messageOf(err, "Invalid tool arguments"));
    }

    // 3. Execute
    let rawOutput: unknown;
    try {
      rawOutput = await withTimeout(
        boundTool.exec(validatedInput),
        toolName,
        timeoutMs
      );
    } catch (err) {
      if (err instanceof ToolTimeoutError) {
        return fail("timeout", err.message);
      }
      return fail("execution", messageOf(err, "Tool execution failed"));
    }

    // 4. Validate result
    try {
      return finish({ ok: true, value: boundTool.validateOutput(rawOutput) });
    } catch (err) {
      return fail("validation", messageOf(err, "Invalid tool output"));
    }
  }

  return { exec };
}
