// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs/graphs/product-lookup/model-call`
 * Purpose: Single model invocation with a deadline and provider error wrapping.
 * Scope: Used by the agent node and the verifier.
 * Invariants:
 *   - Deadline expiry aborts the call and surfaces LlmError(kind="timeout")
 *   - Cancellation of the caller's signal propagates to the call and surfaces AiExecutionError("aborted")
 *   - Every other failure leaves through toLlmError()
 * Side-effects: IO (model call)
 * @internal
 */

import type { BaseLanguageModelInput } from "@langchain/core/language_models/base";
import type { AIMessageChunk } from "@langchain/core/messages";
import type {
  RunnableConfig,
  RunnableInterface,
} from "@langchain/core/runnables";
import {
  AiExecutionError,
  isLlmError,
  LlmError,
  toLlmError,
} from "@prodassist/ai-core";

export type ChatRunnable = Pick<
  RunnableInterface<BaseLanguageModelInput, AIMessageChunk>,
  "invoke"
>;

export async function invokeWithDeadline(
  model: ChatRunnable,
  input: BaseLanguageModelInput,
  timeoutMs: number,
  config?: RunnableConfig
): Promise<AIMessageChunk> {
  const controller = new AbortController();
  const parent = config?.signal;
  const forwardAbort = () => controller.abort(parent?.reason);
  if (parent?.aborted) forwardAbort();
  else parent?.addEventListener("abort", forwardAbort, { once: true });

  const timer =
    timeoutMs > 0
      ? setTimeout(
          () =>
            controller.abort(
              new LlmError(`Model call timed out after ${timeoutMs}ms`, "timeout")
            ),
          timeoutMs
        )
      : undefined;

  try {
    return await model.invoke(input, { ...config, signal: controller.signal });
  } catch (error) {
    if (parent?.aborted) throw new AiExecutionError("aborted", "Request was cancelled");
    const reason: unknown = controller.signal.reason;
    if (controller.signal.aborted && isLlmError(reason)) throw reason;
    throw toLlmError(error);
  } finally {
    clearTimeout(timer);
    parent?.removeEventListener("abort", forwardAbort);
  }
}
