// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs/graphs/product-lookup/runner`
 * Purpose: Run the product lookup graph over a domain message history and return the appended turns plus metadata.
 * Scope: Converts messages at the boundary, invokes the graph, normalizes failures. Does NOT persist anything.
 * Invariants:
 *   - RESULT_REFLECTS_OUTCOME: ok=false carries no messages, so a failed run never reaches a session
 *   - ERROR_NORMALIZATION_ONCE: Catch block uses normalizeErrorToExecutionCode()
 *   - A fired caller signal always yields error="aborted", whatever the graph rejected with
 *   - Input history must satisfy the tool-call pairing rule
 * Side-effects: IO (model and tool calls through the graph)
 * @public
 */

import { GraphRecursionError } from "@langchain/langgraph";
import {
  type AiExecutionErrorCode,
  findToolPairingViolation,
  type Message,
  normalizeErrorToExecutionCode,
} from "@prodassist/ai-core";

import { fromBaseMessage, toBaseMessage } from "../../runtime/message-converters";
import {
  asInvokableGraph,
  type MessageGraphInput,
  type MessageGraphOutput,
} from "../types";
import {
  type CreateProductLookupGraphOptions,
  createProductLookupGraph,
  DEFAULT_MAX_TOOL_ROUNDS,
  recursionLimitFor,
} from "./graph";
import { extractMetadata, type ResponseMetadata } from "./metadata";

export interface ProductLookupRequest {
  /** Prior turns plus the new user message, oldest first */
  readonly history: readonly Message[];
  readonly signal?: AbortSignal;
}

export type ProductLookupResult =
  | {
      readonly ok: true;
      /** Turns appended by this run, final answer last */
      readonly appended: readonly Message[];
      readonly finalText: string;
      readonly metadata: ResponseMetadata;
    }
  | {
      readonly ok: false;
      readonly error: AiExecutionErrorCode;
      /** For logs only; never sent to clients */
      readonly errorMessage: string;
    };

export interface ProductLookupRunner {
  run(request: ProductLookupRequest): Promise<ProductLookupResult>;
}

export function createProductLookupRunner(
  opts: CreateProductLookupGraphOptions
): ProductLookupRunner {
  const graph = asInvokableGraph<MessageGraphInput, MessageGraphOutput>(
    createProductLookupGraph(opts)
  );
  const recursionLimit = recursionLimitFor(
    opts.maxToolRounds ?? DEFAULT_MAX_TOOL_ROUNDS
  );

  return {
    async run({ history, signal }) {
      const violation = findToolPairingViolation(history);
      if (violation) {
        return { ok: false, error: "invalid_request", errorMessage: violation };
      }

      try {
        const result = await graph.invoke(
          { messages: history.map(toBaseMessage) },
          { recursionLimit, ...(signal ? { signal } : {}) }
        );
        const all = result.messages.map(fromBaseMessage);
        const appended = all.slice(history.length);
        const finalText = appended[appended.length - 1]?.content ?? "";

        return {
          ok: true,
          appended,
          finalText,
          metadata: extractMetadata(finalText, all),
        };
      } catch (error) {
        // The graph rejects with its own error once the caller's signal fires
        const code: AiExecutionErrorCode = signal?.aborted
          ? "aborted"
          : error instanceof GraphRecursionError
            ? "loop_exceeded"
            : normalizeErrorToExecutionCode(error);
        const errorMessage =
          error instanceof Error ? `${error.name}: ${error.message}` : String(error);
        return { ok: false, error: code, errorMessage };
      }
    },
  };
}
