// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs/graphs/product-lookup/graph`
 * Purpose: Tool-augmented product lookup loop with a verification pass.
 * Scope: Creates the StateGraph (agent → tools → agent … → verify). Does NOT read env or own sessions.
 * Invariants:
 *   - PURE_FACTORY: No side effects, no env reads
 *   - APPEND_ONLY: Each tool round appends one assistant tool-call message plus one tool message per call, in request order
 *   - SINGLE_FINAL_MESSAGE: verify appends exactly one assistant message ending in the tools-used footer
 *   - ROUND_CAP: a tool request beyond maxToolRounds throws AiExecutionError("loop_exceeded") before anything is appended
 *   - TOOLS_NEVER_THROW: tool failures reach the model as {"error": "..."} content
 *   - TYPE_TRANSPARENT_RETURN: No explicit return type on the factory
 * Side-effects: none
 * @public
 */

import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import {
  AIMessage,
  isAIMessage,
  SystemMessage,
  ToolMessage,
} from "@langchain/core/messages";
import type { ToolCall } from "@langchain/core/messages/tool";
import type { RunnableConfig } from "@langchain/core/runnables";
import { StateGraph } from "@langchain/langgraph";
import {
  AiExecutionError,
  type ToolExecFn,
  type ToolSpec,
} from "@prodassist/ai-core";

import { fromBaseMessage, messageText } from "../../runtime/message-converters";
import { toModelToolDefinitions } from "../../runtime/tool-bindings";
import type { GraphLogger } from "../types";
import { extractContext } from "./context";
import { collectEvidenceBlocks, DEFAULT_EVIDENCE_WINDOW } from "./evidence";
import { toolsUsedInCurrentTurn } from "./metadata";
import { invokeWithDeadline } from "./model-call";
import { composeSystemPrompt } from "./prompts";
import { type ProductLookupState, ProductLookupStateAnnotation } from "./state";
import { appendToolsFooter, createVerifier } from "./verifier";

/**
 * Graph name constant for routing.
 */
export const PRODUCT_LOOKUP_GRAPH_NAME = "product_lookup" as const;

export const DEFAULT_MAX_TOOL_ROUNDS = 10;
export const DEFAULT_MODEL_TIMEOUT_MS = 60_000;

export interface CreateProductLookupGraphOptions {
  /** Primary model; must support bindTools() */
  readonly llm: BaseChatModel;
  /** Verification model, expected at temperature 0; defaults to llm */
  readonly verifierLlm?: BaseChatModel;
  /** Compiled specs of every tool the model may call */
  readonly tools: readonly ToolSpec[];
  readonly toolExec: ToolExecFn;
  readonly maxToolRounds?: number;
  readonly evidenceWindow?: number;
  readonly modelTimeoutMs?: number;
  readonly logger?: GraphLogger;
}

/** LangGraph supersteps needed for the given round cap: two per round, plus final agent and verify. */
export function recursionLimitFor(maxToolRounds: number): number {
  return maxToolRounds * 2 + 4;
}

function toolContent(result: Awaited<ReturnType<ToolExecFn>>): string {
  if (!result.ok) return JSON.stringify({ error: result.safeMessage });
  return JSON.stringify(result.value) ?? "null";
}

export function createProductLookupGraph(opts: CreateProductLookupGraphOptions) {
  const {
    llm,
    tools,
    toolExec,
    logger,
    maxToolRounds = DEFAULT_MAX_TOOL_ROUNDS,
    evidenceWindow = DEFAULT_EVIDENCE_WINDOW,
    modelTimeoutMs = DEFAULT_MODEL_TIMEOUT_MS,
  } = opts;

  if (!llm.bindTools) {
    throw new Error(`Chat model "${llm._llmType()}" does not support tool binding`);
  }
  const modelWithTools = llm.bindTools(toModelToolDefinitions(tools));
  const effects = new Map(tools.map((spec) => [spec.name, spec.effect]));
  const verifier = createVerifier({
    llm: opts.verifierLlm ?? llm,
    timeoutMs: modelTimeoutMs,
    ...(logger ? { logger } : {}),
  });

  // Agent node: one model call; either a tool round request or the draft
  async function agent(state: ProductLookupState, config: RunnableConfig) {
    const context = extractContext(state.messages.map(fromBaseMessage));
    const response = await invokeWithDeadline(
      modelWithTools,
      [new SystemMessage(composeSystemPrompt(context)), ...state.messages],
      modelTimeoutMs,
      config
    );
    const content = messageText(response.content);
    const toolCalls = response.tool_calls ?? [];

    if (toolCalls.length === 0) {
      return { draft: content };
    }

    if (state.toolRounds >= maxToolRounds) {
      throw new AiExecutionError(
        "loop_exceeded",
        `The request could not be resolved within ${maxToolRounds} tool rounds`
      );
    }

    // Providers occasionally omit ids; tool messages must still pair with their call
    const calls: ToolCall[] = toolCalls.map((tc, i) => ({
      id: tc.id || `call_${state.toolRounds}_${i}`,
      name: tc.name,
      args: tc.args,
      type: "tool_call",
    }));
    return {
      messages: [new AIMessage({ content, tool_calls: calls })],
      draft: null,
    };
  }

  // Tools node: executes the pending calls, read-only rounds concurrently
  async function runTools(state: ProductLookupState) {
    const last = state.messages[state.messages.length - 1];
    if (!last || !isAIMessage(last) || !last.tool_calls?.length) {
      return { messages: [] };
    }
    const calls = last.tool_calls;

    const runOne = async (call: ToolCall): Promise<ToolMessage> => {
      const callId = call.id ?? "";
      const result = await toolExec(call.name, call.args, { modelToolCallId: callId });
      if (!result.ok) {
        logger?.warn(
          { event: "tool.failed", tool: call.name, errorCode: result.errorCode },
          result.safeMessage
        );
      }
      return new ToolMessage({
        content: toolContent(result),
        tool_call_id: callId,
        name: call.name,
      });
    };

    let messages: ToolMessage[];
    if (calls.every((call) => effects.get(call.name) === "read_only")) {
      messages = await Promise.all(calls.map(runOne));
    } else {
      messages = [];
      for (const call of calls) {
        messages.push(await runOne(call));
      }
    }

    const toolRounds = state.toolRounds + 1;
    logger?.debug(
      { event: "agent.tool_round", round: toolRounds, tools: calls.map((c) => c.name) },
      "tool round complete"
    );
    return { messages, toolRounds };
  }

  // Verify node: second pass over the draft, then the single final message
  async function verify(state: ProductLookupState, config: RunnableConfig) {
    const history = state.messages.map(fromBaseMessage);
    const evidence = collectEvidenceBlocks(history, evidenceWindow);
    const text = await verifier.verify(state.draft ?? "", evidence, config);
    return {
      messages: [new AIMessage(appendToolsFooter(text, toolsUsedInCurrentTurn(history)))],
    };
  }

  function route(state: ProductLookupState): "tools" | "verify" {
    return state.draft === null ? "tools" : "verify";
  }

  return new StateGraph(ProductLookupStateAnnotation)
    .addNode("agent", agent)
    .addNode("tools", runTools)
    .addNode("verify", verify)
    .addEdge("__start__", "agent")
    .addConditionalEdges("agent", route, ["tools", "verify"])
    .addEdge("tools", "agent")
    .addEdge("verify", "__end__")
    .compile();
}
