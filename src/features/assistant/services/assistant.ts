// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/assistant/services/assistant`
 * Purpose: Product assistant entry point: input guardrails, session-scoped agent run, output guardrails, response envelope.
 * Scope: Orchestrates ports and the product lookup runner. Does not own transport, model wiring or storage.
 * Invariants:
 *   - A blocked query never reaches the model and never touches the session
 *   - One request per session at a time (SessionLock); different sessions run concurrently
 *   - History is persisted only after a successful run, so partial tool rounds are never stored
 *   - Failures return fixed messages per error code; details go to logs only
 * Side-effects: IO (session store, model and tools through the runner), logging
 * Links: src/contracts/assistant.chat.v1.contract.ts, @prodassist/langgraph-graphs product-lookup runner
 * @public
 */

import {
  type AiExecutionErrorCode,
  type Message,
  normalizeErrorToExecutionCode,
  type ToolExecFn,
  type ToolSpec,
} from "@prodassist/ai-core";
import { GET_PRODUCT_KV_PAIRS_TOOL_NAME } from "@prodassist/ai-tools";
import {
  collectEvidenceBlocks,
  DEFAULT_EVIDENCE_WINDOW,
  extractContext,
  type ProductLookupRunner,
} from "@prodassist/langgraph-graphs";
import type { Logger } from "pino";

import {
  type ChatInput,
  type ChatOutput,
  chatOperation,
  type ClearSessionOutput,
  type DescribeToolsOutput,
  normalizeSessionId,
} from "@/contracts/assistant.chat.v1.contract";
import type { InputClassifier, OutputGuard, SessionStorePort } from "@/ports";
import {
  type AssistantBlockedEvent,
  type AssistantCompleteEvent,
  type AssistantFailedEvent,
  type AssistantRequestEvent,
  createRequestContext,
  EVENT_NAMES,
  type RequestContext,
} from "@/shared/observability";

import {
  answeredPayload,
  blockedPayload,
  failurePayload,
  guardedAnswer,
} from "./payload";
import { SessionLock } from "./session-lock";

export interface AssistantServiceDeps {
  readonly runner: ProductLookupRunner;
  readonly sessions: SessionStorePort;
  readonly inputClassifier: InputClassifier;
  readonly outputGuard: OutputGuard;
  /** Tool runner exec, used by debugKv() */
  readonly toolExec: ToolExecFn;
  readonly toolSpecs: readonly ToolSpec[];
  readonly log: Logger;
  /** Evidence blocks scored by the grounding check; matches the verifier's window */
  readonly evidenceWindow?: number;
  readonly now?: () => number;
}

export interface ChatCallOptions {
  readonly signal?: AbortSignal;
  /** Caller-supplied correlation id; replaced when unsafe */
  readonly reqId?: string;
}

export interface AssistantService {
  chat(input: ChatInput, options?: ChatCallOptions): Promise<ChatOutput>;
  clearSession(sessionId?: string): Promise<ClearSessionOutput>;
  /** Raw get_product_kv_pairs_tool output, or `{error}` when the tool fails */
  debugKv(designation?: string): Promise<unknown>;
  describeTools(): DescribeToolsOutput;
}

export function createAssistantService(deps: AssistantServiceDeps): AssistantService {
  const lock = new SessionLock();
  const now = deps.now ?? Date.now;
  const evidenceWindow = deps.evidenceWindow ?? DEFAULT_EVIDENCE_WINDOW;

  function fail(
    ctx: RequestContext,
    startedAt: number,
    errorCode: AiExecutionErrorCode,
    err: string
  ): ChatOutput {
    const event: AssistantFailedEvent = {
      event: EVENT_NAMES.ASSISTANT_FAILED,
      durationMs: now() - startedAt,
      errorCode,
      err,
    };
    ctx.log.error(event, "assistant request failed");
    return failurePayload(errorCode);
  }

  async function answer(
    ctx: RequestContext,
    query: string,
    signal: AbortSignal | undefined,
    startedAt: number
  ): Promise<ChatOutput> {
    const requestEvent: AssistantRequestEvent = {
      event: EVENT_NAMES.ASSISTANT_REQUEST,
      textChars: query.length,
    };
    ctx.log.info(requestEvent, "assistant request");

    const verdict = deps.inputClassifier.classify(query);
    if (!verdict.safe) {
      const event: AssistantBlockedEvent = {
        event: EVENT_NAMES.ASSISTANT_BLOCKED,
        severity: verdict.severity,
        violations: verdict.violations,
      };
      ctx.log.warn(event, "query blocked by input guardrails");
      return { ok: true, answer: blockedPayload(verdict, ctx.sessionId) };
    }

    return lock.runExclusive(ctx.sessionId, async () => {
      const prior = await deps.sessions.get(ctx.sessionId);
      const history: Message[] = [...prior, { role: "user", content: query }];

      const result = await deps.runner.run({
        history,
        ...(signal ? { signal } : {}),
      });
      if (!result.ok) {
        return fail(ctx, startedAt, result.error, result.errorMessage);
      }

      const finalHistory = [...history, ...result.appended];
      await deps.sessions.put(ctx.sessionId, finalHistory);

      const output = deps.outputGuard.filter(result.finalText, query);
      const topic = deps.outputGuard.checkTopic(query, result.finalText);
      const evidence = collectEvidenceBlocks(finalHistory, evidenceWindow).map(
        (block) => block.text
      );
      const grounding = deps.outputGuard.scoreGrounding(result.finalText, evidence);

      const completeEvent: AssistantCompleteEvent = {
        event: EVENT_NAMES.ASSISTANT_COMPLETE,
        durationMs: now() - startedAt,
        toolsUsed: result.metadata.toolsUsed,
        grounded: result.metadata.grounded,
        confidence: result.metadata.confidence,
        outputSafe: output.safe,
        appropriate: topic.appropriate,
      };
      ctx.log.info(completeEvent, "assistant request complete");

      return {
        ok: true,
        answer: answeredPayload({
          finalAnswer: guardedAnswer(result.finalText, output, topic),
          metadata: result.metadata,
          context: extractContext(finalHistory),
          verdict,
          output,
          topic,
          grounding,
          sessionId: ctx.sessionId,
        }),
      };
    });
  }

  return {
    async chat(input, options = {}) {
      const startedAt = now();
      const parsed = chatOperation.input.safeParse(input);
      const sessionId = parsed.success
        ? parsed.data.session_id
        : normalizeSessionId(input.session_id);
      const ctx = createRequestContext(
        { baseLog: deps.log },
        { sessionId, reqId: options.reqId }
      );

      if (!parsed.success) {
        return fail(ctx, startedAt, "invalid_request", parsed.error.message);
      }

      try {
        return await answer(ctx, parsed.data.query, options.signal, startedAt);
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error);
        return fail(ctx, startedAt, normalizeErrorToExecutionCode(error), message);
      }
    },

    async clearSession(rawSessionId) {
      const sessionId = normalizeSessionId(rawSessionId);
      const deleted = await lock.runExclusive(sessionId, () =>
        deps.sessions.delete(sessionId)
      );
      return deleted
        ? { ok: true, message: `Session ${sessionId} cleared` }
        : { ok: false, message: "Session not found" };
    },

    async debugKv(designation) {
      const result = await deps.toolExec(
        GET_PRODUCT_KV_PAIRS_TOOL_NAME,
        designation ? { designation } : {}
      );
      return result.ok ? result.value : { error: result.safeMessage };
    },

    describeTools() {
      return { tools: [...deps.toolSpecs] };
    },
  };
}
