// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs/graphs/product-lookup/verifier`
 * Purpose: Second model pass that checks a draft answer against the evidence window.
 * Scope: Builds the verification prompt, calls the verifier model, appends the tools-used footer.
 * Invariants:
 *   - verify() only throws on caller cancellation: any other failure of the verifier call yields the draft
 *   - An empty draft skips the call and yields INSUFFICIENT_EVIDENCE_ANSWER
 *   - An empty verifier reply yields the draft
 * Side-effects: IO (verifier model call)
 * @public
 */

import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import {
  type BaseMessage,
  HumanMessage,
  SystemMessage,
} from "@langchain/core/messages";
import type { RunnableConfig } from "@langchain/core/runnables";

import { messageText } from "../../runtime/message-converters";
import type { GraphLogger } from "../types";
import { type EvidenceBlock, formatEvidenceBlocks } from "./evidence";
import { INSUFFICIENT_EVIDENCE_ANSWER, VERIFIER_SYSTEM_PROMPT } from "./prompts";
import { invokeWithDeadline } from "./model-call";

export function buildVerificationMessages(
  draft: string,
  evidence: readonly EvidenceBlock[]
): BaseMessage[] {
  return [
    new SystemMessage(VERIFIER_SYSTEM_PROMPT),
    new HumanMessage(`DRAFT:\n${draft}\n\nEVIDENCE:\n${formatEvidenceBlocks(evidence)}`),
  ];
}

/** Appends the deterministic `Tools used:` line. */
export function appendToolsFooter(text: string, toolsUsed: readonly string[]): string {
  const tools = toolsUsed.length > 0 ? toolsUsed.join(", ") : "none";
  return `${text.trimEnd()}\n\nTools used: ${tools}`;
}

export interface VerifierOptions {
  /** Should be configured for temperature 0 */
  readonly llm: BaseChatModel;
  readonly timeoutMs: number;
  readonly logger?: GraphLogger;
}

export interface Verifier {
  /** Returns the answer text without the tools footer. */
  verify(
    draft: string,
    evidence: readonly EvidenceBlock[],
    config?: RunnableConfig
  ): Promise<string>;
}

export function createVerifier(opts: VerifierOptions): Verifier {
  const { llm, timeoutMs, logger } = opts;

  return {
    async verify(draft, evidence, config) {
      if (!draft.trim()) return INSUFFICIENT_EVIDENCE_ANSWER;

      try {
        const reply = await invokeWithDeadline(
          llm,
          buildVerificationMessages(draft, evidence),
          timeoutMs,
          config
        );
        const verified = messageText(reply.content).trim();
        return verified || draft;
      } catch (error) {
        if (config?.signal?.aborted) throw error;
        logger?.warn(
          {
            event: "agent.verify_fallback",
            err: error instanceof Error ? error.message : String(error),
          },
          "verification failed; using unverified draft"
        );
        return draft;
      }
    },
  };
}
