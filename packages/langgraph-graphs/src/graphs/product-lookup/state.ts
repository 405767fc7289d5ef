// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs/graphs/product-lookup/state`
 * Purpose: State schema for the product lookup agent loop.
 * Scope: Annotation definitions only. Does NOT execute graph logic.
 * Invariants:
 *   - STATE_EXTENDS_MESSAGES: messages use the append reducer from MessagesAnnotation
 *   - toolRounds counts completed tool rounds of this invocation
 *   - draft is null until the model answers without tool calls
 * Side-effects: none
 * @public
 */

import { Annotation, MessagesAnnotation } from "@langchain/langgraph";

export const ProductLookupStateAnnotation = Annotation.Root({
  ...MessagesAnnotation.spec,

  toolRounds: Annotation<number>({
    reducer: (_, right) => right,
    default: () => 0,
  }),

  /** Unverified answer text handed from the agent node to the verify node */
  draft: Annotation<string | null>({
    reducer: (_, right) => right,
    default: () => null,
  }),
});

export type ProductLookupState = typeof ProductLookupStateAnnotation.State;
