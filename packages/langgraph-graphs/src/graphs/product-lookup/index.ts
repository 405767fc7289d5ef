// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs/graphs/product-lookup`
 * Purpose: Barrel for the product lookup graph and its pure helpers.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export { type ConversationContext, extractContext, MAX_CONTEXT_DESIGNATIONS } from "./context";
export {
  collectEvidenceBlocks,
  DEFAULT_EVIDENCE_WINDOW,
  EVIDENCE_SNIPPET_CHARS,
  type EvidenceBlock,
  formatEvidenceBlocks,
} from "./evidence";
export {
  type CreateProductLookupGraphOptions,
  createProductLookupGraph,
  DEFAULT_MAX_TOOL_ROUNDS,
  DEFAULT_MODEL_TIMEOUT_MS,
  PRODUCT_LOOKUP_GRAPH_NAME,
  recursionLimitFor,
} from "./graph";
export {
  type ConfidenceLabel,
  containsNoEvidencePhrase,
  extractMetadata,
  NO_EVIDENCE_PHRASES,
  parseConfidence,
  parseEvidenceIds,
  type ResponseMetadata,
  toolsUsedInCurrentTurn,
} from "./metadata";
export {
  composeSystemPrompt,
  INSUFFICIENT_EVIDENCE_ANSWER,
  NO_EVIDENCE_PLACEHOLDER,
  VERIFIER_SYSTEM_PROMPT,
} from "./prompts";
export {
  createProductLookupRunner,
  type ProductLookupRequest,
  type ProductLookupResult,
  type ProductLookupRunner,
} from "./runner";
export {
  appendToolsFooter,
  buildVerificationMessages,
  createVerifier,
  type Verifier,
  type VerifierOptions,
} from "./verifier";
