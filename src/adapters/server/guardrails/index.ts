// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/guardrails`
 * Purpose: Barrel for the keyword guardrail adapters and their policy loader.
 * Scope: Re-exports only.
 * Side-effects: none
 * @internal
 */

export { KeywordInputClassifier } from "./keyword-input-classifier.adapter";
export {
  KeywordOutputGuard,
  NO_PRODUCT_CONTEXT_RESPONSE,
  offTopicResponse,
} from "./keyword-output-guard.adapter";
export {
  type GuardrailPolicy,
  GuardrailPolicyError,
  GuardrailPolicySchema,
  loadGuardrailPolicy,
  parseGuardrailPolicy,
} from "./policy";
