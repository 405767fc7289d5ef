// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports`
 * Purpose: Barrel for application port interfaces.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export type {
  GroundingScore,
  InputClassifier,
  OutputCheck,
  OutputGuard,
  Severity,
  TopicCheck,
  Verdict,
} from "./guardrails.port";
export { SessionHistoryError, type SessionStorePort } from "./session-store.port";
