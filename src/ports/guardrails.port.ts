// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/guardrails.port`
 * Purpose: Pluggable safety strategies applied before and after the agent loop.
 * Scope: Verdict and check result types plus the InputClassifier and OutputGuard interfaces. Does not contain implementations.
 * Invariants:
 *   - classify() is pure and synchronous; verdict.safe is derived from severity by the implementation's policy
 *   - OutputGuard methods never throw on any string input
 * Side-effects: none
 * @public
 */

export type Severity = "none" | "low" | "medium" | "high" | "critical";

export interface Verdict {
  readonly safe: boolean;
  readonly severity: Severity;
  readonly violations: readonly string[];
  /** Violations joined by "; " */
  readonly reason: string;
}

export interface InputClassifier {
  classify(text: string): Verdict;
}

export interface OutputCheck {
  readonly safe: boolean;
  readonly issues: readonly string[];
  /** Answer with PII, code, SQL and internal URLs redacted */
  readonly filteredAnswer: string;
}

export type TopicCheck =
  | { readonly appropriate: true }
  | {
      readonly appropriate: false;
      readonly reason: string;
      readonly suggestedResponse: string;
    };

export interface GroundingScore {
  readonly grounded: boolean;
  /** 0..1 */
  readonly score: number;
  readonly unsupportedClaims: readonly string[];
}

export interface OutputGuard {
  filter(answer: string, query: string): OutputCheck;
  checkTopic(query: string, answer: string): TopicCheck;
  scoreGrounding(answer: string, evidence: readonly string[]): GroundingScore;
}
