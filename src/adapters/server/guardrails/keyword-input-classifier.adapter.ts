// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/guardrails/keyword-input-classifier`
 * Purpose: Keyword and regex classifier for incoming user queries.
 * Scope: Tiered keyword scan (critical, then high, then medium), PII patterns, jailbreak phrases, length and flooding checks.
 * Invariants:
 *   - Lower keyword tiers are scanned only while no higher tier has matched
 *   - A jailbreak phrase adds one violation and forces critical
 *   - PII, length and flooding only raise severity from none
 *   - safe iff severity ranks below the policy's blockingSeverity
 * Side-effects: none
 * Links: Implements InputClassifier
 * @internal
 */

import type { InputClassifier, Severity, Verdict } from "@/ports";

import { type InputPolicy, severityRank } from "./policy";

const SAFE_EMPTY: Verdict = {
  safe: true,
  severity: "none",
  violations: [],
  reason: "",
};

export class KeywordInputClassifier implements InputClassifier {
  private readonly piiPatterns: ReadonlyArray<{ regex: RegExp; label: string }>;
  private readonly flood: RegExp;

  constructor(private readonly policy: InputPolicy) {
    this.piiPatterns = policy.piiPatterns.map(({ pattern, label }) => ({
      regex: new RegExp(pattern),
      label,
    }));
    this.flood = new RegExp(`(.)\\1{${policy.floodRepeat},}`);
  }

  classify(text: string): Verdict {
    if (text.trim() === "") return SAFE_EMPTY;

    const lower = text.toLowerCase();
    const violations: string[] = [];
    let severity: Severity = "none";

    const tiers = [
      ["critical", this.policy.critical],
      ["high", this.policy.high],
      ["medium", this.policy.medium],
    ] as const;
    for (const [tier, terms] of tiers) {
      if (severity !== "none") break;
      for (const { term, label } of terms) {
        if (lower.includes(term)) {
          violations.push(label);
          severity = tier;
        }
      }
    }

    for (const { regex, label } of this.piiPatterns) {
      if (regex.test(text)) {
        violations.push(label);
        if (severity === "none") severity = "medium";
      }
    }

    if (this.policy.jailbreakPhrases.some((phrase) => lower.includes(phrase))) {
      violations.push("Jailbreak attempt");
      severity = "critical";
    }

    if (text.length > this.policy.maxLength) {
      violations.push("Excessive input length");
      if (severity === "none") severity = "low";
    }

    if (this.flood.test(text)) {
      violations.push("Pattern flooding");
      if (severity === "none") severity = "low";
    }

    return {
      safe: severityRank(severity) < severityRank(this.policy.blockingSeverity),
      severity,
      violations,
      reason: violations.join("; "),
    };
  }
}
