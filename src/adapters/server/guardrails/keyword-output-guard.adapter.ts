// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/guardrails/keyword-output-guard`
 * Purpose: Post-generation checks on the final answer: redaction, topic fit and a heuristic grounding score.
 * Scope: Pure string checks driven by the guardrail policy. Does not call a model.
 * Invariants:
 *   - filter(): PII patterns match progressively on the filtered text; code and SQL patterns match on the original answer
 *   - Internal URLs are detected and redacted case-insensitively
 *   - A sensitive term is reported only when the query did not already contain it
 *   - checkTopic(): off-topic categories are checked in policy order; the first match wins
 *   - scoreGrounding(): citation +0.4, measurement +0.3, no hedging +0.3; grounded iff score >= threshold
 * Side-effects: none
 * Links: Implements OutputGuard
 * @internal
 */

import type {
  GroundingScore,
  OutputCheck,
  OutputGuard,
  TopicCheck,
} from "@/ports";

import { escapeRegExp, type GuardrailPolicy } from "./policy";

const CITATION = /\bE\d+\b/;
const CODE_REPLACEMENT = "[CODE-REMOVED]";
const SQL_REPLACEMENT = "[SQL-REMOVED]";
const URL_REPLACEMENT = "[URL-REDACTED]";

const CITATION_WEIGHT = 0.4;
const MEASUREMENT_WEIGHT = 0.3;
const CERTAINTY_WEIGHT = 0.3;

export const NO_PRODUCT_CONTEXT_RESPONSE =
  "I don't have information about that. I can help with product specifications, dimensions, and technical details.";

export function offTopicResponse(category: string): string {
  return `I'm designed to provide product information only. I cannot assist with ${category} questions.`;
}

function roundScore(score: number): number {
  return Math.round(score * 100) / 100;
}

export class KeywordOutputGuard implements OutputGuard {
  private readonly pii: ReadonlyArray<{ regex: RegExp; replacement: string }>;
  private readonly code: readonly RegExp[];
  private readonly sql: readonly RegExp[];
  private readonly urls: ReadonlyArray<{ url: string; regex: RegExp }>;
  private readonly measurement: RegExp;

  constructor(private readonly policy: GuardrailPolicy) {
    this.pii = policy.output.piiRedactions.map(({ pattern, replacement }) => ({
      regex: new RegExp(pattern, "g"),
      replacement,
    }));
    this.code = policy.output.codePatterns.map((p) => new RegExp(p, "gi"));
    this.sql = policy.output.sqlPatterns.map((p) => new RegExp(p, "gi"));
    this.urls = policy.output.internalUrls.map((url) => ({
      url,
      regex: new RegExp(escapeRegExp(url), "gi"),
    }));
    const units = policy.grounding.measurementUnits.map(escapeRegExp).join("|");
    this.measurement = new RegExp(`\\d+\\s*(${units})`);
  }

  filter(answer: string, query: string): OutputCheck {
    const issues: string[] = [];
    let filtered = answer;

    for (const { regex, replacement } of this.pii) {
      if (filtered.search(regex) !== -1) {
        issues.push(`PII detected: ${replacement}`);
        filtered = filtered.replace(regex, replacement);
      }
    }

    const lowerAnswer = answer.toLowerCase();
    const lowerQuery = query.toLowerCase();
    for (const term of this.policy.output.sensitiveTerms) {
      if (lowerAnswer.includes(term) && !lowerQuery.includes(term)) {
        issues.push(`Exposed sensitive term: ${term}`);
      }
    }

    for (const regex of this.code) {
      if (answer.search(regex) !== -1) {
        issues.push("Code execution pattern detected");
        filtered = filtered.replace(regex, CODE_REPLACEMENT);
      }
    }

    for (const regex of this.sql) {
      if (answer.search(regex) !== -1) {
        issues.push("SQL command detected");
        filtered = filtered.replace(regex, SQL_REPLACEMENT);
      }
    }

    for (const { url, regex } of this.urls) {
      if (answer.search(regex) !== -1) {
        issues.push(`Internal URL exposed: ${url}`);
        filtered = filtered.replace(regex, URL_REPLACEMENT);
      }
    }

    return { safe: issues.length === 0, issues, filteredAnswer: filtered };
  }

  checkTopic(query: string, answer: string): TopicCheck {
    const lowerQuery = query.toLowerCase();
    for (const { category, keywords } of this.policy.topic.offTopic) {
      if (keywords.some((keyword) => lowerQuery.includes(keyword))) {
        return {
          appropriate: false,
          reason: `Off-topic: ${category} query`,
          suggestedResponse: offTopicResponse(category),
        };
      }
    }

    const lowerAnswer = answer.toLowerCase();
    const hasProductContext = this.policy.topic.productVocabulary.some((word) =>
      lowerAnswer.includes(word)
    );
    if (answer.length > this.policy.topic.minContextLength && !hasProductContext) {
      return {
        appropriate: false,
        reason: "Response lacks product context",
        suggestedResponse: NO_PRODUCT_CONTEXT_RESPONSE,
      };
    }

    return { appropriate: true };
  }

  scoreGrounding(answer: string, evidence: readonly string[]): GroundingScore {
    if (evidence.length === 0) {
      return { grounded: false, score: 0, unsupportedClaims: ["No evidence provided"] };
    }

    const lower = answer.toLowerCase();
    const { hedgingPhrases, noEvidencePhrases, maxHedges, threshold } =
      this.policy.grounding;

    if (noEvidencePhrases.some((phrase) => lower.includes(phrase))) {
      return {
        grounded: false,
        score: 0,
        unsupportedClaims: ["Explicit lack of evidence stated"],
      };
    }

    const hedges = hedgingPhrases.filter((phrase) => lower.includes(phrase)).length;
    const hasCitations = CITATION.test(answer);
    const hasMeasurements = this.measurement.test(answer);

    const score = roundScore(
      (hasCitations ? CITATION_WEIGHT : 0) +
        (hasMeasurements ? MEASUREMENT_WEIGHT : 0) +
        (hedges === 0 ? CERTAINTY_WEIGHT : 0)
    );

    const unsupportedClaims: string[] = [];
    if (hedges > maxHedges) {
      unsupportedClaims.push(`High uncertainty (${hedges} hedging phrases)`);
    }
    if (!hasCitations) unsupportedClaims.push("No evidence citations");
    if (!hasMeasurements) unsupportedClaims.push("No specific measurements");

    return { grounded: score >= threshold, score, unsupportedClaims };
  }
}
