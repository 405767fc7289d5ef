// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/guardrails/policy`
 * Purpose: Guardrail keyword and pattern policy, validated with Zod and loaded from JSON.
 * Scope: Schema, loader and regex helpers shared by the keyword classifier and output guard. Does not classify text.
 * Invariants:
 *   - Every pattern in a loaded policy compiles as a JavaScript RegExp
 *   - List order is preserved; violation and issue order follow it
 * Side-effects: IO (loadGuardrailPolicy reads the policy file)
 * Links: config/guardrail-policy.json
 * @internal
 */

import { readFileSync } from "node:fs";

import { z } from "zod";

import type { Severity } from "@/ports";

export const SEVERITY_ORDER: readonly Severity[] = [
  "none",
  "low",
  "medium",
  "high",
  "critical",
];

export function severityRank(severity: Severity): number {
  return SEVERITY_ORDER.indexOf(severity);
}

export function escapeRegExp(literal: string): string {
  return literal.replace(/[.*+?^${}()|[\]\\/]/g, "\\$&");
}

function compiles(source: string): boolean {
  try {
    new RegExp(source);
    return true;
  } catch {
    return false;
  }
}

const RegexSourceSchema = z
  .string()
  .min(1)
  .refine(compiles, { message: "Invalid regular expression" });

const LabeledTermSchema = z.object({
  term: z.string().min(1),
  label: z.string().min(1),
});

export const GuardrailPolicySchema = z.object({
  input: z.object({
    /** Lowest severity that blocks a request */
    blockingSeverity: z
      .enum(["low", "medium", "high", "critical"])
      .default("medium"),
    maxLength: z.number().int().positive().default(5000),
    /** A character repeated more than this many extra times counts as flooding */
    floodRepeat: z.number().int().positive().default(50),
    critical: z.array(LabeledTermSchema),
    high: z.array(LabeledTermSchema),
    medium: z.array(LabeledTermSchema),
    piiPatterns: z.array(
      z.object({ pattern: RegexSourceSchema, label: z.string().min(1) })
    ),
    jailbreakPhrases: z.array(z.string().min(1)),
  }),
  output: z.object({
    piiRedactions: z.array(
      z.object({ pattern: RegexSourceSchema, replacement: z.string() })
    ),
    sensitiveTerms: z.array(z.string().min(1)),
    codePatterns: z.array(RegexSourceSchema),
    sqlPatterns: z.array(RegexSourceSchema),
    internalUrls: z.array(z.string().min(1)),
  }),
  topic: z.object({
    offTopic: z.array(
      z.object({
        category: z.string().min(1),
        keywords: z.array(z.string().min(1)),
      })
    ),
    productVocabulary: z.array(z.string().min(1)),
    /** Answers longer than this must mention product vocabulary */
    minContextLength: z.number().int().nonnegative().default(100),
  }),
  grounding: z.object({
    threshold: z.number().min(0).max(1).default(0.7),
    /** More hedging phrases than this are reported as high uncertainty */
    maxHedges: z.number().int().nonnegative().default(2),
    hedgingPhrases: z.array(z.string().min(1)),
    noEvidencePhrases: z.array(z.string().min(1)),
    measurementUnits: z.array(z.string().min(1)).min(1),
  }),
});

export type GuardrailPolicy = z.infer<typeof GuardrailPolicySchema>;
export type InputPolicy = GuardrailPolicy["input"];

export class GuardrailPolicyError extends Error {
  constructor(source: string, detail: string) {
    super(`Invalid guardrail policy (${source}): ${detail}`);
    this.name = "GuardrailPolicyError";
  }
}

/**
 * @throws GuardrailPolicyError when the value does not match the schema
 */
export function parseGuardrailPolicy(
  raw: unknown,
  source = "inline"
): GuardrailPolicy {
  const parsed = GuardrailPolicySchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new GuardrailPolicyError(source, detail);
  }
  return parsed.data;
}

/**
 * @throws GuardrailPolicyError when the file is unreadable, not JSON, or off-schema
 */
export function loadGuardrailPolicy(filePath: string): GuardrailPolicy {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(filePath, "utf8"));
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new GuardrailPolicyError(filePath, detail);
  }
  return parseGuardrailPolicy(raw, filePath);
}
