// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/adapters/server/guardrails/policy`
 * Purpose: Verifies guardrail policy loading, defaults and schema errors.
 * Scope: Policy schema and loader only.
 * Side-effects: IO (reads the policy)
 * Links: src/adapters/server/guardrails/policy.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import { GuardrailPolicyError, loadGuardrailPolicy, parseGuardrailPolicy } from "@/adapters/server";
import { loadShippedPolicy } from "@tests/_fakes";

describe("guardrail policy", () => {
  it("loads the shipped policy", () => {
    const policy = loadShippedPolicy();
    expect(policy.input.blockingSeverity).toBe("medium");
    expect(policy.input.critical).toHaveLength(9);
    expect(policy.input.high).toHaveLength(7);
    expect(policy.input.medium).toHaveLength(4);
    expect(policy.topic.offTopic.map((t) => t.category)).toEqual([
      "medical",
      "legal",
      "financial",
      "political",
      "personal",
    ]);
  });

  it("fills defaults for omitted thresholds", () => {
    const shipped = loadShippedPolicy();
    const { blockingSeverity: _b, maxLength: _m, floodRepeat: _f, ...input } = shipped.input;
    const { threshold: _t, maxHedges: _h, ...grounding } = shipped.grounding;

    const parsed = parseGuardrailPolicy({ ...shipped, input, grounding });
    expect(parsed.input.blockingSeverity).toBe("medium");
    expect(parsed.input.maxLength).toBe(5000);
    expect(parsed.input.floodRepeat).toBe(50);
    expect(parsed.grounding.threshold).toBe(0.7);
    expect(parsed.grounding.maxHedges).toBe(2);
  });

  it("rejects patterns that do not compile", () => {
    const shipped = loadShippedPolicy();
    const broken = {
      ...shipped,
      input: { ...shipped.input, piiPatterns: [{ pattern: "(", label: "Broken" }] },
    };
    expect(() => parseGuardrailPolicy(broken)).toThrow(
      new GuardrailPolicyError("inline", "input.piiPatterns.0.pattern: Invalid regular expression")
    );
  });

  it("wraps unreadable files", () => {
    expect(() => loadGuardrailPolicy("/nonexistent/guardrail-policy.json")).toThrow(
      GuardrailPolicyError
    );
  });
});
