// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-tools/schema`
 * Purpose: Compile Zod tool contracts into JSONSchema7 ToolSpecs.
 * Scope: Wire-format compilation only.
 * Invariants:
 *   - Refs are inlined ($refStrategy "none") so each spec is self-contained
 * Side-effects: none
 * @public
 */

import type { ToolSpec } from "@prodassist/ai-core";
import type { JSONSchema7 } from "json-schema";
import { zodToJsonSchema } from "zod-to-json-schema";

import type { CatalogToolContract } from "./catalog";

export function toToolSpec(contract: CatalogToolContract): ToolSpec {
  const rawSchema = zodToJsonSchema(contract.inputSchema, {
    $refStrategy: "none",
  });
  const inputSchema: JSONSchema7 =
    typeof rawSchema === "object" && rawSchema !== null
      ? (rawSchema as JSONSchema7)
      : { type: "object" };

  return {
    name: contract.name,
    description: contract.description,
    inputSchema,
    effect: contract.effect,
  };
}

export function toToolSpecs(
  contracts: readonly CatalogToolContract[]
): ToolSpec[] {
  return contracts.map(toToolSpec);
}
