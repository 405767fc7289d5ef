// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-tools/runtime-adapter`
 * Purpose: Adapt Zod-typed BoundTools to ai-core's BoundToolRuntime.
 * Scope: Validation messages are flattened from Zod issues so the model can fix its arguments.
 * Invariants:
 *   - ai-core never sees Zod; validation is owned here
 * Side-effects: none
 * @public
 */

import type { BoundToolRuntime } from "@prodassist/ai-core";
import type { ZodError } from "zod";

import type { CatalogBoundTool, ToolCatalog } from "./catalog";
import { toToolSpec } from "./schema";

export function formatZodIssues(error: ZodError): string {
  return error.issues
    .map((issue) => {
      const path = issue.path.length > 0 ? issue.path.join(".") : "(root)";
      return `${path}: ${issue.message}`;
    })
    .join("; ");
}

export function toBoundToolRuntime(boundTool: CatalogBoundTool): BoundToolRuntime {
  const { contract, implementation } = boundTool;
  const spec = toToolSpec(contract);

  return {
    id: contract.name,
    spec,
    effect: contract.effect,

    validateInput(rawArgs: unknown): unknown {
      const parsed = contract.inputSchema.safeParse(rawArgs ?? {});
      if (!parsed.success) {
        throw new Error(
          `Invalid arguments for ${contract.name}: ${formatZodIssues(parsed.error)}`
        );
      }
      return parsed.data;
    },

    exec(validatedArgs: unknown): Promise<unknown> {
      return implementation.execute(validatedArgs);
    },

    validateOutput(rawOutput: unknown): unknown {
      const parsed = contract.outputSchema.safeParse(rawOutput);
      if (!parsed.success) {
        throw new Error(
          `Invalid output from ${contract.name}: ${formatZodIssues(parsed.error)}`
        );
      }
      return parsed.data;
    },
  };
}

export function toBoundToolRuntimes(catalog: ToolCatalog): BoundToolRuntime[] {
  return Object.values(catalog).map(toBoundToolRuntime);
}
