// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-tools/tools/api-registry`
 * Purpose: `api_info_tool` and `api_user_tool`, lookups over integration API metadata.
 * Scope: Case-insensitive substring filtering over the ApiRegistryCapability.
 * Invariants:
 *   - EFFECT_TYPED: read_only
 *   - Empty result carries a `message` instead of failing
 * Side-effects: none
 * @public
 */

import { z } from "zod";

import type {
  ApiExecutionRecord,
  ApiInfoRecord,
  ApiRegistryCapability,
} from "../capabilities/types";
import type { BoundTool, ToolContract, ToolImplementation } from "../types";

export const API_INFO_TOOL_NAME = "api_info_tool" as const;
export const API_USER_TOOL_NAME = "api_user_tool" as const;

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const ApiInfoInputSchema = z.object({
  APIname: z.string().optional().describe("API name (substring match)"),
  source: z.string().optional().describe("Source system (substring match)"),
  target: z.string().optional().describe("Target system (substring match)"),
});
export type ApiInfoInput = z.infer<typeof ApiInfoInputSchema>;

const ApiInfoRecordSchema = z.object({
  APIname: z.string(),
  source_system: z.string(),
  target_system: z.string(),
  log_info: z.string(),
});

export const ApiInfoOutputSchema = z.object({
  records: z.array(ApiInfoRecordSchema),
  message: z.string().optional(),
});
export type ApiInfoOutput = z.infer<typeof ApiInfoOutputSchema>;

export const ApiUserInputSchema = z.object({
  APIname: z.string().describe("API name (substring match)"),
});
export type ApiUserInput = z.infer<typeof ApiUserInputSchema>;

export const ApiUserOutputSchema = z.object({
  records: z.array(
    z.object({
      APIname: z.string(),
      executed_by: z.string(),
      execution_time: z.string(),
    })
  ),
  message: z.string().optional(),
});
export type ApiUserOutput = z.infer<typeof ApiUserOutputSchema>;

// ─────────────────────────────────────────────────────────────────────────────
// Contracts
// ─────────────────────────────────────────────────────────────────────────────

export const apiInfoToolContract: ToolContract<
  typeof API_INFO_TOOL_NAME,
  ApiInfoInput,
  ApiInfoOutput
> = {
  name: API_INFO_TOOL_NAME,
  description:
    "Returns API metadata such as source/target system and log info.",
  effect: "read_only",
  inputSchema: ApiInfoInputSchema,
  outputSchema: ApiInfoOutputSchema,
};

export const apiUserToolContract: ToolContract<
  typeof API_USER_TOOL_NAME,
  ApiUserInput,
  ApiUserOutput
> = {
  name: API_USER_TOOL_NAME,
  description: "Returns who executed the API and when.",
  effect: "read_only",
  inputSchema: ApiUserInputSchema,
  outputSchema: ApiUserOutputSchema,
};

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const NO_API_INFO_MESSAGE = "No matching API info found.";
export const NO_API_USER_MESSAGE = "No user info found.";

/** Blank or absent needle matches everything. */
function containsIgnoreCase(haystack: string, needle: string | undefined): boolean {
  if (!needle) return true;
  return haystack.toLowerCase().includes(needle.toLowerCase());
}

export interface ApiRegistryToolDeps {
  readonly apiRegistry: ApiRegistryCapability;
}

export function createApiInfoImplementation(
  deps: ApiRegistryToolDeps
): ToolImplementation<ApiInfoInput, ApiInfoOutput> {
  return {
    async execute(input) {
      const records: ApiInfoRecord[] = deps.apiRegistry
        .listApis()
        .filter(
          (r) =>
            containsIgnoreCase(r.APIname, input.APIname) &&
            containsIgnoreCase(r.source_system, input.source) &&
            containsIgnoreCase(r.target_system, input.target)
        );
      return records.length > 0
        ? { records }
        : { records, message: NO_API_INFO_MESSAGE };
    },
  };
}

export function createApiUserImplementation(
  deps: ApiRegistryToolDeps
): ToolImplementation<ApiUserInput, ApiUserOutput> {
  return {
    async execute(input) {
      const records: ApiExecutionRecord[] = deps.apiRegistry
        .listExecutions()
        .filter((r) => containsIgnoreCase(r.APIname, input.APIname));
      return records.length > 0
        ? { records }
        : { records, message: NO_API_USER_MESSAGE };
    },
  };
}

export function createApiInfoBoundTool(
  deps: ApiRegistryToolDeps
): BoundTool<typeof API_INFO_TOOL_NAME, ApiInfoInput, ApiInfoOutput> {
  return {
    contract: apiInfoToolContract,
    implementation: createApiInfoImplementation(deps),
  };
}

export function createApiUserBoundTool(
  deps: ApiRegistryToolDeps
): BoundTool<typeof API_USER_TOOL_NAME, ApiUserInput, ApiUserOutput> {
  return {
    contract: apiUserToolContract,
    implementation: createApiUserImplementation(deps),
  };
}
