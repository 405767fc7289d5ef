// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-tools/tools/time`
 * Purpose: `time_tool`, the current server time.
 * Scope: Reads the injected clock only.
 * Invariants:
 *   - EFFECT_TYPED: read_only
 * Side-effects: none
 * @public
 */

import { z } from "zod";

import type { ClockCapability } from "../capabilities/types";
import type { BoundTool, ToolContract, ToolImplementation } from "../types";

export const TIME_TOOL_NAME = "time_tool" as const;

export const TimeToolInputSchema = z.object({});
export type TimeToolInput = z.infer<typeof TimeToolInputSchema>;

export const TimeToolOutputSchema = z.object({
  current_time: z.string().datetime().describe("ISO 8601 timestamp"),
});
export type TimeToolOutput = z.infer<typeof TimeToolOutputSchema>;

export const timeToolContract: ToolContract<
  typeof TIME_TOOL_NAME,
  TimeToolInput,
  TimeToolOutput
> = {
  name: TIME_TOOL_NAME,
  description: "Returns the current server time.",
  effect: "read_only",
  inputSchema: TimeToolInputSchema,
  outputSchema: TimeToolOutputSchema,
};

export function createTimeToolImplementation(deps: {
  readonly clock: ClockCapability;
}): ToolImplementation<TimeToolInput, TimeToolOutput> {
  return {
    async execute() {
      return { current_time: deps.clock.nowIso() };
    },
  };
}

export function createTimeBoundTool(deps: {
  readonly clock: ClockCapability;
}): BoundTool<typeof TIME_TOOL_NAME, TimeToolInput, TimeToolOutput> {
  return {
    contract: timeToolContract,
    implementation: createTimeToolImplementation(deps),
  };
}
