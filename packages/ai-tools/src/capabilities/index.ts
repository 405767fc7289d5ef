// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-tools/capabilities`
 * Purpose: Capability interfaces plus the in-package default implementations (system clock, static API registry).
 * Scope: No I/O; filesystem-backed product data lives in the app adapters.
 * Side-effects: none
 * @public
 */

import type {
  ApiExecutionRecord,
  ApiInfoRecord,
  ApiRegistryCapability,
  ClockCapability,
} from "./types";

export type {
  ApiExecutionRecord,
  ApiInfoRecord,
  ApiRegistryCapability,
  ClockCapability,
  ProductDataCapability,
  ProductDataErrorCode,
  ProductQuery,
  ProductToolCapabilities,
} from "./types";
export { ProductDataError } from "./types";

export const systemClock: ClockCapability = {
  now: () => Date.now(),
  nowIso: () => new Date().toISOString(),
};

/** Clock pinned to one instant, for tests and replay. */
export function createFixedClock(iso: string): ClockCapability {
  const ms = Date.parse(iso);
  return {
    now: () => ms,
    nowIso: () => new Date(ms).toISOString(),
  };
}

const DEMO_APIS: readonly ApiInfoRecord[] = [
  {
    APIname: "CustomerSync",
    source_system: "CRM",
    target_system: "SAP",
    log_info: "Success at 10:05AM",
  },
  {
    APIname: "OrderPush",
    source_system: "WebApp",
    target_system: "ERP",
    log_info: "Timeout at 11:45AM",
  },
  {
    APIname: "UserCreate",
    source_system: "MobileApp",
    target_system: "AuthServer",
    log_info: "Created user ID 123",
  },
];

const DEMO_EXECUTIONS: readonly ApiExecutionRecord[] = [
  { APIname: "CustomerSync", executed_by: "alice@example.com", execution_time: "10:05 AM" },
  { APIname: "OrderPush", executed_by: "bob@example.com", execution_time: "11:45 AM" },
  { APIname: "UserCreate", executed_by: "carol@example.com", execution_time: "12:30 PM" },
];

export function createStaticApiRegistry(
  apis: readonly ApiInfoRecord[] = DEMO_APIS,
  executions: readonly ApiExecutionRecord[] = DEMO_EXECUTIONS
): ApiRegistryCapability {
  return {
    listApis: () => apis,
    listExecutions: () => executions,
  };
}
