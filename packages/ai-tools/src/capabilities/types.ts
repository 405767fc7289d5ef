// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-tools/capabilities/types`
 * Purpose: Capability interfaces injected into tool implementations.
 * Scope: Tool-facing interfaces only. Concrete adapters live in the app composition root.
 * Invariants:
 *   - Tools reach data only through capabilities, never through module-level state
 * Side-effects: none
 * @public
 */

import type { JsonValue } from "../json";

export interface ClockCapability {
  /** Epoch milliseconds */
  now(): number;
  nowIso(): string;
}

export type ProductDataErrorCode = "not_found" | "invalid_json" | "read_failed";

/** Raised by product data adapters; the message is shown to the model verbatim. */
export class ProductDataError extends Error {
  readonly code: ProductDataErrorCode;

  constructor(code: ProductDataErrorCode, message: string) {
    super(message);
    this.name = "ProductDataError";
    this.code = code;
  }
}

export interface ProductQuery {
  /** Directory to try before the configured fallback chain */
  readonly directory?: string;
  /** Glob relative to each candidate directory */
  readonly pattern?: string;
}

/**
 * Read access to the product dataset.
 * A document that fails to read inside readAll() is reported in place as
 * `{"error": "Failed to read <file>: ..."}` instead of failing the whole list.
 */
export interface ProductDataCapability {
  /** @throws ProductDataError */
  readOne(path?: string): Promise<JsonValue>;
  /** @throws ProductDataError("not_found") when no candidate directory has a match */
  readAll(query?: ProductQuery): Promise<JsonValue[]>;
}

export interface ApiInfoRecord {
  readonly APIname: string;
  readonly source_system: string;
  readonly target_system: string;
  readonly log_info: string;
}

export interface ApiExecutionRecord {
  readonly APIname: string;
  readonly executed_by: string;
  readonly execution_time: string;
}

export interface ApiRegistryCapability {
  listApis(): readonly ApiInfoRecord[];
  listExecutions(): readonly ApiExecutionRecord[];
}

export interface ProductToolCapabilities {
  readonly products: ProductDataCapability;
  readonly apiRegistry: ApiRegistryCapability;
  readonly clock: ClockCapability;
}
