// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-tools`
 * Purpose: Product assistant tool contracts, catalog, evidence flattener and capability interfaces.
 * Scope: Re-exports public surface. Does NOT import LangChain or app code.
 * Side-effects: none
 * @public
 */

// Capabilities
export {
  type ApiExecutionRecord,
  type ApiInfoRecord,
  type ApiRegistryCapability,
  type ClockCapability,
  createFixedClock,
  createStaticApiRegistry,
  type ProductDataCapability,
  ProductDataError,
  type ProductDataErrorCode,
  type ProductQuery,
  type ProductToolCapabilities,
  systemClock,
} from "./capabilities";

// Catalog
export {
  type CatalogBoundTool,
  type CatalogToolContract,
  createProductToolCatalog,
  createToolCatalog,
  getToolById,
  getToolIds,
  PRODUCT_TOOL_CONTRACTS,
  type ToolCatalog,
} from "./catalog";

// JSON + flattening
export {
  isJsonContainer,
  isJsonObject,
  type JsonObject,
  type JsonPrimitive,
  type JsonValue,
  JsonValueSchema,
} from "./json";
export { designationOf, type FlattenedPair, flattenKv } from "./kv/flatten";

// Runtime + schema
export {
  formatZodIssues,
  toBoundToolRuntime,
  toBoundToolRuntimes,
} from "./runtime-adapter";
export { toToolSpec, toToolSpecs } from "./schema";

// Tools
export {
  API_INFO_TOOL_NAME,
  API_USER_TOOL_NAME,
  NO_API_INFO_MESSAGE,
  NO_API_USER_MESSAGE,
} from "./tools/api-registry";
export {
  DEFAULT_PRODUCT_PATTERN,
  GET_ALL_PRODUCTS_DATA_TOOL_NAME,
  GET_PRODUCT_DATA_TOOL_NAME,
} from "./tools/product-data";
export {
  GET_PRODUCT_KV_PAIRS_TOOL_NAME,
  type GetProductKvPairsOutput,
  KV_DEFAULT_LIMIT,
  KV_LIMIT_FLOOR,
  UNKNOWN_DESIGNATION,
} from "./tools/product-kv-pairs";
export { TIME_TOOL_NAME } from "./tools/time";

export type { BoundTool, ToolContract, ToolImplementation } from "./types";
