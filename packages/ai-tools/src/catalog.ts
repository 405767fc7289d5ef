// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-tools/catalog`
 * Purpose: Registry of product assistant tools, bound to their capabilities.
 * Scope: Catalog construction and lookup. Does NOT execute tools (see ai-core tool runner).
 * Invariants:
 *   - TOOL_ID_STABILITY: duplicate names throw at construction, never overwrite
 *   - Catalog objects are frozen
 * Side-effects: none
 * @public
 */

import type { ProductToolCapabilities } from "./capabilities/types";
import {
  apiInfoToolContract,
  apiUserToolContract,
  createApiInfoBoundTool,
  createApiUserBoundTool,
} from "./tools/api-registry";
import {
  createGetAllProductsDataBoundTool,
  createGetProductDataBoundTool,
  getAllProductsDataToolContract,
  getProductDataToolContract,
} from "./tools/product-data";
import {
  createGetProductKvPairsBoundTool,
  getProductKvPairsToolContract,
} from "./tools/product-kv-pairs";
import { createTimeBoundTool, timeToolContract } from "./tools/time";
import type { BoundTool, ToolContract } from "./types";

/** Widened bound tool type for catalog entries. */
export type CatalogBoundTool = BoundTool<string, unknown, unknown>;

export type CatalogToolContract = ToolContract<string, unknown, unknown>;

export type ToolCatalog = Readonly<Record<string, CatalogBoundTool>>;

/**
 * @throws Error if two tools share a name
 */
export function createToolCatalog(
  tools: readonly CatalogBoundTool[]
): ToolCatalog {
  const catalog: Record<string, CatalogBoundTool> = {};
  for (const tool of tools) {
    const toolId = tool.contract.name;
    if (toolId in catalog) {
      throw new Error(
        `TOOL_ID_STABILITY violation: Duplicate tool ID "${toolId}" in catalog.`
      );
    }
    catalog[toolId] = tool;
  }
  return Object.freeze(catalog);
}

/**
 * Contracts of every product assistant tool, in the order they are offered to the model.
 * Usable without capabilities (schema export, model binding).
 */
export const PRODUCT_TOOL_CONTRACTS: readonly CatalogToolContract[] =
  Object.freeze([
    timeToolContract,
    apiInfoToolContract,
    apiUserToolContract,
    getProductDataToolContract,
    getAllProductsDataToolContract,
    getProductKvPairsToolContract,
  ]);

export function createProductToolCatalog(
  capabilities: ProductToolCapabilities
): ToolCatalog {
  return createToolCatalog([
    createTimeBoundTool(capabilities),
    createApiInfoBoundTool(capabilities),
    createApiUserBoundTool(capabilities),
    createGetProductDataBoundTool(capabilities),
    createGetAllProductsDataBoundTool(capabilities),
    createGetProductKvPairsBoundTool(capabilities),
  ]);
}

export function getToolIds(catalog: ToolCatalog): readonly string[] {
  return Object.keys(catalog);
}

export function getToolById(
  catalog: ToolCatalog,
  toolId: string
): CatalogBoundTool | undefined {
  return catalog[toolId];
}
