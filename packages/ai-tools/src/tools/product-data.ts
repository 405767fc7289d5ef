// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-tools/tools/product-data`
 * Purpose: `get_product_data_tool` and `get_all_products_data_tool`, raw product JSON for the model.
 * Scope: Thin wrappers over ProductDataCapability. Directory fallback lives in the capability adapter.
 * Invariants:
 *   - EFFECT_TYPED: read_only
 *   - Data-source failures throw ProductDataError; the runner turns them into {"error": ...}
 * Side-effects: IO (through the capability)
 * @public
 */

import { z } from "zod";

import type { ProductDataCapability } from "../capabilities/types";
import { JsonValueSchema, type JsonValue } from "../json";
import type { BoundTool, ToolContract, ToolImplementation } from "../types";

export const GET_PRODUCT_DATA_TOOL_NAME = "get_product_data_tool" as const;
export const GET_ALL_PRODUCTS_DATA_TOOL_NAME = "get_all_products_data_tool" as const;

export const DEFAULT_PRODUCT_PATTERN = "*.json";

export const GetProductDataInputSchema = z.object({
  file_path: z
    .string()
    .optional()
    .describe("Path to JSON file (optional, defaults to the configured dataset)"),
});
export type GetProductDataInput = z.infer<typeof GetProductDataInputSchema>;

export const GetAllProductsDataInputSchema = z.object({
  directory_path: z.string().optional().describe("Directory path (optional)"),
  pattern: z
    .string()
    .default(DEFAULT_PRODUCT_PATTERN)
    .describe("File pattern (default '*.json')"),
});
export type GetAllProductsDataInput = z.infer<typeof GetAllProductsDataInputSchema>;

export const getProductDataToolContract: ToolContract<
  typeof GET_PRODUCT_DATA_TOOL_NAME,
  GetProductDataInput,
  JsonValue
> = {
  name: GET_PRODUCT_DATA_TOOL_NAME,
  description: "Return RAW product JSON from a single file.",
  effect: "read_only",
  inputSchema: GetProductDataInputSchema,
  outputSchema: JsonValueSchema,
};

export const getAllProductsDataToolContract: ToolContract<
  typeof GET_ALL_PRODUCTS_DATA_TOOL_NAME,
  GetAllProductsDataInput,
  JsonValue[]
> = {
  name: GET_ALL_PRODUCTS_DATA_TOOL_NAME,
  description:
    "Return a JSON ARRAY of ALL product JSONs from directory. " +
    "Automatically searches common locations if no directory specified.",
  effect: "read_only",
  inputSchema: GetAllProductsDataInputSchema,
  outputSchema: z.array(JsonValueSchema),
};

export interface ProductDataToolDeps {
  readonly products: ProductDataCapability;
}

export function createGetProductDataImplementation(
  deps: ProductDataToolDeps
): ToolImplementation<GetProductDataInput, JsonValue> {
  return {
    execute: (input) => deps.products.readOne(input.file_path),
  };
}

export function createGetAllProductsDataImplementation(
  deps: ProductDataToolDeps
): ToolImplementation<GetAllProductsDataInput, JsonValue[]> {
  return {
    execute: (input) =>
      deps.products.readAll({
        directory: input.directory_path,
        pattern: input.pattern,
      }),
  };
}

export function createGetProductDataBoundTool(
  deps: ProductDataToolDeps
): BoundTool<typeof GET_PRODUCT_DATA_TOOL_NAME, GetProductDataInput, JsonValue> {
  return {
    contract: getProductDataToolContract,
    implementation: createGetProductDataImplementation(deps),
  };
}

export function createGetAllProductsDataBoundTool(
  deps: ProductDataToolDeps
): BoundTool<
  typeof GET_ALL_PRODUCTS_DATA_TOOL_NAME,
  GetAllProductsDataInput,
  JsonValue[]
> {
  return {
    contract: getAllProductsDataToolContract,
    implementation: createGetAllProductsDataImplementation(deps),
  };
}
