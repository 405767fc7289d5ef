// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-tools/tools/product-kv-pairs`
 * Purpose: `get_product_kv_pairs_tool`, flattened path/value evidence for one product or all of them.
 * Scope: Loads every product through the capability, filters by designation, flattens breadth-first with a per-product cap.
 * Invariants:
 *   - EFFECT_TYPED: read_only
 *   - DESIGNATION_MATCH: case-insensitive, trimmed equality; records with no resolvable designation are never filtered out
 *   - LIMIT_FLOOR: the per-product cap is max(50, limit)
 *   - TRUNCATION: an item is truncated only when pairs beyond the cap exist; the top-level flag is the OR of all items
 * Side-effects: IO (through the capability)
 * @public
 */

import { z } from "zod";

import type { ProductDataCapability } from "../capabilities/types";
import { isJsonObject } from "../json";
import { designationOf, type FlattenedPair, flattenKv } from "../kv/flatten";
import type { BoundTool, ToolContract, ToolImplementation } from "../types";

export const GET_PRODUCT_KV_PAIRS_TOOL_NAME = "get_product_kv_pairs_tool" as const;

export const KV_DEFAULT_LIMIT = 200;
export const KV_LIMIT_FLOOR = 50;
export const UNKNOWN_DESIGNATION = "unknown";

export const GetProductKvPairsInputSchema = z.object({
  designation: z
    .string()
    .optional()
    .describe("Product designation to query (optional, omit for all products)"),
  directory_path: z.string().optional().describe("Directory path (optional)"),
  limit: z
    .number()
    .int()
    .default(KV_DEFAULT_LIMIT)
    .describe("Max KV pairs per product (default 200)"),
});
export type GetProductKvPairsInput = z.infer<typeof GetProductKvPairsInputSchema>;

const KvPairSchema = z.object({
  path: z.string(),
  value: z.union([z.string(), z.number(), z.boolean(), z.null()]),
});

export const GetProductKvPairsOutputSchema = z.object({
  items: z.array(
    z.object({
      designation: z.string(),
      kv: z.array(KvPairSchema),
      truncated: z.boolean(),
    })
  ),
  truncated: z.boolean(),
});
export type GetProductKvPairsOutput = z.infer<typeof GetProductKvPairsOutputSchema>;

export const getProductKvPairsToolContract: ToolContract<
  typeof GET_PRODUCT_KV_PAIRS_TOOL_NAME,
  GetProductKvPairsInput,
  GetProductKvPairsOutput
> = {
  name: GET_PRODUCT_KV_PAIRS_TOOL_NAME,
  description:
    "Flatten product JSON into key-value paths for a given designation or all products. " +
    "Use to discover available attributes.",
  effect: "read_only",
  inputSchema: GetProductKvPairsInputSchema,
  outputSchema: GetProductKvPairsOutputSchema,
};

/** First `cap` pairs, and whether more existed. */
function takePairs(
  pairs: Iterable<FlattenedPair>,
  cap: number
): { kv: FlattenedPair[]; truncated: boolean } {
  const kv: FlattenedPair[] = [];
  for (const pair of pairs) {
    if (kv.length >= cap) return { kv, truncated: true };
    kv.push(pair);
  }
  return { kv, truncated: false };
}

export interface ProductKvPairsToolDeps {
  readonly products: ProductDataCapability;
}

export function createGetProductKvPairsImplementation(
  deps: ProductKvPairsToolDeps
): ToolImplementation<GetProductKvPairsInput, GetProductKvPairsOutput> {
  return {
    async execute(input) {
      const products = await deps.products.readAll({
        directory: input.directory_path,
      });
      const cap = Math.max(KV_LIMIT_FLOOR, input.limit);
      const wanted = input.designation?.trim().toLowerCase();

      const items: GetProductKvPairsOutput["items"] = [];
      for (const product of products) {
        if (!isJsonObject(product)) continue;
        const designation = designationOf(product);
        if (wanted && designation && designation.toLowerCase() !== wanted) {
          continue;
        }
        items.push({
          designation: designation ?? UNKNOWN_DESIGNATION,
          ...takePairs(flattenKv(product), cap),
        });
      }

      return { items, truncated: items.some((item) => item.truncated) };
    },
  };
}

export function createGetProductKvPairsBoundTool(
  deps: ProductKvPairsToolDeps
): BoundTool<
  typeof GET_PRODUCT_KV_PAIRS_TOOL_NAME,
  GetProductKvPairsInput,
  GetProductKvPairsOutput
> {
  return {
    contract: getProductKvPairsToolContract,
    implementation: createGetProductKvPairsImplementation(deps),
  };
}
