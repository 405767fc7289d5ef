// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-tools/tests/fixtures`
 * Purpose: In-memory ProductDataCapability and sample product records for tool tests.
 * Side-effects: none
 * @internal
 */

import type {
  ProductDataCapability,
  ProductQuery,
} from "../src/capabilities/types";
import { ProductDataError } from "../src/capabilities/types";
import type { JsonValue } from "../src/json";

export const BEARING_6205: JsonValue = {
  designation: "6205",
  category: "Deep groove ball bearing",
  dimensions: [
    { name: "Outside diameter", symbol: "D", value: 52, unit: "mm" },
    { name: "Bore diameter", symbol: "d", value: 25, unit: "mm" },
    { name: "Width", symbol: "B", value: 15, unit: "mm" },
  ],
};

export const BEARING_6305: JsonValue = {
  product: { title: " 6305 " },
  dimensions: [{ name: "Width", symbol: "B", value: 17, unit: "mm" }],
};

export const UNNAMED_RECORD: JsonValue = { sku: "X-1" };

export interface FakeProductData extends ProductDataCapability {
  readonly queries: ProductQuery[];
}

export function createFakeProductData(
  documents: JsonValue[],
  files: Readonly<Record<string, JsonValue>> = {}
): FakeProductData {
  const queries: ProductQuery[] = [];
  return {
    queries,
    async readOne(path = "default.json") {
      const doc = files[path];
      if (doc === undefined) {
        throw new ProductDataError("not_found", `File not found: ${path}`);
      }
      return doc;
    },
    async readAll(query = {}) {
      queries.push(query);
      if (documents.length === 0) {
        throw new ProductDataError(
          "not_found",
          'No JSON files found in any of: ["./data/products"]'
        );
      }
      return documents;
    },
  };
}
