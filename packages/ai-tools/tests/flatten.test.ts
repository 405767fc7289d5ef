// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-tools/tests/flatten`
 * Purpose: Unit tests for breadth-first JSON flattening and designation resolution.
 * Scope: kv/flatten.ts
 * Invariants: BFS_ORDER, PATH_SYNTAX
 * Side-effects: none
 * @internal
 */

import { describe, expect, it } from "vitest";

import type { JsonValue } from "../src/json";
import { designationOf, flattenKv } from "../src/kv/flatten";

describe("flattenKv", () => {
  it("yields a single $ pair for a bare scalar", () => {
    expect([...flattenKv(42)]).toEqual([{ path: "$", value: 42 }]);
    expect([...flattenKv(null)]).toEqual([{ path: "$", value: null }]);
  });

  it("yields nothing for empty containers", () => {
    expect([...flattenKv({})]).toEqual([]);
    expect([...flattenKv([])]).toEqual([]);
  });

  it("visits siblings before nested descendants", () => {
    const doc: JsonValue = {
      nested: { deep: { leaf: 1 }, mid: 2 },
      top: "a",
      list: [true, { x: null }],
    };

    expect([...flattenKv(doc)].map((p) => p.path)).toEqual([
      "top",
      "nested.mid",
      "list[0]",
      "nested.deep.leaf",
      "list[1].x",
    ]);
  });

  it("uses bracket paths for root arrays", () => {
    expect([...flattenKv([1, [2]])]).toEqual([
      { path: "[0]", value: 1 },
      { path: "[1][0]", value: 2 },
    ]);
  });

  it("produces product dimension paths", () => {
    const pairs = [
      ...flattenKv({
        dimensions: [{ name: "Width", symbol: "B", value: 15, unit: "mm" }],
      }),
    ];
    expect(pairs).toEqual([
      { path: "dimensions[0].name", value: "Width" },
      { path: "dimensions[0].symbol", value: "B" },
      { path: "dimensions[0].value", value: 15 },
      { path: "dimensions[0].unit", value: "mm" },
    ]);
  });

  it("has unique paths whose leaves rebuild the document", () => {
    const doc: JsonValue = {
      a: { b: [1, { c: "x" }], d: false },
      e: [[null]],
    };
    const pairs = [...flattenKv(doc)];
    const paths = pairs.map((p) => p.path);
    expect(new Set(paths).size).toBe(paths.length);
    expect(Object.fromEntries(pairs.map((p) => [p.path, p.value]))).toEqual({
      "a.d": false,
      "a.b[0]": 1,
      "e[0][0]": null,
      "a.b[1].c": "x",
    });
  });

  it("is lazy", () => {
    const iterator = flattenKv({ a: 1, b: 2, c: 3 });
    expect(iterator.next().value).toEqual({ path: "a", value: 1 });
  });
});

describe("designationOf", () => {
  it("prefers designation over title and name", () => {
    expect(designationOf({ designation: " 6205 ", title: "t", name: "n" })).toBe(
      "6205"
    );
  });

  it("falls through blank and non-string candidates", () => {
    expect(designationOf({ designation: "  ", title: 7, name: "Bearing" })).toBe(
      "Bearing"
    );
    expect(designationOf({ product_name: "P-1" })).toBe("P-1");
  });

  it("looks under a nested product object", () => {
    expect(designationOf({ product: { title: "6305" } })).toBe("6305");
  });

  it("returns undefined when nothing resolves", () => {
    expect(designationOf({ sku: "X-1", product: "6205" })).toBeUndefined();
  });
});
