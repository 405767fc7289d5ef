// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-tools/kv/flatten`
 * Purpose: Breadth-first flattening of JSON documents into (path, scalar) pairs, plus product designation resolution.
 * Scope: Pure functions. Parsing happens upstream in the product data capability.
 * Invariants:
 *   - BFS_ORDER: scalars of a node are yielded before anything inside its container children
 *   - PATH_SYNTAX: `a.b` for object members, `a[0]` for array elements, `$` for a bare scalar root
 *   - LAZY: pairs are produced on demand so callers can stop at a cap
 * Side-effects: none
 * @public
 */

import {
  isJsonContainer,
  isJsonObject,
  type JsonObject,
  type JsonPrimitive,
  type JsonValue,
} from "../json";

export interface FlattenedPair {
  readonly path: string;
  readonly value: JsonPrimitive;
}

export function* flattenKv(
  document: JsonValue
): Generator<FlattenedPair, void, undefined> {
  const queue: Array<readonly [string, JsonValue]> = [["", document]];

  for (let head = 0; head < queue.length; head++) {
    const entry = queue[head];
    if (!entry) continue;
    const [path, node] = entry;

    if (Array.isArray(node)) {
      for (const [index, child] of node.entries()) {
        const childPath = `${path}[${index}]`;
        if (isJsonContainer(child)) queue.push([childPath, child]);
        else yield { path: childPath, value: child };
      }
    } else if (isJsonObject(node)) {
      for (const [key, child] of Object.entries(node)) {
        const childPath = path ? `${path}.${key}` : key;
        if (isJsonContainer(child)) queue.push([childPath, child]);
        else yield { path: childPath, value: child };
      }
    } else {
      // only the root can be a scalar here
      yield { path: path || "$", value: node };
    }
  }
}

const DESIGNATION_KEYS = ["designation", "title", "name", "product_name"] as const;

function firstNonBlank(obj: JsonObject): string | undefined {
  for (const key of DESIGNATION_KEYS) {
    const value = obj[key];
    if (typeof value === "string" && value.trim()) return value.trim();
  }
  return undefined;
}

/**
 * Human identifier of a product record: the first non-blank of
 * designation/title/name/product_name, then the same keys under `product`.
 */
export function designationOf(product: JsonObject): string | undefined {
  const direct = firstNonBlank(product);
  if (direct) return direct;
  const nested = product["product"];
  return nested !== undefined && isJsonObject(nested)
    ? firstNonBlank(nested)
    : undefined;
}
