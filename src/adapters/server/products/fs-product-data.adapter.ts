// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/products/fs-product-data`
 * Purpose: Filesystem-backed product dataset for the product tools.
 * Scope: Reads single JSON documents and globbed directories, walking a fallback chain of candidate directories. Does not cache.
 * Invariants:
 *   - Files within a directory are returned sorted by absolute path
 *   - The first candidate directory with at least one match wins; later candidates are never read
 *   - A file that fails to read or parse inside readAll() becomes an `{"error": ...}` element
 * Side-effects: IO (filesystem reads)
 * Links: Implements ProductDataCapability from @prodassist/ai-tools
 * @internal
 */

import { readFile, stat } from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

import {
  DEFAULT_PRODUCT_PATTERN,
  type JsonValue,
  JsonValueSchema,
  type ProductDataCapability,
  ProductDataError,
  type ProductQuery,
} from "@prodassist/ai-tools";
import { glob } from "fast-glob";

export interface FsProductDataConfig {
  /** Default document for readOne(); relative paths resolve against cwd */
  readonly datasetPath: string;
  /** Configured dataset directory, second in the fallback chain */
  readonly datasetDir: string;
  /** Base for relative paths; defaults to process.cwd() */
  readonly cwd?: string;
  /** Root for the package-local `data/` candidates; defaults to the repo root */
  readonly packageRoot?: string;
}

const REPO_ROOT = path.resolve(
  path.dirname(fileURLToPath(import.meta.url)),
  "../../../.."
);

function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

function isMissingFile(error: unknown): boolean {
  return (
    error instanceof Error && "code" in error && error.code === "ENOENT"
  );
}

async function isDirectory(candidate: string): Promise<boolean> {
  try {
    return (await stat(candidate)).isDirectory();
  } catch {
    return false;
  }
}

function parseDocument(raw: string): JsonValue {
  const parsed: unknown = JSON.parse(raw);
  return JsonValueSchema.parse(parsed);
}

export class FsProductDataAdapter implements ProductDataCapability {
  private readonly cwd: string;
  private readonly packageRoot: string;

  constructor(private readonly config: FsProductDataConfig) {
    this.cwd = config.cwd ?? process.cwd();
    this.packageRoot = config.packageRoot ?? REPO_ROOT;
  }

  async readOne(filePath?: string): Promise<JsonValue> {
    const target = path.resolve(this.cwd, filePath ?? this.config.datasetPath);

    let raw: string;
    try {
      raw = await readFile(target, "utf8");
    } catch (error) {
      if (isMissingFile(error)) {
        throw new ProductDataError("not_found", `File not found: ${target}`);
      }
      throw new ProductDataError("read_failed", messageOf(error));
    }

    try {
      return parseDocument(raw);
    } catch (error) {
      throw new ProductDataError(
        "invalid_json",
        `Invalid JSON in ${target}: ${messageOf(error)}`
      );
    }
  }

  async readAll(query?: ProductQuery): Promise<JsonValue[]> {
    const pattern = query?.pattern ?? DEFAULT_PRODUCT_PATTERN;
    const tried: string[] = [];

    for (const directory of this.candidateDirectories(query?.directory)) {
      tried.push(directory);
      if (!(await isDirectory(directory))) continue;

      const files = await glob(pattern, {
        cwd: directory,
        absolute: true,
        onlyFiles: true,
        deep: 1,
      });
      if (files.length === 0) continue;

      files.sort();
      return Promise.all(files.map((file) => this.readListed(file)));
    }

    throw new ProductDataError(
      "not_found",
      `No JSON files found in any of: ${JSON.stringify(tried)}`
    );
  }

  /** Fallback chain, most specific first. */
  candidateDirectories(explicit?: string): string[] {
    const candidates = [
      ...(explicit ? [explicit] : []),
      this.config.datasetDir,
      "./data/products",
      "./data",
    ].map((dir) => path.resolve(this.cwd, dir));

    candidates.push(
      path.join(this.packageRoot, "data", "products"),
      path.join(this.packageRoot, "data"),
      this.cwd
    );
    return candidates;
  }

  private async readListed(file: string): Promise<JsonValue> {
    try {
      return parseDocument(await readFile(file, "utf8"));
    } catch (error) {
      return {
        error: `Failed to read ${path.basename(file)}: ${messageOf(error)}`,
      };
    }
  }
}
