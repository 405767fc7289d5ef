// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-core/vitest.config`
 * Purpose: Vitest configuration for ai-core package tests.
 * Scope: Package-local tests only; does not import from app src/.
 * Side-effects: none
 * Links: vitest.workspace.ts, tests/
 * @internal
 */

import { defineProject } from "vitest/config";

export default defineProject({
  test: {
    name: "ai-core",
    environment: "node",
    include: ["tests/**/*.{test,spec}.ts"],
    exclude: ["node_modules", "dist"],
  },
});
