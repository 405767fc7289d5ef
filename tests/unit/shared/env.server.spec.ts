// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Unit tests for server env defaults, coercion and provider credential rules.
 * Scope: serverEnv() over a controlled process.env. Does NOT construct adapters.
 * Invariants: process.env restored and cached env dropped after each test.
 * Side-effects: process.env
 * Links: src/shared/env/server.ts
 * @public
 */

import { afterEach, describe, expect, it } from "vitest";

import { EnvValidationError, resetServerEnv, serverEnv } from "@/shared/env";

const ORIGINAL_ENV = process.env;

function useEnv(vars: Record<string, string>): void {
  process.env = { ...vars };
  resetServerEnv();
}

function captureEnvError(): EnvValidationError {
  try {
    serverEnv();
  } catch (error) {
    if (error instanceof EnvValidationError) return error;
    throw error;
  }
  throw new Error("expected serverEnv() to throw");
}

describe("serverEnv", () => {
  afterEach(() => {
    process.env = ORIGINAL_ENV;
    resetServerEnv();
  });

  it("applies defaults under APP_ENV=test without provider credentials", () => {
    useEnv({ NODE_ENV: "test", APP_ENV: "test" });

    const env = serverEnv();

    expect(env).toMatchObject({
      LLM_PROVIDER: "azure",
      MODEL: "gpt-4.1",
      PRODUCT_DATASET_PATH: "./data/products/sample.json",
      PRODUCT_DATASET_DIR: "./data/products",
      MAX_TOOL_ROUNDS: 10,
      MODEL_TIMEOUT_MS: 60_000,
      TOOL_TIMEOUT_MS: 15_000,
      EVIDENCE_WINDOW: 3,
      GUARDRAIL_POLICY_PATH: "./config/guardrail-policy.json",
      isTest: true,
      isTestMode: true,
      isProd: false,
    });
  });

  it("coerces numeric budgets from strings", () => {
    useEnv({ APP_ENV: "test", MAX_TOOL_ROUNDS: "4", EVIDENCE_WINDOW: "5" });

    expect(serverEnv().MAX_TOOL_ROUNDS).toBe(4);
    expect(serverEnv().EVIDENCE_WINDOW).toBe(5);
  });

  it("caches until reset", () => {
    useEnv({ APP_ENV: "test", MODEL: "first-model" });
    const first = serverEnv();
    process.env.MODEL = "second-model";

    expect(serverEnv()).toBe(first);
    resetServerEnv();
    expect(serverEnv().MODEL).toBe("second-model");
  });

  it("reports missing Azure credentials outside test mode", () => {
    useEnv({ APP_ENV: "production" });

    expect(captureEnvError().meta).toEqual({
      code: "INVALID_ENV",
      missing: ["AZURE_OPENAI_API_KEY", "AZURE_OPENAI_API_BASE", "AZURE_OPENAI_DEPLOYMENT"],
      invalid: [],
    });
  });

  it("requires only the OpenAI key when LLM_PROVIDER=openai", () => {
    useEnv({ APP_ENV: "production", LLM_PROVIDER: "openai" });

    expect(captureEnvError().meta.missing).toEqual(["OPENAI_API_KEY"]);
  });

  it("accepts a complete production configuration", () => {
    useEnv({
      APP_ENV: "production",
      LLM_PROVIDER: "openai",
      OPENAI_API_KEY: "test-key",
    });

    expect(serverEnv().isTestMode).toBe(false);
  });

  it("reports invalid values separately from missing ones", () => {
    useEnv({ APP_ENV: "test", LLM_PROVIDER: "anthropic" });

    expect(captureEnvError().meta).toEqual({
      code: "INVALID_ENV",
      missing: [],
      invalid: ["LLM_PROVIDER"],
    });
  });
});
