// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for the assistant runtime; provides lazy environment access.
 * Invariants: All env vars validated on first access; provider credentials required only for the selected provider outside APP_ENV=test; fails fast on invalid env.
 * Side-effects: process.env
 * Notes: APP_ENV=test wires scripted models; SERVICE_NAME for observability; LLM_PROVIDER selects OpenAI or Azure OpenAI.
 *        Lazy init keeps module import free of env reads.
 * Links: bootstrap/container.ts
 * @public
 */

import { ZodError, z } from "zod";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

const serverSchema = z
  .object({
    NODE_ENV: z
      .enum(["development", "test", "production"])
      .default("development"),

    // Application environment (controls adapter wiring)
    APP_ENV: z.enum(["test", "production"]).default("production"),

    // Service identity for observability
    SERVICE_NAME: z.string().default("product-assistant"),
    PINO_LOG_LEVEL: z
      .enum(["trace", "debug", "info", "warn", "error"])
      .default("info"),

    // LLM provider
    LLM_PROVIDER: z.enum(["openai", "azure"]).default("azure"),
    MODEL: z.string().min(1).default("gpt-4.1"),
    OPENAI_API_KEY: z.string().min(1).optional(),
    OPENAI_BASE_URL: z.string().url().optional(),
    AZURE_OPENAI_API_KEY: z.string().min(1).optional(),
    AZURE_OPENAI_API_BASE: z.string().url().optional(),
    AZURE_OPENAI_API_VERSION: z.string().default("2024-04-01-preview"),
    AZURE_OPENAI_DEPLOYMENT: z.string().min(1).optional(),

    // Product data
    PRODUCT_DATASET_PATH: z.string().default("./data/products/sample.json"),
    PRODUCT_DATASET_DIR: z.string().default("./data/products"),

    // Agent loop budgets
    MAX_TOOL_ROUNDS: z.coerce.number().int().positive().default(10),
    MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    TOOL_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
    EVIDENCE_WINDOW: z.coerce.number().int().positive().default(3),

    GUARDRAIL_POLICY_PATH: z
      .string()
      .default("./config/guardrail-policy.json"),
  })
  .superRefine((env, ctx) => {
    if (env.APP_ENV === "test") return;
    const required =
      env.LLM_PROVIDER === "openai"
        ? (["OPENAI_API_KEY"] as const)
        : ([
            "AZURE_OPENAI_API_KEY",
            "AZURE_OPENAI_API_BASE",
            "AZURE_OPENAI_DEPLOYMENT",
          ] as const);
    for (const key of required) {
      if (env[key] === undefined) {
        ctx.addIssue({
          code: z.ZodIssueCode.invalid_type,
          expected: "string",
          received: "undefined",
          path: [key],
          message: `${key} is required when LLM_PROVIDER=${env.LLM_PROVIDER}`,
        });
      }
    }
  });

type ServerEnv = z.infer<typeof serverSchema> & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
  isTestMode: boolean;
};

let ENV: ServerEnv | null = null;

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    try {
      const parsed = serverSchema.parse(process.env);
      ENV = {
        ...parsed,
        isDev: parsed.NODE_ENV === "development",
        isTest: parsed.NODE_ENV === "test",
        isProd: parsed.NODE_ENV === "production",
        isTestMode: parsed.APP_ENV === "test",
      };
    } catch (error) {
      if (error instanceof ZodError) {
        const missing = new Set<string>();
        const invalid = new Set<string>();

        for (const issue of error.issues) {
          const key = issue.path[0]?.toString();
          if (!key) continue;

          // Treat all invalid_type as missing
          if (issue.code === "invalid_type") {
            missing.add(key);
          } else {
            invalid.add(key);
          }
        }

        throw new EnvValidationError({
          code: "INVALID_ENV",
          missing: [...missing],
          invalid: [...invalid],
        });
      }

      throw error;
    }
  }
  return ENV;
}

/**
 * Drop the cached env so the next serverEnv() re-reads process.env.
 * For tests only.
 */
export function resetServerEnv(): void {
  ENV = null;
}

export type { ServerEnv };
