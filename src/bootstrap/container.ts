// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Composition root wiring env config, adapters, tools, models and the assistant service.
 * Scope: Wire adapters to ports for runtime dependency injection. Does not handle request-scoped lifecycle.
 * Invariants: All ports wired; single container instance per process; APP_ENV=test never constructs a provider client.
 * Side-effects: IO (reads the guardrail policy, initializes logger and emits startup log on first access)
 * Notes: Uses serverEnv.isTestMode (APP_ENV=test) to wire fake chat models.
 * Links: Used by the external HTTP layer and other entry points; configure adapters here for DI.
 * @public
 */

import path from "node:path";

import { createStaticToolSource, createToolRunner } from "@prodassist/ai-core";
import {
  createProductToolCatalog,
  createStaticApiRegistry,
  systemClock,
  toBoundToolRuntimes,
} from "@prodassist/ai-tools";
import {
  type ChatModelSettings,
  type ChatModels,
  createChatModels,
  createProductLookupRunner,
} from "@prodassist/langgraph-graphs";
import type { Logger } from "pino";

import {
  FsProductDataAdapter,
  InMemorySessionStoreAdapter,
  KeywordInputClassifier,
  KeywordOutputGuard,
  loadGuardrailPolicy,
} from "@/adapters/server";
import { createFakeChatModels } from "@/adapters/test";
import {
  type AssistantService,
  createAssistantService,
} from "@/features/assistant/public.server";
import type { SessionStorePort } from "@/ports";
import { EnvValidationError, type ServerEnv, serverEnv } from "@/shared/env";
import {
  EVENT_NAMES,
  makeLogger,
  type ToolInvokedEvent,
} from "@/shared/observability";

export interface Container {
  log: Logger;
  sessions: SessionStorePort;
  assistant: AssistantService;
}

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

function requireEnv(key: string, value: string | undefined): string {
  if (value === undefined) {
    throw new EnvValidationError({ code: "INVALID_ENV", missing: [key], invalid: [] });
  }
  return value;
}

/**
 * @throws EnvValidationError when the selected provider's credentials are missing
 */
export function toChatModelSettings(env: ServerEnv): ChatModelSettings {
  if (env.LLM_PROVIDER === "openai") {
    return {
      provider: "openai",
      model: env.MODEL,
      apiKey: requireEnv("OPENAI_API_KEY", env.OPENAI_API_KEY),
      ...(env.OPENAI_BASE_URL ? { baseUrl: env.OPENAI_BASE_URL } : {}),
      timeoutMs: env.MODEL_TIMEOUT_MS,
    };
  }
  return {
    provider: "azure",
    apiKey: requireEnv("AZURE_OPENAI_API_KEY", env.AZURE_OPENAI_API_KEY),
    endpoint: requireEnv("AZURE_OPENAI_API_BASE", env.AZURE_OPENAI_API_BASE),
    apiVersion: env.AZURE_OPENAI_API_VERSION,
    deployment: requireEnv("AZURE_OPENAI_DEPLOYMENT", env.AZURE_OPENAI_DEPLOYMENT),
    timeoutMs: env.MODEL_TIMEOUT_MS,
  };
}

function createContainer(): Container {
  const env = serverEnv();
  const log = makeLogger();

  // Startup log - no URLs/secrets
  log.info(
    {
      env: env.APP_ENV,
      logLevel: env.PINO_LOG_LEVEL,
      provider: env.isTestMode ? "fake" : env.LLM_PROVIDER,
    },
    "container initialized"
  );

  const products = new FsProductDataAdapter({
    datasetPath: env.PRODUCT_DATASET_PATH,
    datasetDir: env.PRODUCT_DATASET_DIR,
  });
  const catalog = createProductToolCatalog({
    products,
    apiRegistry: createStaticApiRegistry(),
    clock: systemClock,
  });
  const toolSource = createStaticToolSource(toBoundToolRuntimes(catalog));
  const toolRunner = createToolRunner(toolSource, {
    timeoutMs: env.TOOL_TIMEOUT_MS,
    onInvocation: (record) => {
      const event: ToolInvokedEvent = {
        event: EVENT_NAMES.TOOL_INVOKED,
        tool: record.name,
        toolCallId: record.toolCallId,
        durationMs: record.endedAtMs - record.startedAtMs,
        ...(record.error ? { errorCode: record.error.code } : {}),
      };
      log.debug(event, "tool invoked");
    },
  });

  // Environment-based model wiring - single source of truth
  const models: ChatModels = env.isTestMode
    ? createFakeChatModels()
    : createChatModels(toChatModelSettings(env));

  const runner = createProductLookupRunner({
    llm: models.llm,
    verifierLlm: models.verifierLlm,
    tools: toolSource.listToolSpecs(),
    toolExec: toolRunner.exec,
    maxToolRounds: env.MAX_TOOL_ROUNDS,
    evidenceWindow: env.EVIDENCE_WINDOW,
    modelTimeoutMs: env.MODEL_TIMEOUT_MS,
    logger: log,
  });

  const policy = loadGuardrailPolicy(path.resolve(env.GUARDRAIL_POLICY_PATH));
  const sessions = new InMemorySessionStoreAdapter();

  const assistant = createAssistantService({
    runner,
    sessions,
    inputClassifier: new KeywordInputClassifier(policy.input),
    outputGuard: new KeywordOutputGuard(policy),
    toolExec: toolRunner.exec,
    toolSpecs: toolSource.listToolSpecs(),
    log,
    evidenceWindow: env.EVIDENCE_WINDOW,
  });

  return { log, sessions, assistant };
}
