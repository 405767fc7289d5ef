// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs/runtime/chat-models`
 * Purpose: Construct the primary and verifier chat models for OpenAI or Azure OpenAI.
 * Scope: Takes resolved settings; never reads process.env.
 * Invariants:
 *   - Verifier model always runs at temperature 0
 *   - Provider SDK retries are bounded (maxRetries) and per-request timeouts come from settings
 * Side-effects: none (clients connect lazily)
 * @public
 */

import type { BaseChatModel } from "@langchain/core/language_models/chat_models";
import { AzureChatOpenAI, ChatOpenAI } from "@langchain/openai";

export const MODEL_MAX_RETRIES = 2;

export type ChatModelSettings =
  | {
      readonly provider: "openai";
      readonly model: string;
      readonly apiKey: string;
      readonly baseUrl?: string;
      readonly timeoutMs: number;
    }
  | {
      readonly provider: "azure";
      readonly apiKey: string;
      /** e.g. https://my-resource.openai.azure.com/ */
      readonly endpoint: string;
      readonly apiVersion: string;
      readonly deployment: string;
      readonly timeoutMs: number;
    };

export interface ChatModels {
  readonly llm: BaseChatModel;
  readonly verifierLlm: BaseChatModel;
}

function createChatModel(settings: ChatModelSettings, temperature?: number): BaseChatModel {
  const common = {
    timeout: settings.timeoutMs,
    maxRetries: MODEL_MAX_RETRIES,
    ...(temperature !== undefined ? { temperature } : {}),
  };

  if (settings.provider === "azure") {
    return new AzureChatOpenAI({
      ...common,
      azureOpenAIApiKey: settings.apiKey,
      azureOpenAIEndpoint: settings.endpoint,
      azureOpenAIApiVersion: settings.apiVersion,
      azureOpenAIApiDeploymentName: settings.deployment,
    });
  }

  return new ChatOpenAI({
    ...common,
    model: settings.model,
    apiKey: settings.apiKey,
    ...(settings.baseUrl ? { configuration: { baseURL: settings.baseUrl } } : {}),
  });
}

export function createChatModels(settings: ChatModelSettings): ChatModels {
  return {
    llm: createChatModel(settings),
    verifierLlm: createChatModel(settings, 0),
  };
}
