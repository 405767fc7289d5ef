// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs`
 * Purpose: Barrel export for the product lookup graph and LangChain boundary utilities.
 * Scope: Re-exports public types. All @langchain/* code lives in this package. Does not contain implementation logic.
 * Invariants:
 *   - NO_LANGCHAIN_IN_SRC: Only this package imports @langchain/*
 *   - PACKAGES_NO_SRC_IMPORTS: Never import from the app's src/
 * Side-effects: none
 * @public
 */

export * from "./graphs/index";
export {
  type ChatModelSettings,
  type ChatModels,
  createChatModels,
  fromBaseMessage,
  MODEL_MAX_RETRIES,
  messageText,
  type ModelToolDefinition,
  toBaseMessage,
  toModelToolDefinitions,
} from "./runtime/index";
