// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/langgraph-graphs/runtime`
 * Purpose: Barrel for LangChain boundary helpers.
 * Scope: Re-exports only.
 * Side-effects: none
 * @public
 */

export {
  type ChatModelSettings,
  type ChatModels,
  createChatModels,
  MODEL_MAX_RETRIES,
} from "./chat-models";
export { fromBaseMessage, messageText, toBaseMessage } from "./message-converters";
export { type ModelToolDefinition, toModelToolDefinitions } from "./tool-bindings";
