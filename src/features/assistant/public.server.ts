// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/assistant/public.server`
 * Purpose: Server-only exports for the assistant feature.
 * Scope: Re-exports the service factory and its types. Does not implement logic.
 * Side-effects: none
 * Links: Used by src/bootstrap/container.ts and the external HTTP layer
 * @public
 */

export {
  type AssistantService,
  type AssistantServiceDeps,
  type ChatCallOptions,
  createAssistantService,
} from "./services/assistant";
export { ERROR_MESSAGES, REFUSAL_ANSWER } from "./services/payload";
