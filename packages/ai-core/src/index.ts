// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@prodassist/ai-core`
 * Purpose: Framework-agnostic chat message, tool runtime and execution error types.
 * Scope: Re-exports public surface. Does NOT import LangChain or Zod.
 * Invariants: No runtime dependencies beyond node builtins.
 * Side-effects: none
 * @public
 */

// Chat messages
export type {
  AssistantChatMessage,
  Message,
  MessageRole,
  MessageToolCall,
  SystemChatMessage,
  ToolArguments,
  ToolCallingMessage,
  ToolChatMessage,
  UserChatMessage,
} from "./chat/message";
export {
  findToolPairingViolation,
  hasToolCalls,
  parseToolArguments,
  readStringArgument,
} from "./chat/message";

// Execution errors
export type { AiExecutionErrorCode } from "./execution/error-codes";
export {
  AI_EXECUTION_ERROR_CODES,
  AiExecutionError,
  isAiExecutionError,
  normalizeErrorToExecutionCode,
} from "./execution/error-codes";
export type { LlmErrorKind } from "./execution/llm-errors";
export {
  classifyLlmErrorFromStatus,
  isLlmError,
  LlmError,
  toLlmError,
} from "./execution/llm-errors";

// Tooling
export type { ToolSourcePort } from "./tooling/ports/tool-source.port";
export {
  createStaticToolSource,
  StaticToolSource,
} from "./tooling/sources/static.source";
export type { ToolRunner, ToolRunnerConfig } from "./tooling/tool-runner";
export { createToolRunner } from "./tooling/tool-runner";
export type {
  BoundToolRuntime,
  ToolEffect,
  ToolErrorCode,
  ToolExecFn,
  ToolExecOptions,
  ToolInvocationRecord,
  ToolResult,
  ToolSpec,
} from "./tooling/types";
