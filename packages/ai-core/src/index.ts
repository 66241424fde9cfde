// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@toolchat/ai-core`
 * Purpose: Barrel export for executor-agnostic chat and tooling primitives.
 * Scope: Re-exports all public types from submodules. Does NOT implement logic.
 * Invariants: SINGLE_SOURCE_OF_TRUTH - these are the canonical definitions.
 * Side-effects: none
 * @public
 */

// Event types
export type {
  AiEvent,
  AssistantFinalEvent,
  DoneEvent,
  ErrorEvent,
  StatusEvent,
  ToolCallResultEvent,
  ToolCallStartEvent,
} from "./events/ai-events";
// Outward classification
export {
  type ChatErrorCategory,
  type ClassifiedChatError,
  classifyChatFailure,
  RATE_LIMITED_MESSAGE,
  SERVICE_UNAVAILABLE_MESSAGE,
  UNEXPECTED_ERROR_MESSAGE,
} from "./execution/classify";
// Failure variants
export {
  CHAT_FAILURE_KINDS,
  type ChatFailure,
  type ChatFailureKind,
  isChatFailureKind,
  normalizeErrorToFailure,
} from "./execution/error-codes";
// LLM error types (thrown by adapters, normalized by orchestrator)
export {
  classifyLlmErrorFromStatus,
  isLlmError,
  LlmError,
  type LlmErrorKind,
} from "./execution/llm-errors";
// Tool source
export type { ToolSourcePort } from "./tooling/ports/tool-source.port";
export {
  createStaticToolSource,
  StaticToolSource,
} from "./tooling/sources/static.source";
// Tool runner
export {
  createToolRunner,
  type ToolExecOptions,
  type ToolRunner,
} from "./tooling/tool-runner";
// Tooling types
export type {
  BoundToolRuntime,
  EmitAiEvent,
  RedactionMode,
  ToolErrorCode,
  ToolExecResult,
  ToolOutput,
  ToolRedactionConfig,
  ToolSpec,
} from "./tooling/types";
