// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/public`
 * Purpose: Public API surface for AI feature - barrel export for stable feature boundaries.
 * Scope: Re-exports public types and factories. Does not implement logic.
 * Invariants: Feature consumers should only import from this file, never from internal modules.
 * Side-effects: none
 * @public
 */

export {
  type AiFacade,
  type AiFacadeDeps,
  type ChatSettings,
  createAiFacade,
  PROBE_MESSAGES,
} from "./ai.facade";
export {
  type ChatOrchestratorDeps,
  type RunConversationOptions,
  runConversation,
  toolErrorToFailureKind,
} from "./services/chat-orchestrator";
export {
  type ChatTools,
  createChatTools,
  type ToolCapabilities,
  toLlmToolDefinition,
} from "./tool-registry";
export type {
  ConversationOutcome,
  HealthCheckResult,
  RunChatInput,
  RunChatResult,
  TestCompletionResult,
} from "./types";
