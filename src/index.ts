// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `toolchat`
 * Purpose: Public entry point: composition root, chat facade types and core message model.
 * Scope: Re-exports only. Does NOT implement logic.
 * Side-effects: none
 * Links: bootstrap/container.ts, features/ai/public.ts
 * @public
 */

export {
  type Container,
  type ContainerOverrides,
  createContainer,
  getContainer,
  resetContainer,
} from "@/bootstrap/container";
export type {
  AssistantMessage,
  ChatResponse,
  Conversation,
  Message,
  TextMessage,
  ToolCallRequest,
  ToolMessage,
} from "@/core";
export type {
  AiFacade,
  HealthCheckResult,
  RunChatInput,
  RunChatResult,
  TestCompletionResult,
} from "@/features/ai/public";
