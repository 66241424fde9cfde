// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/public`
 * Purpose: Stable core entry point - explicit named exports to control public surface.
 * Scope: Re-exports only approved domain interfaces, prevents accidental creep/cycles. Does not modify or transform exports.
 * Invariants: Named exports only, no export *, controlled public API surface
 * Side-effects: none
 * Notes: Single entry point for all core domain access
 * Links: Used by features via \@/core alias
 * @public
 */

export type {
  AssistantMessage,
  ChatResponse,
  Conversation,
  Message,
  MessageRole,
  TextMessage,
  ToolCallRequest,
  ToolMessage,
} from "./chat/model";
export {
  appendMessage,
  createConversation,
  createToolResultMessage,
  EMPTY_CONVERSATION_MESSAGE,
  hasPendingToolCalls,
  pendingToolCalls,
  toChatResponse,
} from "./chat/rules";
