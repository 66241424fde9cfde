// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/rules`
 * Purpose: Pure rules for building and inspecting a conversation.
 * Scope: Deterministic helpers over chat model types. Does not handle I/O or time dependencies.
 * Invariants:
 *   - All functions are pure and deterministic
 *   - CONVERSATION_IMMUTABLE: appendMessage returns a new frozen sequence; the input is untouched
 * Side-effects: none
 * Links: model.ts, features/ai/services/chat-orchestrator.ts
 * @public
 */

import type {
  AssistantMessage,
  ChatResponse,
  Conversation,
  Message,
  ToolCallRequest,
  ToolMessage,
} from "./model";

export const EMPTY_CONVERSATION_MESSAGE =
  "Conversation must contain at least one message";

/**
 * Copy a caller-supplied sequence into a frozen conversation.
 */
export function createConversation(
  messages: readonly Message[]
): Conversation {
  return Object.freeze([...messages]);
}

export function appendMessage(
  conversation: Conversation,
  message: Message
): Conversation {
  return Object.freeze([...conversation, message]);
}

export function pendingToolCalls(
  message: AssistantMessage
): readonly ToolCallRequest[] {
  return message.toolCalls ?? [];
}

export function hasPendingToolCalls(message: AssistantMessage): boolean {
  return pendingToolCalls(message).length > 0;
}

/**
 * Build the tool message answering `request`.
 * Null/undefined results become an empty content string.
 */
export function createToolResultMessage(
  request: ToolCallRequest,
  value: unknown
): ToolMessage {
  return {
    role: "tool",
    toolCallId: request.id,
    name: request.function.name,
    content: value == null ? "" : JSON.stringify(value),
  };
}

/**
 * @throws Error when the message still requests tools
 */
export function toChatResponse(message: AssistantMessage): ChatResponse {
  if (hasPendingToolCalls(message)) {
    throw new Error("Cannot finalize a response with pending tool calls");
  }
  return { message, requiresTool: false };
}
