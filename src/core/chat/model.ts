// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@core/chat/model`
 * Purpose: Domain entities and value objects for chat functionality.
 * Scope: Pure domain types with optional timestamps. Does not handle I/O or time operations.
 * Invariants:
 *   - No Date objects, no I/O dependencies, purely functional types
 *   - A tool message always names the tool call it answers and the tool that produced it
 *   - Messages are never mutated after they are appended to a conversation
 * Side-effects: none
 * Notes: Timestamps are optional ISO strings set by feature/route layers
 * Links: Used by ports, features, and adapters
 * @public
 */

export type MessageRole = "system" | "developer" | "user" | "assistant" | "tool";

/**
 * Tool call embedded in assistant message.
 * Represents a request from the LLM to invoke a tool.
 */
export interface ToolCallRequest {
  /** Unique within the assistant turn that produced it (model-provided) */
  readonly id: string;
  readonly type: "function";
  readonly function: {
    /** Tool name (snake_case, namespaced) */
    readonly name: string;
    /** JSON-encoded arguments string, opaque until the tool runner decodes it */
    readonly arguments: string;
  };
}

export interface TextMessage {
  readonly role: "system" | "developer" | "user";
  readonly content: string;
  /** ISO 8601 string, optional - set by feature layer */
  readonly timestamp?: string;
}

export interface AssistantMessage {
  readonly role: "assistant";
  readonly content: string;
  readonly timestamp?: string;
  /** Present when the model wants to use tools; order is dispatch order */
  readonly toolCalls?: readonly ToolCallRequest[];
}

export interface ToolMessage {
  readonly role: "tool";
  /** JSON-serialized tool result, or "" when the tool returned null */
  readonly content: string;
  readonly toolCallId: string;
  readonly name: string;
}

export type Message = TextMessage | AssistantMessage | ToolMessage;

/**
 * Ordered, append-only message sequence owned by a single request.
 */
export type Conversation = readonly Message[];

/**
 * Final result of a chat run. Never carries pending tool calls.
 */
export interface ChatResponse {
  readonly message: AssistantMessage;
  readonly requiresTool: false;
}
