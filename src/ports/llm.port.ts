// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/llm.port`
 * Purpose: Completion client abstraction for hexagonal architecture.
 * Scope: One non-streaming completion per call, with tool definitions. Does not handle authentication or retries.
 * Invariants:
 *   - Only depends on core domain types, no infrastructure concerns
 *   - Implementations throw LlmError (from @toolchat/ai-core) on every failure
 * Side-effects: none (interface only)
 * Links: Implemented by adapters/server/ai, used by features/ai
 * @public
 */

import type { JSONSchema7 } from "json-schema";

import type { AssistantMessage, Message } from "@/core";

// Re-export error types so adapters import them from the port
export {
  classifyLlmErrorFromStatus,
  isLlmError,
  LlmError,
  type LlmErrorKind,
} from "@toolchat/ai-core";
export type { Message } from "@/core";

/**
 * Tool definition in OpenAI function-calling format.
 * Used to declare tools to the LLM.
 */
export interface LlmToolDefinition {
  readonly type: "function";
  readonly function: {
    readonly name: string;
    readonly description?: string;
    readonly parameters: JSONSchema7;
  };
}

/**
 * Tool choice specification for LLM request.
 * - "auto": LLM decides whether to use tools
 * - "none": Disable tool use
 * - "required": Force tool use
 */
export type LlmToolChoice = "auto" | "none" | "required";

export interface CompletionParams {
  readonly messages: readonly Message[];
  /** Falls back to the adapter's default model */
  readonly model?: string;
  readonly tools?: readonly LlmToolDefinition[];
  readonly toolChoice?: LlmToolChoice;
  readonly abortSignal?: AbortSignal;
}

export interface LlmCompletionResult {
  message: AssistantMessage;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  finishReason?: "stop" | "length" | "tool_calls" | "content_filter" | string;
  /** Model ID as reported by the provider (e.g., "gpt-4o-mini-2024-07-18") */
  resolvedModel?: string;
}

export interface LlmService {
  /**
   * @throws LlmError on transport, HTTP or body failures
   */
  completion(params: CompletionParams): Promise<LlmCompletionResult>;
}
