// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@toolchat/ai-core/events/ai-events`
 * Purpose: AI event types emitted during a chat run for observability.
 * Scope: Defines AiEvent union used by the tool runner and chat orchestrator. Does NOT implement functions.
 * Invariants:
 *   - toolCallId must be stable across start→result lifecycle
 *   - Exactly one terminal pair per run: assistant_final→done or error→done
 * Side-effects: none (types only)
 * Links: tool-runner.ts
 * @public
 */

import type { ChatFailureKind } from "../execution/error-codes";
import type { ToolOutput } from "../tooling/types";

/**
 * Tool call initiated.
 * Emitted by tool-runner after argument validation, before execution.
 */
export interface ToolCallStartEvent {
  readonly type: "tool_call_start";
  /** Stable ID for this tool call (model-provided or generated) */
  readonly toolCallId: string;
  readonly toolName: string;
  /** Validated arguments; may carry credentials, logger redacts them */
  readonly args: unknown;
}

/**
 * Tool call completed (success or error).
 */
export interface ToolCallResultEvent {
  readonly type: "tool_call_result";
  /** Same toolCallId as corresponding start event */
  readonly toolCallId: string;
  readonly result: ToolOutput | { readonly error: string };
  readonly isError?: boolean;
}

/**
 * Final assistant response. Emitted at most once per run.
 */
export interface AssistantFinalEvent {
  readonly type: "assistant_final";
  readonly content: string;
}

/**
 * Agent phase for progress indicators.
 * Label contains at most a tool name, never args or results.
 */
export interface StatusEvent {
  readonly type: "status";
  readonly phase: "thinking" | "tool_use";
  readonly label?: string;
}

/**
 * Run completed (success or failure).
 */
export interface DoneEvent {
  readonly type: "done";
}

/**
 * Run failed. Carries the failure kind only; details belong in logs.
 */
export interface ErrorEvent {
  readonly type: "error";
  readonly error: ChatFailureKind;
}

export type AiEvent =
  | ToolCallStartEvent
  | ToolCallResultEvent
  | AssistantFinalEvent
  | StatusEvent
  | DoneEvent
  | ErrorEvent;
