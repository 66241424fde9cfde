// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/types`
 * Purpose: Result types for chat runs, probes and health checks.
 * Scope: Feature-internal types. Does not implement functions.
 * Invariants:
 *   - Chat runs return result unions, never throw to callers
 *   - Error results carry only the classified, caller-safe message
 * Side-effects: none (types only)
 * Links: services/chat-orchestrator.ts, ai.facade.ts
 * @internal
 */

import type {
  AiEvent,
  ChatFailure,
  ClassifiedChatError,
  EmitAiEvent,
} from "@toolchat/ai-core";

import type { ChatResponse, Conversation, Message } from "@/core";

export type { AiEvent, EmitAiEvent };

/**
 * Orchestrator outcome. Failures are values, classified later by the facade.
 */
export type ConversationOutcome =
  | {
      readonly ok: true;
      readonly response: ChatResponse;
      /** Full sequence including the final assistant message */
      readonly conversation: Conversation;
      readonly completions: number;
      readonly toolDispatches: number;
    }
  | {
      readonly ok: false;
      readonly failure: ChatFailure;
      readonly conversation: Conversation;
      readonly completions: number;
      readonly toolDispatches: number;
    };

export interface RunChatInput {
  /** Non-empty, caller-supplied conversation */
  readonly messages: readonly Message[];
  /** Falls back to DEFAULT_MODEL */
  readonly model?: string;
  readonly abortSignal?: AbortSignal;
  /** Observer for run events (tool calls, status, final, error, done) */
  readonly onEvent?: EmitAiEvent;
}

export type RunChatResult =
  | { readonly ok: true; readonly response: ChatResponse }
  | { readonly ok: false; readonly error: ClassifiedChatError };

export type TestCompletionResult =
  | {
      readonly status: "success";
      readonly model: string;
      readonly response: string;
      readonly timestamp: string;
    }
  | {
      readonly status: "error";
      readonly error: string;
      readonly timestamp: string;
    };

export type HealthCheckResult =
  | {
      readonly status: "healthy";
      readonly apiKeyConfigured: boolean;
      readonly model: string;
      readonly timestamp: string;
    }
  | {
      readonly status: "unhealthy";
      readonly error: string;
      readonly timestamp: string;
    };
