// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/services/chat-orchestrator`
 * Purpose: Multi-turn tool-calling loop: completion → tool dispatch → completion until the model answers without tools.
 * Scope: Owns one request's conversation. Does not classify failures for callers (facade does) or retry.
 * Invariants:
 *   - SEQUENTIAL_TOOL_CALLS: tool calls in a batch run one at a time, in model order
 *   - FAIL_FAST_BATCH: first failed dispatch aborts the run; later calls are never dispatched, model is not re-queried
 *   - TURN_CAP: at most maxTurns completion requests per run; a batch requested by the last allowed completion is not dispatched
 *   - NEVER_THROWS: every failure is returned as { ok: false, failure }
 *   - Exactly one terminal event pair: assistant_final→done or error→done
 * Side-effects: IO (via LlmService and tool runner)
 * Links: core/chat/rules.ts, @toolchat/ai-core tool-runner, ai.facade.ts
 * @public
 */

import {
  type ChatFailure,
  type ChatFailureKind,
  type EmitAiEvent,
  normalizeErrorToFailure,
  type ToolErrorCode,
  type ToolRunner,
} from "@toolchat/ai-core";

import {
  appendMessage,
  type Conversation,
  createConversation,
  createToolResultMessage,
  EMPTY_CONVERSATION_MESSAGE,
  hasPendingToolCalls,
  type Message,
  pendingToolCalls,
  toChatResponse,
} from "@/core";
import type { LlmCompletionResult, LlmService, LlmToolDefinition } from "@/ports";
import { EVENT_NAMES, type Logger } from "@/shared/observability";

import type { ConversationOutcome } from "../types";

export interface RunConversationOptions {
  readonly model?: string;
  /** Maximum completion requests for this run */
  readonly maxTurns: number;
  readonly abortSignal?: AbortSignal;
}

export interface ChatOrchestratorDeps {
  readonly llmService: LlmService;
  readonly toolRunner: ToolRunner;
  readonly toolDefinitions: readonly LlmToolDefinition[];
  readonly log: Logger;
  readonly emit: EmitAiEvent;
}

/**
 * Failure kind for a tool runner error code.
 * Lookup/decode/validation problems are protocol failures; the capability itself failing is a tool failure.
 */
export function toolErrorToFailureKind(code: ToolErrorCode): ChatFailureKind {
  switch (code) {
    case "unavailable":
    case "invalid_json":
    case "validation":
      return "protocol";
    case "execution":
    case "output_validation":
    case "redaction_failed":
      return "tool";
  }
}

// Detail for these kinds may carry upstream internals; log the kind only
const KIND_ONLY_LOGGING: ReadonlySet<ChatFailureKind> = new Set([
  "transport",
  "capacity",
]);

export async function runConversation(
  initialMessages: readonly Message[],
  options: RunConversationOptions,
  deps: ChatOrchestratorDeps
): Promise<ConversationOutcome> {
  const { llmService, toolRunner, toolDefinitions, log, emit } = deps;
  const { model, maxTurns, abortSignal } = options;

  let conversation: Conversation = createConversation(initialMessages);
  let completions = 0;
  let toolDispatches = 0;

  const fail = (failure: ChatFailure): ConversationOutcome => {
    log.warn(
      {
        kind: failure.kind,
        ...(KIND_ONLY_LOGGING.has(failure.kind)
          ? {}
          : { message: failure.message }),
        completions,
        toolDispatches,
      },
      EVENT_NAMES.AI_CHAT_RUN_FAILED
    );
    emit({ type: "error", error: failure.kind });
    emit({ type: "done" });
    return { ok: false, failure, conversation, completions, toolDispatches };
  };

  if (conversation.length === 0) {
    return fail({ kind: "protocol", message: EMPTY_CONVERSATION_MESSAGE });
  }

  const turnLimit = (): ConversationOutcome =>
    fail({
      kind: "turn_limit",
      message: `Tool-call turn limit of ${maxTurns} exceeded`,
    });

  for (;;) {
    if (completions >= maxTurns) {
      return turnLimit();
    }

    emit({ type: "status", phase: "thinking" });
    log.debug(
      { turn: completions + 1, messageCount: conversation.length },
      EVENT_NAMES.AI_CHAT_COMPLETION_REQUESTED
    );

    let result: LlmCompletionResult;
    try {
      result = await llmService.completion({
        messages: conversation,
        ...(model ? { model } : {}),
        ...(toolDefinitions.length > 0 ? { tools: toolDefinitions } : {}),
        ...(abortSignal ? { abortSignal } : {}),
      });
    } catch (error) {
      return fail(normalizeErrorToFailure(error));
    }
    completions += 1;

    const assistant = result.message;

    if (!hasPendingToolCalls(assistant)) {
      conversation = appendMessage(conversation, assistant);
      emit({ type: "assistant_final", content: assistant.content });
      emit({ type: "done" });
      log.info(
        { completions, toolDispatches, finishReason: result.finishReason },
        EVENT_NAMES.AI_CHAT_RUN_COMPLETED
      );
      return {
        ok: true,
        response: toChatResponse(assistant),
        conversation,
        completions,
        toolDispatches,
      };
    }

    conversation = appendMessage(conversation, assistant);

    // No completion left to read the results: skip the batch
    if (completions >= maxTurns) {
      return turnLimit();
    }

    for (const call of pendingToolCalls(assistant)) {
      emit({ type: "status", phase: "tool_use", label: call.function.name });

      const startedAt = performance.now();
      const outcome = await toolRunner.exec(
        call.function.name,
        call.function.arguments,
        { modelToolCallId: call.id }
      );
      toolDispatches += 1;

      log.debug(
        {
          toolName: call.function.name,
          toolCallId: call.id,
          ok: outcome.ok,
          durationMs: Math.round(performance.now() - startedAt),
        },
        EVENT_NAMES.AI_CHAT_TOOL_DISPATCHED
      );

      if (!outcome.ok) {
        return fail({
          kind: toolErrorToFailureKind(outcome.errorCode),
          message: `Tool call failed: ${outcome.safeMessage}`,
        });
      }

      conversation = appendMessage(
        conversation,
        createToolResultMessage(call, outcome.value)
      );
    }
  }
}
