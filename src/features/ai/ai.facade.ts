// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/ai.facade`
 * Purpose: Single AI entrypoint: runs a tool-calling chat, probes the completion service, reports health.
 * Scope: Builds a per-request tool runner, delegates to the orchestrator, classifies the outcome. Does not encode HTTP responses.
 * Invariants:
 *   - CLASSIFY_ONCE: classifyChatFailure() is called exactly once per failed runChat
 *   - runChat never throws; callers get { ok, response } | { ok, error }
 *   - No state shared between requests (runner and conversation are per call)
 * Side-effects: IO (via injected LlmService and tool capabilities)
 * Notes: healthCheck() reports "unhealthy" only when the injected settings reader throws. The container validates
 *   env once at construction and caches it, so a container-built facade never sees invalid env here.
 * Links: services/chat-orchestrator.ts, tool-registry.ts, @toolchat/ai-core classify
 * @public
 */

import {
  type AiEvent,
  type ChatFailure,
  classifyChatFailure,
  createToolRunner,
  normalizeErrorToFailure,
} from "@toolchat/ai-core";

import type { Message } from "@/core";
import type { Clock, LlmService } from "@/ports";
import { EVENT_NAMES, type Logger } from "@/shared/observability";

import { runConversation } from "./services/chat-orchestrator";
import type { ChatTools } from "./tool-registry";
import type {
  HealthCheckResult,
  RunChatInput,
  RunChatResult,
  TestCompletionResult,
} from "./types";

/** Fixed probe conversation for testCompletion() */
export const PROBE_MESSAGES: readonly Message[] = [
  { role: "developer", content: "You are a helpful assistant." },
  { role: "user", content: "Say 'Hello, testing!' if you can hear me." },
];

/**
 * Settings the facade reads on demand; may throw when env is invalid.
 */
export interface ChatSettings {
  readonly defaultModel: string;
  readonly maxTurns: number;
  readonly apiKeyConfigured: boolean;
}

export interface AiFacadeDeps {
  readonly llmService: LlmService;
  readonly tools: ChatTools;
  readonly clock: Clock;
  readonly log: Logger;
  readonly settings: () => ChatSettings;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Create an AI facade instance with injected dependencies.
 */
export function createAiFacade(deps: AiFacadeDeps) {
  const { llmService, tools, clock } = deps;
  const log = deps.log.child({ feature: "ai.chat" });

  async function runChat(input: RunChatInput): Promise<RunChatResult> {
    const emit = (event: AiEvent): void => {
      log.debug({ event }, EVENT_NAMES.AI_CHAT_EVENT);
      input.onEvent?.(event);
    };

    log.info(
      { messageCount: input.messages.length, model: input.model },
      EVENT_NAMES.AI_CHAT_RECEIVED
    );

    let failure: ChatFailure;
    try {
      const settings = deps.settings();
      const outcome = await runConversation(
        input.messages,
        {
          model: input.model ?? settings.defaultModel,
          maxTurns: settings.maxTurns,
          ...(input.abortSignal ? { abortSignal: input.abortSignal } : {}),
        },
        {
          llmService,
          toolRunner: createToolRunner(tools.source, emit),
          toolDefinitions: tools.llmDefinitions,
          log,
          emit,
        }
      );
      if (outcome.ok) {
        return { ok: true, response: outcome.response };
      }
      failure = outcome.failure;
    } catch (error) {
      failure = normalizeErrorToFailure(error);
    }

    return { ok: false, error: classifyChatFailure(failure) };
  }

  /**
   * Send a fixed two-message conversation with no tools.
   */
  async function testCompletion(): Promise<TestCompletionResult> {
    try {
      const { defaultModel } = deps.settings();
      const result = await llmService.completion({
        messages: PROBE_MESSAGES,
        model: defaultModel,
      });
      log.info(
        { model: defaultModel, status: "success" },
        EVENT_NAMES.AI_CHAT_PROBE
      );
      return {
        status: "success",
        model: defaultModel,
        response: result.message.content,
        timestamp: clock.now(),
      };
    } catch (error) {
      const classified = classifyChatFailure(normalizeErrorToFailure(error));
      log.warn(
        { status: "error", category: classified.category },
        EVENT_NAMES.AI_CHAT_PROBE
      );
      return {
        status: "error",
        error: classified.message,
        timestamp: clock.now(),
      };
    }
  }

  function healthCheck(): HealthCheckResult {
    try {
      const { defaultModel, apiKeyConfigured } = deps.settings();
      return {
        status: "healthy",
        apiKeyConfigured,
        model: defaultModel,
        timestamp: clock.now(),
      };
    } catch (error) {
      return {
        status: "unhealthy",
        error: errorMessage(error),
        timestamp: clock.now(),
      };
    }
  }

  return { runChat, testCompletion, healthCheck };
}

export type AiFacade = ReturnType<typeof createAiFacade>;
