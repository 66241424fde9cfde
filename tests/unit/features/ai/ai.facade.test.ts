// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/unit/features/ai/ai.facade`
 * Purpose: Unit tests for the AI facade: classified chat results, completion probe, health check.
 * Scope: Uses scripted LLM, fake clock and fake capabilities. Does NOT test HTTP or env loading.
 * Invariants: runChat never throws; error messages are the classified caller-safe ones.
 * Side-effects: none
 * Links: src/features/ai/ai.facade.ts
 * @public
 */

import {
  LlmError,
  RATE_LIMITED_MESSAGE,
  SERVICE_UNAVAILABLE_MESSAGE,
  UNEXPECTED_ERROR_MESSAGE,
} from "@toolchat/ai-core";
import {
  createAssistantMessage,
  createConversation,
  createEventCollector,
  createToolCall,
  createToolCallMessage,
  FAKE_CLOCK_START,
  FakeClock,
  FakeLlmService,
  TEST_PROFILE_ARGS,
} from "@tests/_fakes";
import { describe, expect, it } from "vitest";

import { EMPTY_CONVERSATION_MESSAGE } from "@/core";
import {
  type ChatSettings,
  createAiFacade,
  createChatTools,
  PROBE_MESSAGES,
} from "@/features/ai/public";
import { makeNoopLogger } from "@/shared/observability";

const SETTINGS: ChatSettings = {
  defaultModel: "test-model",
  maxTurns: 5,
  apiKeyConfigured: true,
};

function makeFacade(
  llmService: FakeLlmService,
  settings: () => ChatSettings = () => SETTINGS
) {
  return createAiFacade({
    llmService,
    tools: createChatTools(),
    clock: new FakeClock(),
    log: makeNoopLogger(),
    settings,
  });
}

describe("features/ai/ai.facade", () => {
  describe("runChat", () => {
    it("returns the final assistant response", async () => {
      const llm = new FakeLlmService([createAssistantMessage("Hi!")]);
      const facade = makeFacade(llm);

      const result = await facade.runChat({ messages: createConversation() });

      expect(result).toEqual({
        ok: true,
        response: {
          message: { role: "assistant", content: "Hi!" },
          requiresTool: false,
        },
      });
    });

    it("falls back to the default model", async () => {
      const llm = new FakeLlmService([createAssistantMessage()]);
      await makeFacade(llm).runChat({ messages: createConversation() });
      expect(llm.getLastCall()?.model).toBe("test-model");
    });

    it("uses the requested model when given", async () => {
      const llm = new FakeLlmService([createAssistantMessage()]);
      await makeFacade(llm).runChat({
        messages: createConversation(),
        model: "other-model",
      });
      expect(llm.getLastCall()?.model).toBe("other-model");
    });

    it("forwards run events to onEvent", async () => {
      const llm = new FakeLlmService([createAssistantMessage("Hi!")]);
      const events = createEventCollector();

      await makeFacade(llm).runChat({
        messages: createConversation(),
        onEvent: events.emit,
      });

      expect(events.events).toEqual([
        { type: "status", phase: "thinking" },
        { type: "assistant_final", content: "Hi!" },
        { type: "done" },
      ]);
    });

    it("hides transport detail behind the service-unavailable message", async () => {
      const llm = new FakeLlmService([
        new LlmError(
          "Completion service network error: connect ECONNREFUSED",
          "connection"
        ),
      ]);

      const result = await makeFacade(llm).runChat({
        messages: createConversation(),
      });

      expect(result).toEqual({
        ok: false,
        error: {
          category: "service_unavailable",
          status: 503,
          message: SERVICE_UNAVAILABLE_MESSAGE,
        },
      });
    });

    it("classifies provider rate limits as too_many_requests", async () => {
      const llm = new FakeLlmService([
        new LlmError("Completion API error: 429", "rate_limited", 429),
      ]);

      const result = await makeFacade(llm).runChat({
        messages: createConversation(),
      });

      expect(result).toEqual({
        ok: false,
        error: {
          category: "too_many_requests",
          status: 429,
          message: RATE_LIMITED_MESSAGE,
        },
      });
    });

    it("surfaces the model name when the model is not served", async () => {
      const llm = new FakeLlmService([
        new LlmError('Model "gone" is not available', "model_unavailable", 404),
      ]);

      const result = await makeFacade(llm).runChat({
        messages: createConversation(),
      });

      expect(result).toEqual({
        ok: false,
        error: {
          category: "service_unavailable",
          status: 503,
          message: 'Model "gone" is not available',
        },
      });
    });

    it("reports an unconfigured tool capability as an internal error", async () => {
      const llm = new FakeLlmService([
        createToolCallMessage([
          createToolCall({ id: "c1", arguments: { ...TEST_PROFILE_ARGS } }),
        ]),
      ]);

      const result = await makeFacade(llm).runChat({
        messages: createConversation(),
      });

      expect(result).toEqual({
        ok: false,
        error: {
          category: "internal_error",
          status: 500,
          message:
            "Tool call failed: ProfileExtractionCapability not configured. Provide a profile extraction backend at bootstrap.",
        },
      });
    });

    it("rejects an empty conversation", async () => {
      const llm = new FakeLlmService();

      const result = await makeFacade(llm).runChat({ messages: [] });

      expect(result).toEqual({
        ok: false,
        error: {
          category: "internal_error",
          status: 500,
          message: EMPTY_CONVERSATION_MESSAGE,
        },
      });
      expect(llm.wasCalled()).toBe(false);
    });

    it("returns an unexpected error when settings cannot be read", async () => {
      const llm = new FakeLlmService();
      const facade = makeFacade(llm, () => {
        throw new Error("Invalid server env");
      });

      const result = await facade.runChat({ messages: createConversation() });

      expect(result).toEqual({
        ok: false,
        error: {
          category: "internal_error",
          status: 500,
          message: UNEXPECTED_ERROR_MESSAGE,
        },
      });
    });

    it("enforces the configured turn cap", async () => {
      const toolTurn = createToolCallMessage([
        createToolCall({ id: "c1", name: "core__missing" }),
      ]);
      const llm = new FakeLlmService([toolTurn]);
      const facade = makeFacade(llm, () => ({ ...SETTINGS, maxTurns: 0 }));

      const result = await facade.runChat({ messages: createConversation() });

      expect(result).toEqual({
        ok: false,
        error: {
          category: "internal_error",
          status: 500,
          message: "Tool-call turn limit of 0 exceeded",
        },
      });
      expect(llm.wasCalled()).toBe(false);
    });
  });

  describe("testCompletion", () => {
    it("sends the fixed probe conversation without tools", async () => {
      const llm = new FakeLlmService([
        createAssistantMessage("Hello, testing!"),
      ]);

      const result = await makeFacade(llm).testCompletion();

      expect(result).toEqual({
        status: "success",
        model: "test-model",
        response: "Hello, testing!",
        timestamp: FAKE_CLOCK_START,
      });
      expect(llm.getLastCall()?.messages).toEqual(PROBE_MESSAGES);
      expect(llm.getLastCall()?.toolNames).toEqual([]);
    });

    it("returns the classified message on failure", async () => {
      const llm = new FakeLlmService([
        new LlmError("Completion request timed out", "timeout", 408),
      ]);

      const result = await makeFacade(llm).testCompletion();

      expect(result).toEqual({
        status: "error",
        error: SERVICE_UNAVAILABLE_MESSAGE,
        timestamp: FAKE_CLOCK_START,
      });
    });
  });

  describe("healthCheck", () => {
    it("reports configuration without calling the model", () => {
      const llm = new FakeLlmService();

      expect(makeFacade(llm).healthCheck()).toEqual({
        status: "healthy",
        apiKeyConfigured: true,
        model: "test-model",
        timestamp: FAKE_CLOCK_START,
      });
      expect(llm.wasCalled()).toBe(false);
    });

    it("reports unhealthy when settings cannot be read", () => {
      const facade = makeFacade(new FakeLlmService(), () => {
        throw new Error("Invalid server env");
      });

      expect(facade.healthCheck()).toEqual({
        status: "unhealthy",
        error: "Invalid server env",
        timestamp: FAKE_CLOCK_START,
      });
    });
  });
});
