// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Unit tests for dependency injection container wiring and overrides.
 * Scope: Tests singleton behavior, default adapter selection and override injection. Does NOT test adapter implementations.
 * Invariants: Module cache reset between tests; clean env state; no outbound calls.
 * Side-effects: process.env
 * Notes: Uses vi.resetModules() to force fresh imports of env and container singletons.
 * Links: src/bootstrap/container.ts
 * @public
 */

import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

const ORIGINAL_ENV = process.env;

describe("bootstrap container DI wiring", () => {
  beforeEach(() => {
    vi.resetModules(); // ensure fresh module evaluation
    process.env = {
      ...ORIGINAL_ENV,
      NODE_ENV: "test",
      DEFAULT_MODEL: "container-model",
      CHAT_MAX_TURNS: "4",
    };
    delete process.env.LLM_API_KEY;
  });

  afterEach(async () => {
    const { resetContainer } = await import("@/bootstrap/container");
    resetContainer();
    process.env = ORIGINAL_ENV; // restore
  });

  it("wires the OpenAI-compatible adapter by default", async () => {
    const { getContainer } = await import("@/bootstrap/container");
    const { OpenAiCompatAdapter, SystemClock } = await import(
      "@/adapters/server"
    );

    const container = getContainer();

    expect(container.llmService).toBeInstanceOf(OpenAiCompatAdapter);
    expect(container.clock).toBeInstanceOf(SystemClock);
    expect(container.log).toBeDefined();
    expect(container.tools.llmDefinitions.map((d) => d.function.name)).toEqual(
      ["core__extract_profile"]
    );
  });

  it("returns the same instance until reset", async () => {
    const { getContainer, resetContainer } = await import(
      "@/bootstrap/container"
    );

    const first = getContainer();
    expect(getContainer()).toBe(first);

    resetContainer();
    expect(getContainer()).not.toBe(first);
  });

  it("reads chat settings from env", async () => {
    const { createContainer } = await import("@/bootstrap/container");
    const { FakeClock, FAKE_CLOCK_START } = await import("@tests/_fakes");

    const container = createContainer({ clock: new FakeClock() });

    expect(container.aiFacade.healthCheck()).toEqual({
      status: "healthy",
      apiKeyConfigured: false,
      model: "container-model",
      timestamp: FAKE_CLOCK_START,
    });
  });

  it("reports health from the env validated at construction", async () => {
    const { createContainer } = await import("@/bootstrap/container");
    const { FakeClock } = await import("@tests/_fakes");

    const container = createContainer({ clock: new FakeClock() });
    process.env.CHAT_MAX_TURNS = "-1";

    expect(container.aiFacade.healthCheck().status).toBe("healthy");
  });

  it("injects overrides into the facade", async () => {
    const { createContainer } = await import("@/bootstrap/container");
    const {
      createAssistantMessage,
      createConversation,
      createFakeProfileCapability,
      createToolCall,
      createToolCallMessage,
      FakeLlmService,
      TEST_PROFILE_ARGS,
    } = await import("@tests/_fakes");

    const llmService = new FakeLlmService([
      createToolCallMessage([
        createToolCall({ id: "c1", arguments: { ...TEST_PROFILE_ARGS } }),
      ]),
      createAssistantMessage("Profile ready"),
    ]);
    const profileExtraction = createFakeProfileCapability();

    const container = createContainer({ llmService, profileExtraction });
    const result = await container.aiFacade.runChat({
      messages: createConversation(),
    });

    expect(container.llmService).toBe(llmService);
    expect(result.ok).toBe(true);
    expect(profileExtraction.calls).toHaveLength(1);
    expect(llmService.callLog.map((c) => c.model)).toEqual([
      "container-model",
      "container-model",
    ]);
  });

  it("fails fast on invalid env", async () => {
    process.env.CHAT_MAX_TURNS = "-1";
    const { createContainer } = await import("@/bootstrap/container");
    const { EnvValidationError } = await import("@/shared/env");

    expect(() => createContainer()).toThrow(EnvValidationError);
  });
});
