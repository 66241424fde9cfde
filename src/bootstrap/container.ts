// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@bootstrap/container`
 * Purpose: Dependency injection container for the application composition root.
 * Scope: Wire adapters to ports and capabilities to tools. Does not handle request-scoped lifecycle.
 * Invariants: All ports wired; single container instance per process; env validated on first access.
 * Side-effects: IO (initializes logger and emits startup log on first access)
 * Notes: Profile extraction stays stubbed unless a capability is passed to createContainer().
 *   Invalid env throws EnvValidationError from createContainer(); serverEnv() is cached after that.
 * Links: Used by entry points; configure adapters here for DI.
 * @public
 */

import type { ProfileExtractionCapability } from "@toolchat/ai-tools";

import { OpenAiCompatAdapter, SystemClock } from "@/adapters/server";
import {
  type AiFacade,
  type ChatSettings,
  type ChatTools,
  createAiFacade,
  createChatTools,
} from "@/features/ai/public";
import type { Clock, LlmService } from "@/ports";
import { serverEnv } from "@/shared/env";
import { type Logger, makeLogger } from "@/shared/observability";

export interface Container {
  log: Logger;
  llmService: LlmService;
  clock: Clock;
  tools: ChatTools;
  aiFacade: AiFacade;
}

/**
 * Replacements for tests and for entry points that supply real capabilities.
 */
export interface ContainerOverrides {
  readonly llmService?: LlmService;
  readonly clock?: Clock;
  readonly log?: Logger;
  readonly profileExtraction?: ProfileExtractionCapability;
}

// Module-level singleton
let _container: Container | null = null;

/**
 * Get the singleton container instance.
 * Lazily initializes on first access.
 */
export function getContainer(): Container {
  if (!_container) {
    _container = createContainer();
  }
  return _container;
}

/**
 * Reset the singleton container.
 * For tests only - allows fresh container between test runs.
 */
export function resetContainer(): void {
  _container = null;
}

function readChatSettings(): ChatSettings {
  const env = serverEnv();
  return {
    defaultModel: env.DEFAULT_MODEL,
    maxTurns: env.CHAT_MAX_TURNS,
    apiKeyConfigured: Boolean(env.LLM_API_KEY),
  };
}

export function createContainer(overrides: ContainerOverrides = {}): Container {
  const env = serverEnv();
  const log = overrides.log ?? makeLogger({ component: "container" });

  // Startup log - confirm config (no URLs/secrets)
  log.info(
    {
      nodeEnv: env.NODE_ENV,
      logLevel: env.PINO_LOG_LEVEL,
      model: env.DEFAULT_MODEL,
      maxTurns: env.CHAT_MAX_TURNS,
      profileExtraction: overrides.profileExtraction ? "configured" : "stub",
    },
    "container initialized"
  );

  const llmService =
    overrides.llmService ??
    new OpenAiCompatAdapter(
      {
        baseUrl: env.LLM_BASE_URL,
        apiKey: env.LLM_API_KEY,
        defaultModel: env.DEFAULT_MODEL,
        timeoutMs: env.LLM_TIMEOUT_MS,
        nodeEnv: env.NODE_ENV,
      },
      log.child({ component: "OpenAiCompatAdapter" })
    );

  const clock = overrides.clock ?? new SystemClock();

  const tools = createChatTools({
    profileExtraction: overrides.profileExtraction,
  });

  const aiFacade = createAiFacade({
    llmService,
    tools,
    clock,
    log,
    settings: readChatSettings,
  });

  return { log, llmService, clock, tools, aiFacade };
}
