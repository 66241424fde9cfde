// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@tests/_fakes/ai/tool-builders`
 * Purpose: Profile capability fakes, tool argument fixtures and an AiEvent collector.
 * Scope: Tool fixtures for orchestrator, facade and registry tests. Does NOT contain runtime logic.
 * Invariants: Deterministic output; placeholder credentials only.
 * Side-effects: none
 * Links: tool-registry.ts, @toolchat/ai-tools extract-profile
 * @public
 */

import type { AiEvent } from "@toolchat/ai-core";
import type {
  ExtractedProfile,
  ExtractProfileParams,
  ProfileExtractionCapability,
} from "@toolchat/ai-tools";

export const TEST_PROFILE: ExtractedProfile = {
  name: "Test Person",
  headline: "Staff Engineer",
  location: "Remote",
  experience: [{ title: "Engineer", company: "Example Co" }],
  education: [{ school: "Example University" }],
  skills: ["typescript", "testing"],
};

export const TEST_PROFILE_ARGS = {
  email: "user@example.com",
  password: "test-secret",
  profile_url: "https://profiles.example.com/in/test-person",
} as const;

export interface FakeProfileCapability extends ProfileExtractionCapability {
  readonly calls: ExtractProfileParams[];
}

/**
 * Profile capability returning `result`, or throwing `error` when given.
 */
export function createFakeProfileCapability(
  options: {
    result?: ExtractedProfile | null;
    error?: Error;
  } = {}
): FakeProfileCapability {
  const calls: ExtractProfileParams[] = [];
  const result = options.result === undefined ? TEST_PROFILE : options.result;

  return {
    calls,
    async extract(params) {
      calls.push(params);
      if (options.error) throw options.error;
      return result;
    },
  };
}

/**
 * Create an event collector for testing emissions.
 */
export function createEventCollector(): {
  emit: (event: AiEvent) => void;
  events: AiEvent[];
  types: () => AiEvent["type"][];
  getByType: <T extends AiEvent["type"]>(
    type: T
  ) => Extract<AiEvent, { type: T }>[];
} {
  const events: AiEvent[] = [];
  return {
    emit: (event: AiEvent) => {
      events.push(event);
    },
    events,
    types: () => events.map((e) => e.type),
    getByType: <T extends AiEvent["type"]>(type: T) =>
      events.filter((e): e is Extract<AiEvent, { type: T }> => e.type === type),
  };
}
