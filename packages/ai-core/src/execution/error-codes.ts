// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@toolchat/ai-core/execution/error-codes`
 * Purpose: Closed set of chat failure variants and the normalizer that maps thrown errors onto it.
 * Scope: Single source of truth for failure kinds and normalization logic. Does NOT decide outward status (see classify.ts).
 * Invariants:
 *   - SINGLE_SOURCE_OF_TRUTH: All failure kinds defined here, imported everywhere else
 *   - ERROR_NORMALIZATION_ONCE: normalizeErrorToFailure() is the canonical normalizer
 *   - Failures are values ({ kind, message }), never thrown across the orchestrator boundary
 * Side-effects: none
 * Links: llm-errors.ts, classify.ts
 * @public
 */

import { isLlmError } from "./llm-errors";

/**
 * Canonical failure kinds for a chat run.
 * - transport: completion service unreachable, timed out, or failing upstream (5xx)
 * - capacity: provider rate limit exceeded
 * - availability: requested model not served
 * - completion: any other completion-client failure (4xx, malformed body)
 * - tool: a registered capability raised or produced unusable output
 * - protocol: unknown tool name or malformed tool arguments
 * - turn_limit: model kept requesting tools past the configured cap
 * - unclassified: anything else
 */
export const CHAT_FAILURE_KINDS = [
  "transport",
  "capacity",
  "availability",
  "completion",
  "tool",
  "protocol",
  "turn_limit",
  "unclassified",
] as const;

export type ChatFailureKind = (typeof CHAT_FAILURE_KINDS)[number];

/**
 * A failed chat run. `message` is internal detail; the classifier decides
 * whether it reaches the caller.
 */
export interface ChatFailure {
  readonly kind: ChatFailureKind;
  readonly message: string;
}

/**
 * Type guard for ChatFailureKind.
 */
export function isChatFailureKind(x: unknown): x is ChatFailureKind {
  return CHAT_FAILURE_KINDS.some((kind) => kind === x);
}

/**
 * Normalize any thrown error to a ChatFailure.
 *
 * Priority:
 * 1. LlmError status 429 → "capacity"
 * 2. LlmError kind → transport / capacity / availability / completion / unclassified
 * 3. Default → "unclassified"
 */
export function normalizeErrorToFailure(error: unknown): ChatFailure {
  const message = error instanceof Error ? error.message : String(error);

  if (isLlmError(error)) {
    // Status-first (most reliable - HTTP status code)
    if (error.status === 429) return { kind: "capacity", message };

    switch (error.kind) {
      case "connection":
      case "timeout":
      case "provider_5xx":
        return { kind: "transport", message };
      case "rate_limited":
        return { kind: "capacity", message };
      case "model_unavailable":
        return { kind: "availability", message };
      case "provider_4xx":
      case "unknown":
        return { kind: "completion", message };
      case "aborted":
        return { kind: "unclassified", message };
    }
  }

  return { kind: "unclassified", message };
}
