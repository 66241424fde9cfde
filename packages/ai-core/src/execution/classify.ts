// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@toolchat/ai-core/execution/classify`
 * Purpose: Map a ChatFailure to the caller-facing error category, status and message.
 * Scope: Pure total function over ChatFailureKind. Does not log or throw.
 * Invariants:
 *   - CLASSIFY_ONCE: invoked exactly once per top-level chat request
 *   - Transport/capacity/unclassified detail never reaches the caller
 *   - Chat-domain detail (completion, tool, protocol, turn_limit, availability) is surfaced verbatim
 * Side-effects: none
 * Links: error-codes.ts
 * @public
 */

import type { ChatFailure } from "./error-codes";

export type ChatErrorCategory =
  | "service_unavailable"
  | "too_many_requests"
  | "internal_error";

export interface ClassifiedChatError {
  readonly category: ChatErrorCategory;
  readonly status: 429 | 500 | 503;
  readonly message: string;
}

export const SERVICE_UNAVAILABLE_MESSAGE =
  "Service temporarily unavailable. Please try again later.";
export const RATE_LIMITED_MESSAGE =
  "Rate limit exceeded. Please try again later.";
export const UNEXPECTED_ERROR_MESSAGE = "An unexpected error occurred";

export function classifyChatFailure(
  failure: ChatFailure
): ClassifiedChatError {
  switch (failure.kind) {
    case "availability":
      return {
        category: "service_unavailable",
        status: 503,
        message: failure.message,
      };
    case "transport":
      return {
        category: "service_unavailable",
        status: 503,
        message: SERVICE_UNAVAILABLE_MESSAGE,
      };
    case "capacity":
      return {
        category: "too_many_requests",
        status: 429,
        message: RATE_LIMITED_MESSAGE,
      };
    case "completion":
    case "tool":
    case "protocol":
    case "turn_limit":
      return {
        category: "internal_error",
        status: 500,
        message: failure.message,
      };
    case "unclassified":
      return {
        category: "internal_error",
        status: 500,
        message: UNEXPECTED_ERROR_MESSAGE,
      };
  }
}
