// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/events`
 * Purpose: Event name registry for structured logging - prevents ad-hoc strings and schema drift.
 * Scope: Define valid event names as const registry. Does not define payload schemas.
 * Invariants: All chat log messages use EVENT_NAMES.* constants.
 * Side-effects: none
 * @public
 */

export const EVENT_NAMES = {
  AI_CHAT_RECEIVED: "ai.chat_received",
  AI_CHAT_COMPLETION_REQUESTED: "ai.chat.completion_requested",
  AI_CHAT_TOOL_DISPATCHED: "ai.chat.tool_dispatched",
  AI_CHAT_RUN_COMPLETED: "ai.chat.run_completed",
  AI_CHAT_RUN_FAILED: "ai.chat.run_failed",
  AI_CHAT_EVENT: "ai.chat.event",
  AI_CHAT_PROBE: "ai.chat.probe",
  ADAPTER_COMPLETION_RESULT: "adapter.openai_compat.completion_result",
  ADAPTER_COMPLETION_ERROR: "adapter.openai_compat.completion_error",
} as const;

export type EventName = (typeof EVENT_NAMES)[keyof typeof EVENT_NAMES];
