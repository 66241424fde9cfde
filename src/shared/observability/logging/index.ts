// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging`
 * Purpose: Public API for structured logging across the application.
 * Scope: Re-export logger factory, event names, redaction paths and Logger type. Does not implement logging transport.
 * Invariants: none
 * Side-effects: none
 * Notes: Import from this module, not from submodules.
 * @public
 */

export { EVENT_NAMES, type EventName } from "./events";
export type { Logger } from "./logger";
export { makeLogger, makeNoopLogger } from "./logger";
export { REDACT_PATHS } from "./redact";
