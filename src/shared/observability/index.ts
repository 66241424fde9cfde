// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability`
 * Purpose: Cross-cutting observability entry point.
 * Scope: Re-exports logging utilities. Does not implement logic.
 * Invariants: No imports from bootstrap or ports.
 * Side-effects: none
 * @public
 */

export {
  EVENT_NAMES,
  type EventName,
  type Logger,
  makeLogger,
  makeNoopLogger,
  REDACT_PATHS,
} from "./logging";
