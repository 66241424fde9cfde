// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@ports/clock.port`
 * Purpose: Time source for probe and health-check timestamps.
 * Scope: Current time as ISO 8601. Does not handle timezones or date arithmetic.
 * Invariants: Always returns ISO 8601 string format
 * Side-effects: none (interface only)
 * Links: adapters/server/time/system.adapter.ts, features/ai/ai.facade.ts
 * @public
 */

export interface Clock {
  now(): string;
}
