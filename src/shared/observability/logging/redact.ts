// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/observability/logging/redact`
 * Purpose: Redaction paths for sensitive data in logs.
 * Scope: Define paths to redact from log output. Does not implement redaction logic.
 * Invariants: Tool arguments carry sign-in credentials; every path that can hold them is listed.
 * Side-effects: none
 * Links: logger.ts
 * @public
 */

export const REDACT_PATHS = [
  // Auth & secrets
  "password",
  "*.password",
  "args.password",
  "event.args.password",
  "token",
  "access_token",
  "secret",
  "apiKey",
  "api_key",
  "LLM_API_KEY",
  // HTTP headers
  "headers.authorization",
  "headers.Authorization",
  "req.headers.authorization",
];
