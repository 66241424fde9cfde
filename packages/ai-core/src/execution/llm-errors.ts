// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@toolchat/ai-core/execution/llm-errors`
 * Purpose: Completion-client error types thrown at the adapter boundary.
 * Scope: Defines LlmError class and helpers. Does not implement normalization (see error-codes.ts).
 * Invariants:
 *   - LlmError captures kind + optional HTTP status at throw site (adapter boundary)
 *   - classifyLlmErrorFromStatus maps HTTP codes to LlmErrorKind
 *   - isLlmError type guard for instanceof checks
 * Side-effects: none
 * Links: error-codes.ts (normalizeErrorToFailure)
 * @public
 */

/**
 * Error classification kinds for completion-client failures.
 * Derived from HTTP status codes or transport failures at adapter boundary.
 */
export type LlmErrorKind =
  | "connection"
  | "timeout"
  | "rate_limited"
  | "model_unavailable"
  | "provider_4xx"
  | "provider_5xx"
  | "aborted"
  | "unknown";

/**
 * Typed error for completion-client failures.
 * Thrown by adapters on network/HTTP/body errors.
 */
export class LlmError extends Error {
  readonly kind: LlmErrorKind;
  readonly status: number | undefined;

  constructor(message: string, kind: LlmErrorKind, status?: number) {
    super(message);
    this.name = "LlmError";
    this.kind = kind;
    this.status = status;
  }
}

/**
 * Type guard for LlmError.
 */
export function isLlmError(error: unknown): error is LlmError {
  return error instanceof LlmError;
}

/**
 * Classify LlmError kind from HTTP status code.
 * 404 means the requested model is not served by the provider.
 */
export function classifyLlmErrorFromStatus(status: number): LlmErrorKind {
  if (status === 404) return "model_unavailable";
  if (status === 408) return "timeout";
  if (status === 429) return "rate_limited";
  if (status >= 400 && status < 500) return "provider_4xx";
  if (status >= 500 && status < 600) return "provider_5xx";
  return "unknown";
}
