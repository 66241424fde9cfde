// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@toolchat/ai-core/tests/error-codes`
 * Purpose: Unit tests for LlmError status mapping and failure normalization.
 * Scope: Pure functions only.
 * Invariants: ERROR_NORMALIZATION_ONCE - every thrown value maps to exactly one ChatFailureKind.
 * Side-effects: none
 * Links: src/execution/error-codes.ts, src/execution/llm-errors.ts
 * @internal
 */

import { describe, expect, it } from "vitest";

import {
  isChatFailureKind,
  normalizeErrorToFailure,
} from "../src/execution/error-codes";
import {
  classifyLlmErrorFromStatus,
  isLlmError,
  LlmError,
  type LlmErrorKind,
} from "../src/execution/llm-errors";

describe("classifyLlmErrorFromStatus", () => {
  it.each([
    [404, "model_unavailable"],
    [408, "timeout"],
    [429, "rate_limited"],
    [400, "provider_4xx"],
    [401, "provider_4xx"],
    [500, "provider_5xx"],
    [503, "provider_5xx"],
    [302, "unknown"],
  ] satisfies [number, LlmErrorKind][])("%i → %s", (status, kind) => {
    expect(classifyLlmErrorFromStatus(status)).toBe(kind);
  });
});

describe("isLlmError", () => {
  it("recognizes LlmError and rejects plain errors", () => {
    expect(isLlmError(new LlmError("x", "timeout"))).toBe(true);
    expect(isLlmError(new Error("x"))).toBe(false);
    expect(isLlmError("x")).toBe(false);
  });
});

describe("normalizeErrorToFailure", () => {
  it.each([
    ["connection", "transport"],
    ["timeout", "transport"],
    ["provider_5xx", "transport"],
    ["rate_limited", "capacity"],
    ["model_unavailable", "availability"],
    ["provider_4xx", "completion"],
    ["unknown", "completion"],
    ["aborted", "unclassified"],
  ] as const)("LlmError %s → %s", (llmKind, failureKind) => {
    const failure = normalizeErrorToFailure(
      new LlmError("upstream said no", llmKind)
    );
    expect(failure).toEqual({ kind: failureKind, message: "upstream said no" });
  });

  it("treats status 429 as capacity regardless of kind", () => {
    const failure = normalizeErrorToFailure(
      new LlmError("slow down", "provider_4xx", 429)
    );
    expect(failure.kind).toBe("capacity");
  });

  it("maps plain errors to unclassified with their message", () => {
    expect(normalizeErrorToFailure(new TypeError("oops"))).toEqual({
      kind: "unclassified",
      message: "oops",
    });
  });

  it("stringifies non-Error throwables", () => {
    expect(normalizeErrorToFailure("bare string")).toEqual({
      kind: "unclassified",
      message: "bare string",
    });
  });
});

describe("isChatFailureKind", () => {
  it("accepts known kinds only", () => {
    expect(isChatFailureKind("turn_limit")).toBe(true);
    expect(isChatFailureKind("protocol")).toBe(true);
    expect(isChatFailureKind("rate_limit")).toBe(false);
    expect(isChatFailureKind(undefined)).toBe(false);
  });
});
