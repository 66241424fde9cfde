// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@toolchat/ai-core/tooling/types`
 * Purpose: Canonical semantic types for tool definitions, invocations, and execution.
 * Scope: Framework-agnostic types for tool definitions and execution. Does NOT import Zod — uses JSONSchema7 for wire formats.
 * Invariants:
 *   - TOOL_EXEC_TYPES_IN_AI_CORE: ToolExecResult, EmitAiEvent defined here
 *   - ToolSpec uses JSONSchema7 for inputSchema (compiled from Zod in @toolchat/ai-tools)
 *   - Tool output is a JSON-serializable mapping or null
 * Side-effects: none (types only)
 * Links: tool-runner.ts, @toolchat/ai-tools
 * @public
 */

import type { JSONSchema7 } from "json-schema";

import type { AiEvent } from "../events/ai-events";

/**
 * Redaction mode for tool output.
 * Only top_level_only is supported — filter top-level keys by allowlist.
 */
export type RedactionMode = "top_level_only";

export interface ToolRedactionConfig {
  readonly mode: RedactionMode;
  /** Fields that are safe to expose to the model, UI and logs */
  readonly allowlist: readonly string[];
}

/**
 * Tool specification — canonical definition for wire formats.
 *
 * This is the compiled form of a ToolContract (Zod → JSONSchema7), used by
 * completion adapters to declare tools to the model.
 */
export interface ToolSpec {
  /** Stable tool name (snake_case, namespaced: core__tool_name) */
  readonly name: string;
  /** Human-readable description for LLM */
  readonly description: string;
  readonly inputSchema: JSONSchema7;
  readonly redaction: ToolRedactionConfig;
}

/**
 * Known error codes for tool execution failures.
 */
export type ToolErrorCode =
  | "unavailable"
  | "invalid_json"
  | "validation"
  | "execution"
  | "output_validation"
  | "redaction_failed";

/**
 * Result payload of a tool: a plain JSON-serializable mapping, or null when
 * the capability produced nothing.
 */
export type ToolOutput = Readonly<Record<string, unknown>> | null;

/**
 * Bound tool runtime interface.
 *
 * Owns validation, execution, and redaction logic; tool-runner orchestrates
 * the pipeline but never imports Zod. Implementations live in
 * @toolchat/ai-tools.
 */
export interface BoundToolRuntime {
  /** Namespaced tool ID (e.g., "core__extract_profile") */
  readonly id: string;

  /** Tool spec for LLM exposure */
  readonly spec: ToolSpec;

  /**
   * Validate decoded arguments.
   * @throws ZodError or similar on validation failure
   */
  validateInput(rawArgs: unknown): unknown;

  /**
   * Execute tool with arguments returned by validateInput().
   * @returns Raw tool output (before validation/redaction)
   */
  exec(validatedArgs: unknown): Promise<unknown>;

  /**
   * Validate output from tool execution.
   * @throws On validation failure
   */
  validateOutput(rawOutput: unknown): unknown;

  /**
   * Redact validated output to its allowlisted top-level fields.
   */
  redact(validatedOutput: unknown): ToolOutput;
}

/**
 * Tool execution result shape.
 * Per TOOLRUNNER_RESULT_SHAPE: exec() returns this discriminated union.
 */
export type ToolExecResult<T> =
  | { readonly ok: true; readonly value: T }
  | {
      readonly ok: false;
      readonly errorCode: ToolErrorCode;
      readonly safeMessage: string;
    };

/**
 * Callback for emitting AiEvents during a run.
 */
export type EmitAiEvent = (event: AiEvent) => void;
