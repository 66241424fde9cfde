// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@toolchat/ai-tools/types`
 * Purpose: Core type definitions for tool contracts and implementations.
 * Scope: Defines ToolContract, ToolImplementation, BoundTool. Does NOT execute tools.
 * Invariants:
 *   - Pure types only, no runtime logic
 *   - inputSchema is the source of truth; validateInput derives from it
 *   - Redacted output is a JSON-serializable mapping or null (ToolOutput)
 * Side-effects: none (types only)
 * Links: runtime-adapter.ts, catalog.ts
 * @public
 */

import type { ToolOutput } from "@toolchat/ai-core";
import type { z } from "zod";

/**
 * Tool contract definition.
 * Defines schema and interface for a tool without implementation.
 *
 * inputSchema is the source of truth for tool input validation and is
 * compiled to JSONSchema7 by toToolSpec() for the model.
 */
export interface ToolContract<
  TName extends string,
  TInput,
  TOutput,
  TRedacted extends ToolOutput,
> {
  /** Stable tool name (snake_case, namespaced: core__tool_name) */
  readonly name: TName;
  /** Human-readable description for LLM */
  readonly description: string;
  readonly inputSchema: z.ZodType<TInput, z.ZodTypeDef, unknown>;
  readonly outputSchema: z.ZodType<TOutput, z.ZodTypeDef, unknown>;
  /** Shape output for the model; the runtime then keeps only allowlisted keys */
  redact(output: TOutput): TRedacted;
  /** Allowlisted top-level fields that appear in redacted output */
  readonly allowlist: readonly string[];
}

/**
 * Tool implementation interface.
 * Receives validated input, returns raw output.
 */
export interface ToolImplementation<TInput, TOutput> {
  execute(input: TInput): Promise<TOutput>;
}

/**
 * Bound tool: contract + implementation together.
 */
export interface BoundTool<
  TName extends string,
  TInput,
  TOutput,
  TRedacted extends ToolOutput,
> {
  readonly contract: ToolContract<TName, TInput, TOutput, TRedacted>;
  readonly implementation: ToolImplementation<TInput, TOutput>;
}
