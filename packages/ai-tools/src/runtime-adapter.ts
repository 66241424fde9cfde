// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@toolchat/ai-tools/runtime-adapter`
 * Purpose: Adapt Zod-typed BoundTools to the schema-agnostic BoundToolRuntime consumed by the ai-core tool runner.
 * Scope: Conversion only. Does not register tools or decide policy.
 * Invariants:
 *   - TOOL_SOURCE_RETURNS_BOUND_TOOL: the returned runtime owns validation, execution and redaction
 *   - REDACTION_ALLOWLIST: redacted output keeps only the spec's allowlisted top-level keys; an empty allowlist fails redaction
 *   - Typed boundaries re-apply the contract schema, so untyped values never reach typed code
 * Side-effects: none
 * Links: types.ts, schema.ts, @toolchat/ai-core tool-runner
 * @public
 */

import type { BoundToolRuntime, ToolOutput } from "@toolchat/ai-core";

import { toToolSpec } from "./schema";
import type { BoundTool, ToolContract, ToolImplementation } from "./types";

/**
 * Keep only allowlisted top-level keys.
 *
 * @throws Error when the tool declares no allowlist
 */
export function applyAllowlist(
  toolName: string,
  allowlist: readonly string[],
  output: ToolOutput
): ToolOutput {
  if (allowlist.length === 0) {
    throw new Error(`Tool '${toolName}' has no allowlist defined`);
  }
  if (output === null) return null;
  return Object.fromEntries(
    Object.entries(output).filter(([key]) => allowlist.includes(key))
  );
}

/**
 * Convert a BoundTool to the BoundToolRuntime interface.
 *
 * The runtime's methods take `unknown`; each typed step parses through the
 * contract schema (Zod parse is idempotent on already-parsed plain data).
 */
export function toBoundToolRuntime<
  TName extends string,
  TInput,
  TOutput,
  TRedacted extends ToolOutput,
>(boundTool: BoundTool<TName, TInput, TOutput, TRedacted>): BoundToolRuntime {
  const { contract, implementation } = boundTool;

  // Compile spec once
  const { spec } = toToolSpec(contract);

  return {
    id: contract.name,
    spec,

    validateInput(rawArgs: unknown): unknown {
      return contract.inputSchema.parse(rawArgs);
    },

    async exec(validatedArgs: unknown): Promise<unknown> {
      return implementation.execute(contract.inputSchema.parse(validatedArgs));
    },

    validateOutput(rawOutput: unknown): unknown {
      return contract.outputSchema.parse(rawOutput);
    },

    redact(validatedOutput: unknown): ToolOutput {
      return applyAllowlist(
        spec.name,
        spec.redaction.allowlist,
        contract.redact(contract.outputSchema.parse(validatedOutput))
      );
    },
  };
}

/**
 * Create BoundToolRuntime from a contract and implementation separately.
 *
 * This enables dependency injection at bootstrap time:
 * - Contract defines the tool schema (from catalog)
 * - Implementation is injected with real capabilities (from bootstrap)
 */
export function contractToRuntime<
  TName extends string,
  TInput,
  TOutput,
  TRedacted extends ToolOutput,
>(
  contract: ToolContract<TName, TInput, TOutput, TRedacted>,
  implementation: ToolImplementation<TInput, TOutput>
): BoundToolRuntime {
  return toBoundToolRuntime({ contract, implementation });
}
