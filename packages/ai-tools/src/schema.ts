// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@toolchat/ai-tools/schema`
 * Purpose: Compile Zod tool contracts to ToolSpec (JSONSchema7) for LLM tool definitions.
 * Scope: Schema compilation only. Does NOT execute tools.
 * Invariants:
 *   - $refStrategy "none": compiled schemas are self-contained
 *   - Redaction allowlist copied from the contract
 * Side-effects: none
 * Links: @toolchat/ai-core ToolSpec
 * @public
 */

import type { ToolSpec } from "@toolchat/ai-core";
import type { JSONSchema7 } from "json-schema";
import type { z } from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";

/**
 * The parts of a ToolContract that spec compilation reads.
 */
export interface ToolSpecSource {
  readonly name: string;
  readonly description: string;
  readonly inputSchema: z.ZodTypeAny;
  readonly allowlist: readonly string[];
}

export interface ToToolSpecResult {
  readonly spec: ToolSpec;
  readonly warnings: readonly string[];
}

/**
 * Compile a ToolContract to a ToolSpec.
 *
 * @param contract - Tool contract with Zod schemas
 * @returns Result with spec and any warnings
 */
export function toToolSpec(contract: ToolSpecSource): ToToolSpecResult {
  const rawSchema = zodToJsonSchema(contract.inputSchema, {
    $refStrategy: "none",
  });

  const inputSchema: JSONSchema7 =
    typeof rawSchema === "object" && rawSchema !== null
      ? (rawSchema as JSONSchema7)
      : { type: "object" };

  const warnings: string[] = [];
  if (inputSchema.type !== "object") {
    warnings.push(
      `Tool "${contract.name}" input schema is not an object schema`
    );
  }

  return {
    spec: {
      name: contract.name,
      description: contract.description,
      inputSchema,
      redaction: {
        mode: "top_level_only",
        allowlist: contract.allowlist,
      },
    },
    warnings,
  };
}

export interface ToToolSpecsResult {
  readonly specs: readonly ToolSpec[];
  readonly warnings: readonly string[];
}

/**
 * Compile multiple ToolContracts.
 */
export function toToolSpecs(
  contracts: readonly ToolSpecSource[]
): ToToolSpecsResult {
  const allWarnings: string[] = [];
  const specs = contracts.map((contract) => {
    const { spec, warnings } = toToolSpec(contract);
    allWarnings.push(...warnings);
    return spec;
  });

  return { specs, warnings: allWarnings };
}
