// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@features/ai/tool-registry`
 * Purpose: Closed registry of tools available to a chat run, plus their LLM definitions.
 * Scope: Binds catalog contracts to injected capabilities. Does not import adapters.
 * Invariants:
 *   - Registry is closed: only catalog contracts, looked up by exact name
 *   - A contract without a configured capability keeps its stub implementation
 *   - LLM definitions are derived from the same ToolSpec the runner validates against
 * Side-effects: none
 * Links: @toolchat/ai-tools catalog, @toolchat/ai-core tool-runner
 * @public
 */

import {
  type BoundToolRuntime,
  createStaticToolSource,
  type ToolSourcePort,
  type ToolSpec,
} from "@toolchat/ai-core";
import {
  contractToRuntime,
  createExtractProfileImplementation,
  extractProfileBoundTool,
  extractProfileContract,
  type ProfileExtractionCapability,
  toBoundToolRuntime,
} from "@toolchat/ai-tools";

import type { LlmToolDefinition } from "@/ports";

/**
 * Capabilities supplied by the composition root.
 */
export interface ToolCapabilities {
  readonly profileExtraction?: ProfileExtractionCapability | undefined;
}

export interface ChatTools {
  /** Lookup source for the tool runner */
  readonly source: ToolSourcePort;
  /** Definitions sent with every completion request */
  readonly llmDefinitions: readonly LlmToolDefinition[];
}

/**
 * Convert a compiled ToolSpec to an OpenAI-format function definition.
 */
export function toLlmToolDefinition(spec: ToolSpec): LlmToolDefinition {
  // $schema is meta-data the function-calling API does not need
  const { $schema: _schema, ...parameters } = spec.inputSchema;
  return {
    type: "function",
    function: {
      name: spec.name,
      description: spec.description,
      parameters,
    },
  };
}

/**
 * Build the tool set for chat runs.
 *
 * @param capabilities - Real capability implementations; missing ones stay stubbed
 */
export function createChatTools(capabilities: ToolCapabilities = {}): ChatTools {
  const { profileExtraction } = capabilities;

  const runtimes: BoundToolRuntime[] = [
    profileExtraction
      ? contractToRuntime(
          extractProfileContract,
          createExtractProfileImplementation({ profileExtraction })
        )
      : toBoundToolRuntime(extractProfileBoundTool),
  ];

  const source = createStaticToolSource(runtimes);

  return {
    source,
    llmDefinitions: source.listToolSpecs().map(toLlmToolDefinition),
  };
}
