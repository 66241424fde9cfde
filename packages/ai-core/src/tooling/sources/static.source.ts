// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@toolchat/ai-core/tooling/sources/static.source`
 * Purpose: Static tool source implementation wrapping a pre-built tool map.
 * Scope: Implements ToolSourcePort for static tool registries. Does NOT import Zod or modify tools.
 * Invariants:
 *   - TOOL_SOURCE_RETURNS_BOUND_TOOL: Returns BoundToolRuntime from map
 *   - TOOL_ID_STABILITY: Duplicate IDs throw; no mutations after construction
 * Side-effects: none
 * Links: ports/tool-source.port.ts
 * @public
 */

import type { ToolSourcePort } from "../ports/tool-source.port";
import type { BoundToolRuntime, ToolSpec } from "../types";

export class StaticToolSource implements ToolSourcePort {
  private readonly toolMap: ReadonlyMap<string, BoundToolRuntime>;
  private readonly specs: readonly ToolSpec[];

  constructor(tools: ReadonlyMap<string, BoundToolRuntime>) {
    this.toolMap = tools;
    // Pre-compute specs for listToolSpecs()
    this.specs = Array.from(tools.values()).map((t) => t.spec);
  }

  getBoundTool(toolId: string): BoundToolRuntime | undefined {
    return this.toolMap.get(toolId);
  }

  listToolSpecs(): readonly ToolSpec[] {
    return this.specs;
  }

  hasToolId(toolId: string): boolean {
    return this.toolMap.has(toolId);
  }

  get size(): number {
    return this.toolMap.size;
  }

  getToolIds(): readonly string[] {
    return Array.from(this.toolMap.keys());
  }
}

/**
 * Create a StaticToolSource from an array of BoundToolRuntime.
 *
 * @throws If duplicate tool IDs are detected (per TOOL_ID_STABILITY)
 */
export function createStaticToolSource(
  tools: readonly BoundToolRuntime[]
): StaticToolSource {
  const map = new Map<string, BoundToolRuntime>();

  for (const tool of tools) {
    if (map.has(tool.id)) {
      throw new Error(
        `TOOL_ID_STABILITY violation: Duplicate tool ID "${tool.id}". ` +
          "Tool IDs must be unique within a source."
      );
    }
    map.set(tool.id, tool);
  }

  return new StaticToolSource(map);
}
