// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@toolchat/ai-tools/catalog`
 * Purpose: Canonical closed registry of tool definitions. Single source of truth.
 * Scope: Exports TOOL_CATALOG and createToolCatalog helper. Does NOT bind real capabilities (bootstrap does).
 * Invariants:
 *   - TOOL_CATALOG_IS_CANONICAL: Single source of truth for core__ tools
 *   - TOOL_ID_STABILITY: Duplicate IDs throw at construction time
 *   - TOOL_ID_NAMESPACED: IDs use core__<name> format
 * Side-effects: none
 * Links: runtime-adapter.ts, tools/
 * @public
 */

import type { BoundToolRuntime } from "@toolchat/ai-core";

import { toBoundToolRuntime } from "./runtime-adapter";
import { extractProfileBoundTool } from "./tools/extract-profile";

/**
 * Tool catalog type.
 * Maps tool ID → BoundToolRuntime.
 */
export type ToolCatalog = Readonly<Record<string, BoundToolRuntime>>;

/**
 * Create a tool catalog from an array of tool runtimes.
 *
 * @throws Error if duplicate tool IDs are detected
 */
export function createToolCatalog(
  tools: readonly BoundToolRuntime[]
): ToolCatalog {
  const catalog: Record<string, BoundToolRuntime> = {};

  for (const tool of tools) {
    // TOOL_ID_STABILITY: Throw on duplicate, never silently overwrite
    if (tool.id in catalog) {
      throw new Error(
        `TOOL_ID_STABILITY violation: Duplicate tool ID "${tool.id}" in catalog. ` +
          "Tool IDs must be unique. Check for duplicate registrations."
      );
    }

    catalog[tool.id] = tool;
  }

  return Object.freeze(catalog);
}

/**
 * TOOL_CATALOG: every tool the model may call, with stub implementations.
 *
 * To add a new tool:
 * 1. Create contract + implementation in tools/<name>.ts
 * 2. Add it to this catalog
 * 3. Bind its real implementation in the app's tool registry
 */
export const TOOL_CATALOG: ToolCatalog = createToolCatalog([
  toBoundToolRuntime(extractProfileBoundTool),
]);

export function getToolIds(): readonly string[] {
  return Object.keys(TOOL_CATALOG);
}

/**
 * Get a tool by ID from the catalog.
 * Returns undefined if not found.
 */
export function getToolById(toolId: string): BoundToolRuntime | undefined {
  return TOOL_CATALOG[toolId];
}

export function hasToolId(toolId: string): boolean {
  return toolId in TOOL_CATALOG;
}
