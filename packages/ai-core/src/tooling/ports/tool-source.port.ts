// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@toolchat/ai-core/tooling/ports/tool-source.port`
 * Purpose: Port interface for the closed registry of tools a chat run may call.
 * Scope: Defines ToolSourcePort for tool lookup and spec listing. Does NOT import Zod or execute tools.
 * Invariants:
 *   - TOOL_SOURCE_RETURNS_BOUND_TOOL: getBoundTool returns executable BoundToolRuntime
 *   - ARCH_SINGLE_EXECUTION_PATH: All tool execution flows through toolRunner.exec()
 *   - Unknown names resolve to undefined at lookup, never deeper in execution
 * Side-effects: none (types only)
 * Links: sources/static.source.ts, tool-runner.ts
 * @public
 */

import type { BoundToolRuntime, ToolSpec } from "../types";

export interface ToolSourcePort {
  /**
   * Get an executable tool by ID.
   * Returns undefined if tool not found in this source.
   */
  getBoundTool(toolId: string): BoundToolRuntime | undefined;

  /**
   * List all tool specs for LLM exposure.
   */
  listToolSpecs(): readonly ToolSpec[];

  hasToolId(toolId: string): boolean;
}
