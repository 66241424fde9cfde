// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@toolchat/ai-tools`
 * Purpose: Barrel export for pure tool definitions and contracts.
 * Scope: Re-exports all public types from submodules.
 * Invariants: SINGLE_SOURCE_OF_TRUTH - these are the canonical tool definitions.
 * Side-effects: none
 * @public
 */

// Capabilities
export type {
  ExtractedProfile,
  ExtractProfileParams,
  ProfileEducation,
  ProfileExperience,
  ProfileExtractionCapability,
} from "./capabilities";
// Tool catalog
export {
  createToolCatalog,
  getToolById,
  getToolIds,
  hasToolId,
  TOOL_CATALOG,
  type ToolCatalog,
} from "./catalog";
// Runtime adapter
export {
  applyAllowlist,
  contractToRuntime,
  toBoundToolRuntime,
} from "./runtime-adapter";
// Schema compilation
export {
  type ToolSpecSource,
  type ToToolSpecResult,
  type ToToolSpecsResult,
  toToolSpec,
  toToolSpecs,
} from "./schema";
// Tools
export {
  createExtractProfileImplementation,
  EXTRACT_PROFILE_NAME,
  type ExtractProfileDeps,
  type ExtractProfileInput,
  ExtractProfileInputSchema,
  type ExtractProfileOutput,
  ExtractProfileOutputSchema,
  type ExtractProfileRedacted,
  extractProfileBoundTool,
  extractProfileContract,
  extractProfileStubImplementation,
  type Profile,
  ProfileSchema,
} from "./tools/extract-profile";
// Tool types
export type { BoundTool, ToolContract, ToolImplementation } from "./types";
