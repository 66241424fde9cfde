// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@toolchat/ai-tools/capabilities`
 * Purpose: Capability interfaces for tool implementations.
 * Scope: Defines tool-facing capability interfaces. Does NOT export from ai-core (capability interfaces live here).
 * Invariants: Capability interfaces live here, NOT in ai-core
 * Side-effects: none
 * @public
 */

export type {
  ExtractedProfile,
  ExtractProfileParams,
  ProfileEducation,
  ProfileExperience,
  ProfileExtractionCapability,
} from "./profile";
