// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@toolchat/ai-tools/tools/extract-profile`
 * Purpose: AI tool that signs in to a profile site and extracts a structured professional profile.
 * Scope: Contract, schemas and capability-backed implementation. Does NOT implement scraping.
 * Invariants:
 *   - TOOL_ID_NAMESPACED: ID is `core__extract_profile` (double-underscore for provider compat)
 *   - Input keys are snake_case as the model sends them: email, password, profile_url
 *   - Only missing or non-string keys fail validation; values are passed through as sent
 *   - Output is the profile mapping or null
 * Side-effects: IO (via ProfileExtractionCapability)
 * Notes: Requires ProfileExtractionCapability to be configured at the composition root
 * Links: capabilities/profile.ts, catalog.ts
 * @public
 */

import { z } from "zod";

import type { ProfileExtractionCapability } from "../capabilities/profile";
import type { BoundTool, ToolContract, ToolImplementation } from "../types";

// ─────────────────────────────────────────────────────────────────────────────
// Schemas
// ─────────────────────────────────────────────────────────────────────────────

export const ExtractProfileInputSchema = z.object({
  email: z.string().describe("Email address used to sign in"),
  password: z.string().describe("Password used to sign in"),
  // Models often drop the scheme; the backend resolves the address
  profile_url: z.string().describe("Full URL of the profile page to extract"),
});
export type ExtractProfileInput = z.infer<typeof ExtractProfileInputSchema>;

export const ProfileExperienceSchema = z.object({
  title: z.string(),
  company: z.string(),
  dateRange: z.string().optional(),
  location: z.string().optional(),
  description: z.string().optional(),
});

export const ProfileEducationSchema = z.object({
  school: z.string(),
  degree: z.string().optional(),
  dateRange: z.string().optional(),
});

export const ProfileSchema = z.object({
  name: z.string(),
  headline: z.string().optional(),
  location: z.string().optional(),
  about: z.string().optional(),
  experience: z.array(ProfileExperienceSchema),
  education: z.array(ProfileEducationSchema),
  skills: z.array(z.string()),
});
export type Profile = z.infer<typeof ProfileSchema>;

export const ExtractProfileOutputSchema = ProfileSchema.nullable();
export type ExtractProfileOutput = z.infer<typeof ExtractProfileOutputSchema>;

/**
 * Profile data is returned to the model as-is.
 */
export type ExtractProfileRedacted = ExtractProfileOutput;

// ─────────────────────────────────────────────────────────────────────────────
// Contract
// ─────────────────────────────────────────────────────────────────────────────

export const EXTRACT_PROFILE_NAME = "core__extract_profile" as const;

export const extractProfileContract: ToolContract<
  typeof EXTRACT_PROFILE_NAME,
  ExtractProfileInput,
  ExtractProfileOutput,
  ExtractProfileRedacted
> = {
  name: EXTRACT_PROFILE_NAME,
  description:
    "Sign in with the given credentials, highlight the profile at profile_url and " +
    "extract it as structured data (name, headline, location, about, experience, " +
    "education, skills). Returns null when nothing could be extracted.",
  inputSchema: ExtractProfileInputSchema,
  outputSchema: ExtractProfileOutputSchema,

  redact: (output: ExtractProfileOutput): ExtractProfileRedacted => output,

  allowlist: [
    "name",
    "headline",
    "location",
    "about",
    "experience",
    "education",
    "skills",
  ],
};

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export interface ExtractProfileDeps {
  profileExtraction: ProfileExtractionCapability;
}

/**
 * Create extract-profile implementation with injected capability.
 */
export function createExtractProfileImplementation(
  deps: ExtractProfileDeps
): ToolImplementation<ExtractProfileInput, ExtractProfileOutput> {
  return {
    execute: async (
      input: ExtractProfileInput
    ): Promise<ExtractProfileOutput> => {
      const profile = await deps.profileExtraction.extract({
        email: input.email,
        password: input.password,
        profileUrl: input.profile_url,
      });
      return profile ?? null;
    },
  };
}

/**
 * Stub implementation that throws when no extraction backend is configured.
 * Used as default placeholder in catalog.
 */
export const extractProfileStubImplementation: ToolImplementation<
  ExtractProfileInput,
  ExtractProfileOutput
> = {
  execute: async (): Promise<ExtractProfileOutput> => {
    throw new Error(
      "ProfileExtractionCapability not configured. Provide a profile extraction backend at bootstrap."
    );
  },
};

// ─────────────────────────────────────────────────────────────────────────────
// Bound Tool (contract + stub implementation)
// ─────────────────────────────────────────────────────────────────────────────

export const extractProfileBoundTool: BoundTool<
  typeof EXTRACT_PROFILE_NAME,
  ExtractProfileInput,
  ExtractProfileOutput,
  ExtractProfileRedacted
> = {
  contract: extractProfileContract,
  implementation: extractProfileStubImplementation,
};
