// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@toolchat/ai-tools/capabilities/profile`
 * Purpose: Profile extraction capability interface for AI tool execution.
 * Scope: Defines ProfileExtractionCapability. Does NOT implement scraping or sign-in.
 * Invariants:
 *   - STRUCTURED_RESULTS: Returns a typed profile, or null when the page yields nothing
 *   - Credentials are passed per call and never retained by the tool layer
 * Side-effects: none (interface only)
 * Links: tools/extract-profile.ts
 * @public
 */

export interface ExtractProfileParams {
  /** Account email used to sign in to the profile site */
  email: string;
  password: string;
  /** Public URL of the profile to extract */
  profileUrl: string;
}

export interface ProfileExperience {
  title: string;
  company: string;
  dateRange?: string;
  location?: string;
  description?: string;
}

export interface ProfileEducation {
  school: string;
  degree?: string;
  dateRange?: string;
}

/**
 * Structured profile as returned by the extraction backend.
 */
export interface ExtractedProfile {
  name: string;
  headline?: string;
  location?: string;
  about?: string;
  experience: ProfileExperience[];
  education: ProfileEducation[];
  skills: string[];
}

/**
 * Profile extraction capability for AI tools.
 * The concrete scraper is supplied by the composition root.
 */
export interface ProfileExtractionCapability {
  /**
   * Sign in and extract the profile at `profileUrl`.
   *
   * @returns Structured profile, or null if nothing could be extracted
   * @throws If sign-in or extraction fails
   */
  extract(params: ExtractProfileParams): Promise<ExtractedProfile | null>;
}
