// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env`
 * Purpose: Public surface for environment configuration.
 * Scope: Re-exports server env and runtime secret checks. Does not export internal schemas.
 * Invariants: Only re-exports public APIs.
 * Side-effects: process.env
 * @public
 */

export {
  assertRuntimeSecrets,
  isRuntimeSecretError,
  RuntimeSecretError,
} from "./invariants";
export type { ServerEnv } from "./server";
export {
  EnvValidationError,
  isEnvValidationError,
  serverEnv,
} from "./server";
