// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/invariants`
 * Purpose: Fail-fast validation of runtime secrets beyond the Zod schema.
 * Scope: Runtime secret checks at adapter boundaries. Does NOT run at module init.
 * Invariants: Throws RuntimeSecretError on missing secrets; memoizes production only.
 * Side-effects: none
 * Notes: Call assertRuntimeSecrets() before outbound completion calls, never from module scope.
 * Links: src/shared/env/server.ts, src/adapters/server/ai/openai-compat.adapter.ts
 * @public
 */

/**
 * Minimal env shape needed here.
 * Kept inline to avoid circular imports with server.ts
 */
interface SecretEnv {
  NODE_ENV: "development" | "test" | "production";
  LLM_API_KEY?: string | undefined;
}

/**
 * Only memoizes in production to prevent test false-passes.
 */
let _prodSecretsValidated = false;

/**
 * Asserts runtime secrets are present when required.
 * Outside production a keyless local endpoint is allowed.
 *
 * @throws RuntimeSecretError if runtime secrets are missing
 */
export function assertRuntimeSecrets(env: SecretEnv): void {
  if (env.NODE_ENV !== "production") return;
  if (_prodSecretsValidated) return;

  if (!env.LLM_API_KEY || env.LLM_API_KEY.trim() === "") {
    throw new RuntimeSecretError(
      "NODE_ENV=production requires non-empty LLM_API_KEY"
    );
  }

  _prodSecretsValidated = true;
}

/**
 * Typed error for runtime secret validation failures.
 * Allows consumers to detect secret issues without string matching.
 */
export class RuntimeSecretError extends Error {
  readonly code = "MISSING_RUNTIME_SECRET" as const;

  constructor(message: string) {
    super(message);
    this.name = "RuntimeSecretError";
  }
}

export function isRuntimeSecretError(
  error: unknown
): error is RuntimeSecretError {
  return error instanceof RuntimeSecretError;
}
