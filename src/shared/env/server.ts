// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@shared/env/server`
 * Purpose: Server-side environment variable validation and type-safe configuration schema using Zod.
 * Scope: Validates process.env for the chat runtime; provides lazy, cached access. Does not check runtime secrets (see invariants.ts).
 * Invariants: All env vars validated on first access; fails fast on invalid env; numeric vars coerced and positive.
 * Side-effects: process.env
 * Notes: SERVICE_NAME for observability; LLM_* for the completion adapter; CHAT_MAX_TURNS caps completions per run.
 * Links: invariants.ts, bootstrap/container.ts
 * @public
 */

import { ZodError, z } from "zod";

export interface EnvValidationMeta {
  code: "INVALID_ENV";
  missing: string[];
  invalid: string[];
}

export class EnvValidationError extends Error {
  readonly meta: EnvValidationMeta;

  constructor(meta: EnvValidationMeta) {
    super(`Invalid server env: ${JSON.stringify(meta)}`);
    this.name = "EnvValidationError";
    this.meta = meta;
  }
}

export function isEnvValidationError(
  error: unknown
): error is EnvValidationError {
  return error instanceof EnvValidationError;
}

const serverSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),

  // Service identity for observability
  SERVICE_NAME: z.string().default("app"),

  // Completion service (OpenAI-compatible /v1/chat/completions)
  LLM_BASE_URL: z.string().url().default("https://api.openai.com"),
  LLM_API_KEY: z.string().min(1).optional(),
  DEFAULT_MODEL: z.string().min(1).default("gpt-4o-mini"),
  LLM_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),

  // Completion requests allowed per chat run
  CHAT_MAX_TURNS: z.coerce.number().int().positive().default(10),

  PINO_LOG_LEVEL: z
    .enum(["trace", "debug", "info", "warn", "error"])
    .default("info"),
});

type ServerEnv = z.infer<typeof serverSchema> & {
  isDev: boolean;
  isTest: boolean;
  isProd: boolean;
};

let ENV: ServerEnv | null = null;

export function serverEnv(): ServerEnv {
  if (ENV === null) {
    try {
      const parsed = serverSchema.parse(process.env);

      ENV = {
        ...parsed,
        isDev: parsed.NODE_ENV === "development",
        isTest: parsed.NODE_ENV === "test",
        isProd: parsed.NODE_ENV === "production",
      };
    } catch (error) {
      if (error instanceof ZodError) {
        const missing = new Set<string>();
        const invalid = new Set<string>();

        for (const issue of error.issues) {
          const key = issue.path[0]?.toString();
          if (!key) continue;

          // Treat all invalid_type as missing (avoids any casting)
          if (issue.code === "invalid_type") {
            missing.add(key);
          } else {
            invalid.add(key);
          }
        }

        throw new EnvValidationError({
          code: "INVALID_ENV",
          missing: [...missing],
          invalid: [...invalid],
        });
      }

      throw error;
    }
  }
  return ENV;
}

export type { ServerEnv };
