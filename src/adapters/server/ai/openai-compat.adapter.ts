// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@adapters/server/ai/openai-compat`
 * Purpose: Completion client for any OpenAI-compatible /v1/chat/completions endpoint, with tool calling.
 * Scope: Implements LlmService port; maps core messages to wire format and wire errors to LlmError. Does not retry or orchestrate tool calls.
 * Invariants:
 *   - Never logs prompts, tool arguments or keys; logs only bounded metadata
 *   - Every failure is thrown as LlmError (connection, timeout, rate_limited, model_unavailable, provider_4xx, provider_5xx, aborted, unknown)
 *   - assertRuntimeSecrets() runs before any outbound call
 *   - Response bodies are validated with Zod before use
 * Side-effects: IO (HTTP calls to the completion service)
 * Links: LlmService port, shared/env/invariants.ts
 * @internal
 */

import { z } from "zod";

import type { AssistantMessage, Message, ToolCallRequest } from "@/core";
import {
  type CompletionParams,
  classifyLlmErrorFromStatus,
  LlmError,
  type LlmCompletionResult,
  type LlmService,
} from "@/ports";
import { assertRuntimeSecrets } from "@/shared/env";
import { EVENT_NAMES, type Logger, makeLogger } from "@/shared/observability";

export interface OpenAiCompatConfig {
  /** Base URL without the /v1 suffix */
  readonly baseUrl: string;
  readonly apiKey?: string | undefined;
  readonly defaultModel: string;
  readonly timeoutMs: number;
  readonly nodeEnv: "development" | "test" | "production";
}

// ─────────────────────────────────────────────────────────────────────────────
// Wire schemas
// ─────────────────────────────────────────────────────────────────────────────

const WireToolCallSchema = z.object({
  id: z.string(),
  type: z.literal("function").default("function"),
  function: z.object({
    name: z.string(),
    arguments: z.string(),
  }),
});

const CompletionResponseSchema = z.object({
  id: z.string().optional(),
  model: z.string().optional(),
  choices: z
    .array(
      z.object({
        message: z.object({
          content: z.string().nullish(),
          tool_calls: z.array(WireToolCallSchema).nullish(),
        }),
        finish_reason: z.string().nullish(),
      })
    )
    .min(1),
  usage: z
    .object({
      prompt_tokens: z.number(),
      completion_tokens: z.number(),
      total_tokens: z.number().optional(),
    })
    .optional(),
});

const ErrorBodySchema = z.object({
  error: z.object({
    message: z.string().optional(),
    code: z.string().nullish(),
  }),
});

type WireMessage =
  | { role: "system" | "developer" | "user"; content: string }
  | {
      role: "assistant";
      content: string;
      tool_calls?: ToolCallRequest[];
    }
  | { role: "tool"; content: string; tool_call_id: string; name: string };

function toWireMessage(message: Message): WireMessage {
  switch (message.role) {
    case "assistant":
      return message.toolCalls && message.toolCalls.length > 0
        ? {
            role: "assistant",
            content: message.content,
            tool_calls: [...message.toolCalls],
          }
        : { role: "assistant", content: message.content };
    case "tool":
      return {
        role: "tool",
        content: message.content,
        tool_call_id: message.toolCallId,
        name: message.name,
      };
    default:
      return { role: message.role, content: message.content };
  }
}

/**
 * Extract provider error message/code from a non-2xx body, if it has one.
 */
function parseErrorBody(text: string): { message?: string; code?: string } {
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch {
    return {};
  }
  const parsed = ErrorBodySchema.safeParse(json);
  if (!parsed.success) return {};
  return {
    ...(parsed.data.error.message ? { message: parsed.data.error.message } : {}),
    ...(parsed.data.error.code ? { code: parsed.data.error.code } : {}),
  };
}

export class OpenAiCompatAdapter implements LlmService {
  private readonly log: Logger;

  constructor(
    private readonly config: OpenAiCompatConfig,
    logger?: Logger
  ) {
    this.log = logger ?? makeLogger({ component: "OpenAiCompatAdapter" });
  }

  async completion(params: CompletionParams): Promise<LlmCompletionResult> {
    const model = params.model ?? this.config.defaultModel;

    const requestBody = {
      model,
      messages: params.messages.map(toWireMessage),
      ...(params.tools && params.tools.length > 0
        ? {
            tools: params.tools,
            tool_choice: params.toolChoice ?? "auto",
          }
        : {}),
    };

    // Validate runtime secrets at adapter boundary
    assertRuntimeSecrets({
      NODE_ENV: this.config.nodeEnv,
      LLM_API_KEY: this.config.apiKey,
    });

    const headers: Record<string, string> = {
      "Content-Type": "application/json",
    };
    if (this.config.apiKey) {
      headers.Authorization = `Bearer ${this.config.apiKey}`;
    }

    const timeoutSignal = AbortSignal.timeout(this.config.timeoutMs);
    const signal = params.abortSignal
      ? AbortSignal.any([timeoutSignal, params.abortSignal])
      : timeoutSignal;

    let response: Response;
    try {
      response = await fetch(`${this.config.baseUrl}/v1/chat/completions`, {
        method: "POST",
        headers,
        body: JSON.stringify(requestBody),
        signal,
      });
    } catch (error) {
      throw this.toTransportError(error, params.abortSignal);
    }

    if (!response.ok) {
      const { message, code } = parseErrorBody(await response.text());
      const kind =
        code === "model_not_found"
          ? "model_unavailable"
          : classifyLlmErrorFromStatus(response.status);

      this.log.warn(
        { model, status: response.status, kind },
        EVENT_NAMES.ADAPTER_COMPLETION_ERROR
      );

      throw new LlmError(
        kind === "model_unavailable"
          ? `Model "${model}" is not available`
          : `Completion API error: ${response.status}${message ? ` ${message}` : ""}`,
        kind,
        response.status
      );
    }

    let json: unknown;
    try {
      json = await response.json();
    } catch {
      throw new LlmError("Invalid JSON from completion service", "unknown");
    }

    const parsed = CompletionResponseSchema.safeParse(json);
    if (!parsed.success) {
      throw new LlmError("Invalid response from completion service", "unknown");
    }
    const data = parsed.data;
    const [choice] = data.choices;
    if (!choice) {
      throw new LlmError("Invalid response from completion service", "unknown");
    }

    const toolCalls = choice.message.tool_calls ?? [];
    const message: AssistantMessage =
      toolCalls.length > 0
        ? {
            role: "assistant",
            content: choice.message.content ?? "",
            toolCalls,
          }
        : { role: "assistant", content: choice.message.content ?? "" };

    const result: LlmCompletionResult = {
      message,
      resolvedModel: data.model ?? model,
    };

    if (choice.finish_reason) {
      result.finishReason = choice.finish_reason;
    }

    if (data.usage) {
      const promptTokens = data.usage.prompt_tokens;
      const completionTokens = data.usage.completion_tokens;
      result.usage = {
        promptTokens,
        completionTokens,
        totalTokens: data.usage.total_tokens ?? promptTokens + completionTokens,
      };
    }

    // Sanitized adapter log (no content, bounded fields only)
    this.log.info(
      {
        model: result.resolvedModel,
        finishReason: result.finishReason,
        toolCallCount: toolCalls.length,
        tokensUsed: result.usage?.totalTokens,
        contentLength: message.content.length,
      },
      EVENT_NAMES.ADAPTER_COMPLETION_RESULT
    );

    return result;
  }

  private toTransportError(
    error: unknown,
    callerSignal: AbortSignal | undefined
  ): LlmError {
    if (callerSignal?.aborted) {
      return new LlmError("Completion request aborted", "aborted");
    }
    if (error instanceof Error) {
      if (error.name === "TimeoutError" || error.name === "AbortError") {
        return new LlmError("Completion request timed out", "timeout", 408);
      }
      return new LlmError(
        `Completion service network error: ${error.message}`,
        "connection"
      );
    }
    return new LlmError("Completion service unreachable", "connection");
  }
}
