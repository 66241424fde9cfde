// SPDX-License-Identifier: LicenseRef-PolyForm-Shield-1.0.0
// SPDX-FileCopyrightText: 2025 Cogni-DAO

/**
 * Module: `@toolchat/ai-core/tooling/tool-runner`
 * Purpose: Tool executor — dispatches one model tool call to its bound tool with AiEvent emission and payload redaction.
 * Scope: Sole owner of toolCallId generation; executes tools via injected tool source. Does not import from src/ or perform logging.
 * Invariants:
 *   - TOOLCALL_ID_STABLE: Same toolCallId across start→result
 *   - TOOLRUNNER_NEVER_THROWS: Every failure path is returned as {ok:false, errorCode, safeMessage}
 *   - TOOLRUNNER_RESULT_SHAPE: Returns {ok:true, value} | {ok:false, errorCode, safeMessage}
 *   - TOOLRUNNER_PIPELINE_ORDER: tool lookup → decode JSON args → validate args → execute → validate result → redact → emit → return
 *   - Error messages from decoder, validator and capability are surfaced verbatim
 * Side-effects: none (AiEvent emission via injected callback is caller's responsibility)
 * Links: ports/tool-source.port.ts, @toolchat/ai-tools
 * @public
 */

import type { ToolCallResultEvent } from "../events/ai-events";
import type { ToolSourcePort } from "./ports/tool-source.port";
import type {
  EmitAiEvent,
  ToolErrorCode,
  ToolExecResult,
  ToolOutput,
} from "./types";

/** Charset for provider-compatible tool call IDs */
const TOOL_ID_CHARS =
  "ABCDEFGHIJKLMNOPQRSTUVWXYZabcdefghijklmnopqrstuvwxyz0123456789";

/** Generate 9-char alphanumeric tool call ID (provider-compatible) */
function generateToolCallId(): string {
  const bytes = new Uint8Array(9);
  crypto.getRandomValues(bytes);
  let id = "";
  for (const b of bytes) id += TOOL_ID_CHARS[b % TOOL_ID_CHARS.length];
  return id;
}

export interface ToolExecOptions {
  /** Model-provided tool call ID (use this if available, else generate one) */
  readonly modelToolCallId?: string;
}

/**
 * Create a tool runner over the given tool source.
 *
 * @param source - Closed registry providing getBoundTool() lookup
 * @param emit - Callback to emit AiEvents
 * @returns Tool runner with exec method
 */
export function createToolRunner(source: ToolSourcePort, emit: EmitAiEvent) {
  /**
   * Execute a tool by name with the model's JSON-encoded arguments.
   * Follows fixed pipeline per TOOLRUNNER_PIPELINE_ORDER.
   */
  async function exec(
    toolName: string,
    rawArguments: string,
    options?: ToolExecOptions
  ): Promise<ToolExecResult<ToolOutput>> {
    const toolCallId = options?.modelToolCallId ?? generateToolCallId();

    const fail = (
      errorCode: ToolErrorCode,
      safeMessage: string,
      eventMessage: string = safeMessage
    ): ToolExecResult<ToolOutput> => {
      const errorEvent: ToolCallResultEvent = {
        type: "tool_call_result",
        toolCallId,
        result: { error: eventMessage },
        isError: true,
      };
      emit(errorEvent);
      return { ok: false, errorCode, safeMessage };
    };

    // 1. Lookup in the closed registry
    const boundTool = source.getBoundTool(toolName);
    if (!boundTool) {
      return fail("unavailable", `Unknown tool: ${toolName}`);
    }

    // 2. Decode arguments
    let decodedArgs: unknown;
    try {
      decodedArgs = JSON.parse(rawArguments);
    } catch (err) {
      return fail(
        "invalid_json",
        err instanceof Error ? err.message : "Invalid tool arguments"
      );
    }

    // 3. Validate args
    let validatedInput: unknown;
    try {
      validatedInput = boundTool.validateInput(decodedArgs);
    } catch (err) {
      return fail(
        "validation",
        err instanceof Error ? err.message : "Invalid tool arguments"
      );
    }

    emit({
      type: "tool_call_start",
      toolCallId,
      toolName,
      args: validatedInput,
    });

    // 4. Execute
    let rawOutput: unknown;
    try {
      rawOutput = await boundTool.exec(validatedInput);
    } catch (err) {
      return fail(
        "execution",
        err instanceof Error ? err.message : "Tool execution failed"
      );
    }

    // 5. Validate result
    let validatedOutput: unknown;
    try {
      validatedOutput = boundTool.validateOutput(rawOutput);
    } catch (err) {
      return fail(
        "output_validation",
        err instanceof Error ? err.message : "Invalid tool output"
      );
    }

    // 6. Redact
    let redactedOutput: ToolOutput;
    try {
      redactedOutput = boundTool.redact(validatedOutput);
    } catch (err) {
      return fail(
        "redaction_failed",
        err instanceof Error ? err.message : "Redaction failed",
        "Internal error processing tool result"
      );
    }

    emit({
      type: "tool_call_result",
      toolCallId,
      result: redactedOutput,
    });

    return { ok: true, value: redactedOutput };
  }

  return { exec };
}

export type ToolRunner = ReturnType<typeof createToolRunner>;
