import type { CancellationToken } from "../types/cancellation.js";
import type { ToolCall, ToolHandler, ToolHandlers, ToolResult } from "../types/tool.js";
import { isStructuredToolHandler } from "../types/tool.js";
import type { JsonObject } from "../types/json.js";
import { isJsonObject } from "../types/json.js";
import { CancelledError, errorMessage } from "../types/errors.js";
import { neverCancelled } from "../utils/cancellation.js";
import type { ToolExecutionMode } from "../utils/config.js";
import { safeJsonParse } from "../utils/json.js";
import type { Logger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";

export interface ToolExecutionOptions {
  cancelToken?: CancellationToken;
  /** How calls within one step run. Defaults to "parallel". */
  mode?: ToolExecutionMode;
  /** Extra attempts for a handler that throws. Defaults to 0. */
  maxRetries?: number;
  logger?: Logger;
}

export type ParsedToolArguments =
  | { success: true; value: JsonObject }
  | { success: false; error: string };

export function parseToolArguments(call: ToolCall): ParsedToolArguments {
  const raw = call.function.arguments.trim();
  if (raw === "") {
    return { success: true, value: {} };
  }
  const parsed = safeJsonParse(raw);
  if (!parsed.success) {
    return {
      success: false,
      error: `Invalid JSON arguments for tool "${call.function.name}": ${parsed.error.message}`,
    };
  }
  if (!isJsonObject(parsed.value)) {
    return {
      success: false,
      error: `Arguments for tool "${call.function.name}" must be a JSON object`,
    };
  }
  return { success: true, value: parsed.value };
}

/**
 * Encode handler output as the JSON string stored in a ToolResult.
 * Strings pass through untouched.
 */
export function stringifyToolOutput(output: unknown): string {
  if (output === undefined || output === null) return "null";
  if (typeof output === "string") return output;
  if (typeof output === "number" || typeof output === "boolean") {
    return String(output);
  }
  let encoded: string | undefined;
  try {
    encoded = JSON.stringify(output);
  } catch {
    // BigInt and circular values have no JSON form
    encoded = undefined;
  }
  return encoded ?? String(output);
}

export function toolErrorResult(call: ToolCall, message: string): ToolResult {
  return {
    toolCallId: call.id,
    toolName: call.function.name,
    content: JSON.stringify({ error: message }),
    isError: true,
  };
}

function findHandler(handlers: ToolHandlers, name: string): ToolHandler | undefined {
  return Object.hasOwn(handlers, name) ? handlers[name] : undefined;
}

/**
 * Run one call. Handler failures come back as error results; only
 * cancellation throws.
 */
export async function executeToolCall(
  call: ToolCall,
  handlers: ToolHandlers,
  options: ToolExecutionOptions = {},
): Promise<ToolResult> {
  const cancelToken = options.cancelToken ?? neverCancelled;
  const logger = options.logger ?? silentLogger;
  const maxRetries = options.maxRetries ?? 0;
  const name = call.function.name;

  cancelToken.throwIfCancelled();

  const handler = findHandler(handlers, name);
  if (!handler) {
    logger.warn("No handler registered for tool", { tool: name, toolCallId: call.id });
    return toolErrorResult(call, `Unknown function: ${name}`);
  }

  let invoke: () => unknown;
  if (isStructuredToolHandler(handler)) {
    const parsed = parseToolArguments(call);
    if (!parsed.success) {
      logger.warn("Tool arguments could not be parsed", { tool: name, toolCallId: call.id });
      return toolErrorResult(call, parsed.error);
    }
    invoke = () => handler.execute(parsed.value, { call, cancelToken });
  } else {
    invoke = () => handler(call, cancelToken);
  }

  let output: unknown;
  for (let attempt = 0; ; attempt++) {
    try {
      output = await invoke();
      break;
    } catch (error) {
      if (cancelToken.isCancelled) {
        throw error instanceof CancelledError ? error : new CancelledError(cancelToken.reason);
      }
      if (attempt < maxRetries) {
        logger.debug("Retrying tool handler", { tool: name, toolCallId: call.id, attempt: attempt + 1 });
        continue;
      }
      logger.warn("Tool handler failed", { tool: name, toolCallId: call.id, error });
      return toolErrorResult(call, errorMessage(error));
    }
  }

  return {
    toolCallId: call.id,
    toolName: name,
    content: stringifyToolOutput(output),
    isError: false,
  };
}

/**
 * Run every call of a step. Results come back in call order whatever
 * order the handlers finish in.
 */
export async function executeToolCalls(
  calls: readonly ToolCall[],
  handlers: ToolHandlers,
  options: ToolExecutionOptions = {},
): Promise<ToolResult[]> {
  if (options.mode === "sequential") {
    const results: ToolResult[] = [];
    for (const call of calls) {
      results.push(await executeToolCall(call, handlers, options));
    }
    return results;
  }
  return Promise.all(calls.map((call) => executeToolCall(call, handlers, options)));
}
