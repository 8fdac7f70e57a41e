import type { CancellationToken } from "../types/cancellation.js";
import type { EventSource } from "../types/event-source.js";
import type { Message } from "../types/message.js";
import { systemMessage } from "../types/message.js";
import type { OutputSpec } from "../types/output-spec.js";
import type { ChatResponse } from "../types/response.js";
import type { ToolDefinition } from "../types/tool.js";
import { ProviderError, ResponseFormatError, SDKError } from "../types/errors.js";
import {
  decodeStructuredOutput,
  extractStructuredOutput,
  requireOutputText,
} from "../utils/structured-output.js";
import { validateToolDefinitions } from "../utils/validate-tools.js";
import type { ToolLoopOptions, ToolLoopResult } from "../loop/controller.js";
import { parseToolArguments } from "../loop/tool-executor.js";
import { runToolLoop } from "./tool-loop.js";

export const DEFAULT_OBJECT_TOOL_NAME = "return_object";
export const DEFAULT_OBJECT_TOOL_DESCRIPTION =
  "Return the result as a JSON object that matches the schema.";

export interface GenerateObjectOptions<T> {
  source: EventSource;
  messages: readonly Message[];
  output: OutputSpec<T>;
  /** Name of the tool the model is asked to call with the object. */
  toolName?: string;
  toolDescription?: string;
  /** Offered alongside the object tool. */
  tools?: ToolDefinition[];
  cancelToken?: CancellationToken;
  providerOptions?: Record<string, Record<string, unknown>>;
}

export interface GenerateObjectResult<T> {
  object: T;
  /** The JSON the object was decoded from: tool arguments or response text. */
  text: string;
  response: ChatResponse;
}

/**
 * Single call to the source. The model is asked to return the object as
 * the arguments of a dedicated tool call; when no such call comes back the
 * answer is extracted from the response text instead.
 */
export async function generateObject<T>(
  options: GenerateObjectOptions<T>,
): Promise<GenerateObjectResult<T>> {
  const { source, output } = options;
  const toolName = options.toolName ?? DEFAULT_OBJECT_TOOL_NAME;
  const objectTool: ToolDefinition = {
    name: toolName,
    description: options.toolDescription ?? DEFAULT_OBJECT_TOOL_DESCRIPTION,
    parameters: output.jsonSchema,
  };
  validateToolDefinitions([objectTool, ...(options.tools ?? [])]);
  options.cancelToken?.throwIfCancelled();

  let response: ChatResponse;
  try {
    response = await source.complete({
      messages: [
        systemMessage(
          `You must call the tool "${toolName}" exactly once and only provide the JSON object via tool arguments.`,
        ),
        ...options.messages,
      ],
      tools: [objectTool, ...(options.tools ?? [])],
      cancelToken: options.cancelToken,
      providerOptions: options.providerOptions,
    });
  } catch (error) {
    if (error instanceof SDKError) throw error;
    throw new ProviderError(source.name, options.messages, { cause: error });
  }

  const objectCall = response.toolCalls.find((call) => call.function.name === toolName);
  if (objectCall) {
    const text = objectCall.function.arguments;
    const parsed = parseToolArguments(objectCall);
    if (!parsed.success) {
      throw new ResponseFormatError(parsed.error, text);
    }
    return { object: decodeStructuredOutput(parsed.value, output, text), text, response };
  }

  const text = requireOutputText(response.text);
  return { object: extractStructuredOutput(text, output), text, response };
}

export interface ToolLoopObjectOptions<T> extends ToolLoopOptions {
  output: OutputSpec<T>;
}

export interface ToolLoopObjectResult<T> extends ToolLoopResult {
  object: T;
}

/**
 * Let the model use tools first, then extract the structured answer from
 * the final step's text.
 */
export async function runToolLoopObject<T>(
  options: ToolLoopObjectOptions<T>,
): Promise<ToolLoopObjectResult<T>> {
  const { output, ...loopOptions } = options;
  const result = await runToolLoop(loopOptions);
  const text = requireOutputText(result.text);
  return { ...result, object: extractStructuredOutput(text, output) };
}
