import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { z } from "zod";
import type { JsonValue } from "../types/json.js";
import type { ToolLoopBlockedState, ToolLoopStep } from "../types/loop-state.js";
import type { Message } from "../types/message.js";
import { extensionsToEntries } from "../types/message.js";
import type { ChatResponse } from "../types/response.js";
import { Role } from "../types/role.js";
import { ConfigurationError } from "../types/errors.js";
import { safeJsonParse } from "../utils/json.js";

export const CHECKPOINT_VERSION = 1;

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ]),
);

const ToolCallSchema = z.object({
  id: z.string(),
  kind: z.literal("function"),
  function: z.object({ name: z.string(), arguments: z.string() }),
});

const ToolResultSchema = z.object({
  toolCallId: z.string(),
  toolName: z.string(),
  content: z.string(),
  isError: z.boolean(),
});

const ContentPartSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("text"), text: z.string() }),
  z.object({ kind: z.literal("tool_use"), toolCall: ToolCallSchema }),
  z.object({ kind: z.literal("tool_result"), toolResult: ToolResultSchema }),
]);

const MessageSchema = z.object({
  role: z.enum([Role.SYSTEM, Role.USER, Role.ASSISTANT]),
  content: z.array(ContentPartSchema),
  name: z.string().optional(),
  extensions: z
    .array(z.tuple([z.string(), JsonValueSchema]))
    .optional()
    .transform((entries) => (entries ? new Map(entries) : undefined)),
});

const UsageSchema = z.object({
  inputTokens: z.number(),
  outputTokens: z.number(),
  totalTokens: z.number(),
  reasoningTokens: z.number().optional(),
});

const ChatResponseSchema = z.object({
  text: z.string().optional(),
  thinking: z.string().optional(),
  toolCalls: z.array(ToolCallSchema),
  usage: UsageSchema.optional(),
  finishReason: z
    .enum(["stop", "length", "tool_calls", "content_filter", "error", "other"])
    .optional(),
  providerMetadata: z.record(JsonValueSchema).optional(),
  assistantMessage: MessageSchema.optional(),
});

const StepSchema = z.object({
  stepIndex: z.number().int().min(0),
  response: ChatResponseSchema,
  toolCalls: z.array(ToolCallSchema),
  toolResults: z.array(ToolResultSchema),
});

const CheckpointSchema = z.object({
  version: z.literal(CHECKPOINT_VERSION),
  savedAt: z.string(),
  state: z.object({
    messages: z.array(MessageSchema),
    pendingToolCalls: z.array(ToolCallSchema),
    toolCallsNeedingApproval: z.array(ToolCallSchema),
    stepIndex: z.number().int().min(0),
    response: ChatResponseSchema,
    steps: z.array(StepSchema),
  }),
});

function encodeMessage(message: Message): Record<string, unknown> {
  return {
    role: message.role,
    content: message.content,
    name: message.name,
    extensions: message.extensions ? extensionsToEntries(message.extensions) : undefined,
  };
}

function encodeResponse(response: ChatResponse): Record<string, unknown> {
  return {
    ...response,
    assistantMessage: response.assistantMessage
      ? encodeMessage(response.assistantMessage)
      : undefined,
  };
}

function encodeStep(step: ToolLoopStep): Record<string, unknown> {
  return { ...step, response: encodeResponse(step.response) };
}

/**
 * Encode a blocked loop as JSON. Provider extensions are stored as
 * ordered entry lists so they replay in the original order.
 */
export function serializeBlockedState(
  state: ToolLoopBlockedState,
  savedAt: Date = new Date(),
): string {
  const checkpoint = {
    version: CHECKPOINT_VERSION,
    savedAt: savedAt.toISOString(),
    state: {
      messages: state.messages.map(encodeMessage),
      pendingToolCalls: state.pendingToolCalls,
      toolCallsNeedingApproval: state.toolCallsNeedingApproval,
      stepIndex: state.stepIndex,
      response: encodeResponse(state.response),
      steps: state.steps.map(encodeStep),
    },
  };
  return JSON.stringify(checkpoint, null, 2);
}

export function deserializeBlockedState(json: string): ToolLoopBlockedState {
  const parsed = safeJsonParse(json);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid checkpoint data: ${parsed.error.message}`);
  }
  const result = CheckpointSchema.safeParse(parsed.value);
  if (!result.success) {
    const issues = result.error.issues.map(
      (issue) => `${issue.path.join(".")}: ${issue.message}`,
    );
    throw new ConfigurationError("Invalid checkpoint data", issues);
  }
  return result.data.state;
}

/**
 * Save a blocked loop as JSON to the filesystem.
 */
export async function saveBlockedState(
  state: ToolLoopBlockedState,
  path: string,
): Promise<void> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, serializeBlockedState(state), "utf-8");
}

/**
 * Load a blocked loop saved with saveBlockedState.
 */
export async function loadBlockedState(path: string): Promise<ToolLoopBlockedState> {
  const content = await readFile(path, "utf-8");
  return deserializeBlockedState(content);
}
