import type { ChatResponse, ProviderMetadata } from "./response.js";
import type { ToolCall, ToolResult } from "./tool.js";

/** Caller-facing, block-structured view of a step. */
export const StreamPartType = {
  TEXT_START: "text_start",
  TEXT_DELTA: "text_delta",
  TEXT_END: "text_end",
  REASONING_START: "reasoning_start",
  REASONING_DELTA: "reasoning_delta",
  REASONING_END: "reasoning_end",
  TOOL_CALL_START: "tool_call_start",
  TOOL_CALL_DELTA: "tool_call_delta",
  TOOL_CALL_END: "tool_call_end",
  TOOL_RESULT: "tool_result",
  PROVIDER_METADATA: "provider_metadata",
  FINISH: "finish",
  ERROR: "error",
} as const;

export type StreamPartType =
  (typeof StreamPartType)[keyof typeof StreamPartType];

export interface TextStartPart {
  type: typeof StreamPartType.TEXT_START;
}

export interface TextDeltaPart {
  type: typeof StreamPartType.TEXT_DELTA;
  delta: string;
}

export interface TextEndPart {
  type: typeof StreamPartType.TEXT_END;
  text: string;
}

export interface ReasoningStartPart {
  type: typeof StreamPartType.REASONING_START;
}

export interface ReasoningDeltaPart {
  type: typeof StreamPartType.REASONING_DELTA;
  delta: string;
}

export interface ReasoningEndPart {
  type: typeof StreamPartType.REASONING_END;
  text: string;
}

export interface ToolCallStartPart {
  type: typeof StreamPartType.TOOL_CALL_START;
  toolCall: ToolCall;
}

export interface ToolCallDeltaPart {
  type: typeof StreamPartType.TOOL_CALL_DELTA;
  toolCall: ToolCall;
}

export interface ToolCallEndPart {
  type: typeof StreamPartType.TOOL_CALL_END;
  toolCallId: string;
  /** The call as aggregated so far. */
  toolCall: ToolCall;
}

export interface ToolResultStreamPart {
  type: typeof StreamPartType.TOOL_RESULT;
  result: ToolResult;
}

export interface ProviderMetadataPart {
  type: typeof StreamPartType.PROVIDER_METADATA;
  metadata: ProviderMetadata;
}

export interface FinishPart {
  type: typeof StreamPartType.FINISH;
  response: ChatResponse;
}

export interface ErrorPart {
  type: typeof StreamPartType.ERROR;
  error: Error;
}

export type StreamPart =
  | TextStartPart
  | TextDeltaPart
  | TextEndPart
  | ReasoningStartPart
  | ReasoningDeltaPart
  | ReasoningEndPart
  | ToolCallStartPart
  | ToolCallDeltaPart
  | ToolCallEndPart
  | ToolResultStreamPart
  | ProviderMetadataPart
  | FinishPart
  | ErrorPart;

export function isTerminalPart(part: StreamPart): part is FinishPart | ErrorPart {
  return part.type === StreamPartType.FINISH || part.type === StreamPartType.ERROR;
}
