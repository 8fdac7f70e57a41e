import type { ChatResponse } from "./response.js";
import type { ToolCall } from "./tool.js";

/** Low-level events produced by an event source for one call. */
export const StreamEventType = {
  TEXT_DELTA: "text_delta",
  THINKING_DELTA: "thinking_delta",
  TOOL_CALL_DELTA: "tool_call_delta",
  COMPLETION: "completion",
  ERROR: "error",
} as const;

export type StreamEventType =
  (typeof StreamEventType)[keyof typeof StreamEventType];

export interface TextDeltaEvent {
  type: typeof StreamEventType.TEXT_DELTA;
  text: string;
}

export interface ThinkingDeltaEvent {
  type: typeof StreamEventType.THINKING_DELTA;
  text: string;
}

/**
 * One fragment of a tool call. Later fragments for the same id may carry
 * an empty name and only an argument continuation.
 */
export interface ToolCallDeltaEvent {
  type: typeof StreamEventType.TOOL_CALL_DELTA;
  toolCall: ToolCall;
}

export interface CompletionEvent {
  type: typeof StreamEventType.COMPLETION;
  response: ChatResponse;
}

export interface ErrorEvent {
  type: typeof StreamEventType.ERROR;
  error: Error;
}

export type StreamEvent =
  | TextDeltaEvent
  | ThinkingDeltaEvent
  | ToolCallDeltaEvent
  | CompletionEvent
  | ErrorEvent;
