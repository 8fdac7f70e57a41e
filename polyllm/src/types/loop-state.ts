import type { Message } from "./message.js";
import type { ChatResponse } from "./response.js";
import type { ToolCall, ToolResult } from "./tool.js";

export interface LoopState {
  readonly messages: readonly Message[];
  readonly pendingToolCalls: readonly ToolCall[];
  readonly toolCallsNeedingApproval: readonly ToolCall[];
  readonly stepIndex: number;
}

/** Trace of one completed round trip to the event source. */
export interface ToolLoopStep {
  readonly stepIndex: number;
  readonly response: ChatResponse;
  readonly toolCalls: readonly ToolCall[];
  readonly toolResults: readonly ToolResult[];
}

/**
 * Snapshot handed to the caller when a step needs approval. `messages`
 * already ends with the assistant tool-use message; no results follow it.
 */
export interface ToolLoopBlockedState extends LoopState {
  readonly response: ChatResponse;
  readonly steps: readonly ToolLoopStep[];
}
