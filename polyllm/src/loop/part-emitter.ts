import type { ChatResponse, ProviderMetadata } from "../types/response.js";
import type { StreamPart } from "../types/stream-part.js";
import { StreamPartType } from "../types/stream-part.js";
import type { ToolCall, ToolResult } from "../types/tool.js";
import type { Logger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import { ToolCallAggregator } from "./tool-call-aggregator.js";

type OpenBlock =
  | { kind: "text"; text: string }
  | { kind: "reasoning"; text: string }
  | { kind: "tool_call"; id: string };

/**
 * Turns one step's events into well-nested stream parts. At most one block
 * is open at a time; a delta of another kind (or another tool call) closes
 * it first. Every method returns the parts to emit, in order.
 */
export class StepPartEmitter {
  readonly toolCalls: ToolCallAggregator;
  private open: OpenBlock | undefined;
  private stepText = "";
  private stepThinking = "";
  private metadataEmitted = false;
  private terminated = false;

  constructor(logger: Logger = silentLogger) {
    this.toolCalls = new ToolCallAggregator(logger);
  }

  /** All text deltas of the step, concatenated. */
  get text(): string {
    return this.stepText;
  }

  get thinking(): string {
    return this.stepThinking;
  }

  get hasOpenBlock(): boolean {
    return this.open !== undefined;
  }

  textDelta(delta: string): StreamPart[] {
    this.stepText += delta;
    const parts: StreamPart[] = [];
    if (this.open?.kind !== "text") {
      parts.push(...this.closeOpenBlock());
      this.open = { kind: "text", text: "" };
      parts.push({ type: StreamPartType.TEXT_START });
    }
    this.open.text += delta;
    parts.push({ type: StreamPartType.TEXT_DELTA, delta });
    return parts;
  }

  reasoningDelta(delta: string): StreamPart[] {
    this.stepThinking += delta;
    const parts: StreamPart[] = [];
    if (this.open?.kind !== "reasoning") {
      parts.push(...this.closeOpenBlock());
      this.open = { kind: "reasoning", text: "" };
      parts.push({ type: StreamPartType.REASONING_START });
    }
    this.open.text += delta;
    parts.push({ type: StreamPartType.REASONING_DELTA, delta });
    return parts;
  }

  toolCallDelta(delta: ToolCall): StreamPart[] {
    const aggregated = this.toolCalls.addDelta(delta);
    const parts: StreamPart[] = [];
    if (this.open?.kind !== "tool_call" || this.open.id !== delta.id) {
      parts.push(...this.closeOpenBlock());
      this.open = { kind: "tool_call", id: delta.id };
      parts.push({ type: StreamPartType.TOOL_CALL_START, toolCall: aggregated });
    }
    parts.push({ type: StreamPartType.TOOL_CALL_DELTA, toolCall: delta });
    return parts;
  }

  private startToolCall(call: ToolCall): StreamPart[] {
    if (this.open?.kind === "tool_call" && this.open.id === call.id) return [];
    const parts = this.closeOpenBlock();
    const aggregated = this.toolCalls.addDelta(call);
    this.open = { kind: "tool_call", id: call.id };
    parts.push({ type: StreamPartType.TOOL_CALL_START, toolCall: aggregated });
    return parts;
  }

  /**
   * Start and end parts for calls that only appeared on the completion,
   * never as deltas.
   */
  completedToolCalls(calls: readonly ToolCall[]): StreamPart[] {
    const parts: StreamPart[] = [];
    for (const call of calls) {
      if (this.toolCalls.has(call.id)) continue;
      parts.push(...this.closeOpenBlock());
      this.toolCalls.addDelta(call);
      parts.push({ type: StreamPartType.TOOL_CALL_START, toolCall: call });
      parts.push({ type: StreamPartType.TOOL_CALL_END, toolCallId: call.id, toolCall: call });
    }
    return parts;
  }

  closeOpenBlock(): StreamPart[] {
    const block = this.open;
    if (!block) return [];
    this.open = undefined;
    switch (block.kind) {
      case "text":
        return [{ type: StreamPartType.TEXT_END, text: block.text }];
      case "reasoning":
        return [{ type: StreamPartType.REASONING_END, text: block.text }];
      case "tool_call": {
        const toolCall = this.toolCalls.get(block.id);
        if (!toolCall) return [];
        return [{ type: StreamPartType.TOOL_CALL_END, toolCallId: block.id, toolCall }];
      }
    }
  }

  /**
   * Close the open block, then emit metadata once if there is any.
   */
  endBlocks(metadata?: ProviderMetadata): StreamPart[] {
    const parts = this.closeOpenBlock();
    if (metadata && !this.metadataEmitted && Object.keys(metadata).length > 0) {
      this.metadataEmitted = true;
      parts.push({ type: StreamPartType.PROVIDER_METADATA, metadata });
    }
    return parts;
  }

  toolResults(results: readonly ToolResult[]): StreamPart[] {
    return results.map((result) => ({ type: StreamPartType.TOOL_RESULT, result }));
  }

  finish(response: ChatResponse): StreamPart[] {
    if (this.terminated) return [];
    const parts = this.endBlocks(response.providerMetadata);
    this.terminated = true;
    parts.push({ type: StreamPartType.FINISH, response });
    return parts;
  }

  fail(error: Error): StreamPart[] {
    if (this.terminated) return [];
    const parts = this.closeOpenBlock();
    this.terminated = true;
    parts.push({ type: StreamPartType.ERROR, error });
    return parts;
  }

  /**
   * Forward a part from a source with a native parts stream, keeping the
   * nesting and metadata rules. Terminal parts are left to the caller.
   */
  forward(part: StreamPart): StreamPart[] {
    switch (part.type) {
      case StreamPartType.TEXT_DELTA:
        return this.textDelta(part.delta);
      case StreamPartType.REASONING_DELTA:
        return this.reasoningDelta(part.delta);
      case StreamPartType.TOOL_CALL_DELTA:
        return this.toolCallDelta(part.toolCall);
      case StreamPartType.TEXT_END:
      case StreamPartType.REASONING_END:
      case StreamPartType.TOOL_CALL_END:
        return this.closeOpenBlock();
      case StreamPartType.PROVIDER_METADATA:
        return this.endBlocks(part.metadata);
      case StreamPartType.TOOL_CALL_START:
        return this.startToolCall(part.toolCall);
      // Starts are implied by the first delta
      case StreamPartType.TEXT_START:
      case StreamPartType.REASONING_START:
      case StreamPartType.TOOL_RESULT:
      case StreamPartType.FINISH:
      case StreamPartType.ERROR:
        return [];
    }
  }

  /**
   * Response for the step: the completion when there was one, with text,
   * thinking and tool calls filled in from the deltas where it lacks them.
   */
  mergeResponse(completion: ChatResponse | undefined): ChatResponse {
    const toolCalls =
      completion && completion.toolCalls.length > 0
        ? completion.toolCalls
        : this.toolCalls.completed();
    return {
      ...completion,
      text: completion?.text ?? (this.stepText || undefined),
      thinking: completion?.thinking ?? (this.stepThinking || undefined),
      toolCalls,
    };
  }
}
