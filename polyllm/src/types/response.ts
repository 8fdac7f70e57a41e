import type { JsonValue } from "./json.js";
import type { Message } from "./message.js";
import type { ToolCall } from "./tool.js";

export type FinishReason =
  | "stop"
  | "length"
  | "tool_calls"
  | "content_filter"
  | "error"
  | "other";

export interface Usage {
  inputTokens: number;
  outputTokens: number;
  totalTokens: number;
  reasoningTokens?: number;
}

export namespace Usage {
  /**
   * Add two Usage objects together, summing all token counts.
   */
  export function add(a: Usage, b: Usage): Usage {
    return addUsage(a, b);
  }
}

export type ProviderMetadata = Readonly<Record<string, JsonValue>>;

export interface ChatResponse {
  text?: string;
  /** Raw reasoning text, when the model exposes it. */
  thinking?: string;
  toolCalls: ToolCall[];
  usage?: Usage;
  finishReason?: FinishReason;
  providerMetadata?: ProviderMetadata;
  /**
   * Present for vendors that require verbatim replay of the assistant turn
   * (signed reasoning blocks, encrypted content). Persisted as-is by the loop.
   */
  assistantMessage?: Message;
}

export namespace ChatResponse {
  /**
   * Final text of the response, empty when the model produced none.
   */
  export function text(response: ChatResponse): string {
    return response.text ?? "";
  }

  export function hasToolCalls(response: ChatResponse): boolean {
    return response.toolCalls.length > 0;
  }
}

export function addUsage(a: Usage, b: Usage): Usage {
  return {
    inputTokens: a.inputTokens + b.inputTokens,
    outputTokens: a.outputTokens + b.outputTokens,
    totalTokens: a.totalTokens + b.totalTokens,
    reasoningTokens:
      a.reasoningTokens !== undefined || b.reasoningTokens !== undefined
        ? (a.reasoningTokens ?? 0) + (b.reasoningTokens ?? 0)
        : undefined,
  };
}

export function sumUsage(usages: ReadonlyArray<Usage | undefined>): Usage | undefined {
  let total: Usage | undefined;
  for (const usage of usages) {
    if (!usage) continue;
    total = total ? addUsage(total, usage) : usage;
  }
  return total;
}
