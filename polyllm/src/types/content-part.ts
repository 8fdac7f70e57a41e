import type { ToolCall, ToolResult } from "./tool.js";

export const ContentKind = {
  TEXT: "text",
  TOOL_USE: "tool_use",
  TOOL_RESULT: "tool_result",
} as const;

export type ContentKind = (typeof ContentKind)[keyof typeof ContentKind];

export interface TextPart {
  kind: typeof ContentKind.TEXT;
  text: string;
}

export interface ToolUsePart {
  kind: typeof ContentKind.TOOL_USE;
  toolCall: ToolCall;
}

export interface ToolResultPart {
  kind: typeof ContentKind.TOOL_RESULT;
  toolResult: ToolResult;
}

export type ContentPart = TextPart | ToolUsePart | ToolResultPart;

export function isTextPart(part: ContentPart): part is TextPart {
  return part.kind === ContentKind.TEXT;
}

export function isToolUsePart(part: ContentPart): part is ToolUsePart {
  return part.kind === ContentKind.TOOL_USE;
}

export function isToolResultPart(part: ContentPart): part is ToolResultPart {
  return part.kind === ContentKind.TOOL_RESULT;
}
