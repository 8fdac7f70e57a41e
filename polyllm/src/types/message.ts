import type { Role } from "./role.js";
import { Role as RoleEnum } from "./role.js";
import type { ContentPart } from "./content-part.js";
import {
  ContentKind,
  isTextPart,
  isToolResultPart,
  isToolUsePart,
} from "./content-part.js";
import type { JsonValue } from "./json.js";
import type { ToolCall, ToolResult } from "./tool.js";

/**
 * Vendor continuity payload (signed reasoning blocks, response ids and the
 * like). Insertion-ordered and never inspected by the loop: it is copied
 * from one step to the next exactly as the provider produced it.
 */
export type ProviderExtensions = ReadonlyMap<string, JsonValue>;

export interface Message {
  role: Role;
  content: ContentPart[];
  name?: string;
  extensions?: ProviderExtensions;
}

export namespace Message {
  /**
   * Create a system message with the given text.
   */
  export function system(text: string): Message {
    return systemMessage(text);
  }

  /**
   * Create a user message with the given text.
   */
  export function user(text: string): Message {
    return userMessage(text);
  }

  /**
   * Create an assistant message with the given text.
   */
  export function assistant(text: string): Message {
    return assistantMessage(text);
  }

  /**
   * Create the assistant message that requests the given tool calls.
   */
  export function toolUse(calls: readonly ToolCall[], text?: string): Message {
    return toolUseMessage(calls, text);
  }

  /**
   * Create one message carrying all tool results of a step.
   */
  export function toolResults(results: readonly ToolResult[]): Message {
    return toolResultMessage(results);
  }

  /**
   * Extract all text content from a message.
   */
  export function text(message: Message): string {
    return messageText(message);
  }
}

export function systemMessage(text: string): Message {
  return {
    role: RoleEnum.SYSTEM,
    content: [{ kind: ContentKind.TEXT, text }],
  };
}

export function userMessage(text: string): Message {
  return {
    role: RoleEnum.USER,
    content: [{ kind: ContentKind.TEXT, text }],
  };
}

export function assistantMessage(text: string): Message {
  return {
    role: RoleEnum.ASSISTANT,
    content: [{ kind: ContentKind.TEXT, text }],
  };
}

export function toolUseMessage(
  calls: readonly ToolCall[],
  text?: string,
): Message {
  const content: ContentPart[] = [];
  if (text) {
    content.push({ kind: ContentKind.TEXT, text });
  }
  for (const toolCall of calls) {
    content.push({ kind: ContentKind.TOOL_USE, toolCall });
  }
  return { role: RoleEnum.ASSISTANT, content };
}

// Tool results travel in a user-role message; the adapter maps it to
// whatever the vendor expects.
export function toolResultMessage(results: readonly ToolResult[]): Message {
  return {
    role: RoleEnum.USER,
    content: results.map((toolResult) => ({
      kind: ContentKind.TOOL_RESULT,
      toolResult,
    })),
  };
}

export function messageText(message: Message): string {
  return message.content
    .filter(isTextPart)
    .map((part) => part.text)
    .join("");
}

export function messageToolCalls(message: Message): ToolCall[] {
  return message.content.filter(isToolUsePart).map((part) => part.toolCall);
}

export function messageToolResults(message: Message): ToolResult[] {
  return message.content
    .filter(isToolResultPart)
    .map((part) => part.toolResult);
}

/**
 * Convert extensions to a JSON-friendly entry list, keeping order.
 */
export function extensionsToEntries(
  extensions: ProviderExtensions,
): Array<[string, JsonValue]> {
  return [...extensions.entries()];
}

export function extensionsFromEntries(
  entries: ReadonlyArray<readonly [string, JsonValue]>,
): ProviderExtensions {
  return new Map(entries);
}
