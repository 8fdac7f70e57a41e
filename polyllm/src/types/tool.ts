import type { CancellationToken } from "./cancellation.js";

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface ToolCall {
  readonly id: string;
  readonly kind: "function";
  readonly function: {
    readonly name: string;
    /** JSON-encoded; may be partial while streaming. */
    readonly arguments: string;
  };
}

export namespace ToolCall {
  export function create(id: string, name: string, args = ""): ToolCall {
    return toolCall(id, name, args);
  }
}

export function toolCall(id: string, name: string, args = ""): ToolCall {
  return { id, kind: "function", function: { name, arguments: args } };
}

export interface ToolResult {
  readonly toolCallId: string;
  readonly toolName: string;
  /** JSON-encoded handler output, or `{"error": ...}` when isError. */
  readonly content: string;
  readonly isError: boolean;
}

export interface ToolExecutionContext {
  readonly call: ToolCall;
  readonly cancelToken: CancellationToken;
}

/** Receives the call untouched, arguments still a JSON string. */
export type RawToolHandler = (
  call: ToolCall,
  cancelToken: CancellationToken,
) => unknown;

/** Receives arguments already parsed into an object. */
export interface StructuredToolHandler {
  readonly parseArguments: true;
  execute(args: Record<string, unknown>, context: ToolExecutionContext): unknown;
}

export type ToolHandler = RawToolHandler | StructuredToolHandler;

export type ToolHandlers = Readonly<Record<string, ToolHandler>>;

export function isStructuredToolHandler(
  handler: ToolHandler,
): handler is StructuredToolHandler {
  return typeof handler !== "function";
}
