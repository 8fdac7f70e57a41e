import type { Message } from "./message.js";
import type { ToolLoopBlockedState, ToolLoopStep } from "./loop-state.js";

export interface SDKErrorOptions {
  cause?: unknown;
}

export class SDKError extends Error {
  constructor(message: string, options?: SDKErrorOptions) {
    super(message, options);
    this.name = "SDKError";
  }
}

export class InvalidRequestError extends SDKError {
  constructor(message: string, options?: SDKErrorOptions) {
    super(message, options);
    this.name = "InvalidRequestError";
  }
}

export class MaxStepsExceededError extends InvalidRequestError {
  readonly maxSteps: number;
  /** History accumulated before the loop gave up. */
  readonly messages: readonly Message[];
  readonly steps: readonly ToolLoopStep[];

  constructor(
    maxSteps: number,
    messages: readonly Message[],
    steps: readonly ToolLoopStep[],
  ) {
    super(
      `Tool loop exceeded maxSteps (${maxSteps}). The model kept requesting tools and did not produce a final response.`,
    );
    this.name = "MaxStepsExceededError";
    this.maxSteps = maxSteps;
    this.messages = messages;
    this.steps = steps;
  }
}

export class ToolApprovalRequiredError extends SDKError {
  readonly state: ToolLoopBlockedState;

  constructor(state: ToolLoopBlockedState) {
    const names = state.toolCallsNeedingApproval
      .map((call) => call.function.name)
      .join(", ");
    super(`Tool approval required: ${names}`);
    this.name = "ToolApprovalRequiredError";
    this.state = state;
  }
}

export class ResponseFormatError extends SDKError {
  readonly rawText: string;

  constructor(message: string, rawText: string, options?: SDKErrorOptions) {
    super(message, options);
    this.name = "ResponseFormatError";
    this.rawText = rawText;
  }
}

export class StructuredOutputError extends SDKError {
  readonly schemaName: string;
  readonly errors: readonly string[];
  readonly rawText: string | undefined;

  constructor(
    schemaName: string,
    errors: readonly string[],
    rawText?: string,
    options?: SDKErrorOptions,
  ) {
    super(
      `Structured output does not match schema: ${errors.join("; ")}`,
      options,
    );
    this.name = "StructuredOutputError";
    this.schemaName = schemaName;
    this.errors = errors;
    this.rawText = rawText;
  }
}

export class CancelledError extends SDKError {
  readonly reason: string | undefined;

  constructor(reason?: string) {
    super(reason ? `Operation cancelled: ${reason}` : "Operation cancelled");
    this.name = "CancelledError";
    this.reason = reason;
  }
}

/** An event source failed; the original error is kept as `cause`. */
export class ProviderError extends SDKError {
  readonly source: string;
  readonly messages: readonly Message[];

  constructor(
    source: string,
    messages: readonly Message[],
    options?: SDKErrorOptions,
  ) {
    super(
      `Event source "${source}" failed: ${errorMessage(options?.cause)}`,
      options,
    );
    this.name = "ProviderError";
    this.source = source;
    this.messages = messages;
  }
}

export class ConfigurationError extends SDKError {
  readonly issues: readonly string[];

  constructor(message: string, issues: readonly string[] = []) {
    super(message);
    this.name = "ConfigurationError";
    this.issues = issues;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
