// High-level API
export {
  runToolLoop,
  runToolLoopUntilBlocked,
  streamToolLoop,
  resumeToolLoop,
} from "./tool-loop.js";
export type { ResumeToolLoopOptions } from "./tool-loop.js";
export {
  generateObject,
  runToolLoopObject,
  DEFAULT_OBJECT_TOOL_NAME,
  DEFAULT_OBJECT_TOOL_DESCRIPTION,
} from "./generate-object.js";
export type {
  GenerateObjectOptions,
  GenerateObjectResult,
  ToolLoopObjectOptions,
  ToolLoopObjectResult,
} from "./generate-object.js";
export { streamObject } from "./stream-object.js";
export type { StreamObjectOptions, StreamObjectResult } from "./stream-object.js";
export { streamChatParts } from "./stream-parts.js";
export type { StreamChatPartsOptions } from "./stream-parts.js";

// Tool loop engine
export { ToolLoopController } from "../loop/controller.js";
export type {
  ToolLoopOptions,
  ToolLoopOutcome,
  ToolLoopResult,
} from "../loop/controller.js";
export { ToolCallAggregator, aggregateToolCalls } from "../loop/tool-call-aggregator.js";
export {
  executeToolCall,
  executeToolCalls,
  parseToolArguments,
  stringifyToolOutput,
  toolErrorResult,
} from "../loop/tool-executor.js";
export type { ParsedToolArguments, ToolExecutionOptions } from "../loop/tool-executor.js";
export {
  callNeedsApproval,
  findToolCallsNeedingApproval,
  hasApprovalGate,
} from "../loop/approval.js";
export type { ApprovalCheck, ApprovalContext, ApprovalPolicy } from "../loop/approval.js";
export { StepPartEmitter } from "../loop/part-emitter.js";
export { defineTool, createToolSet } from "../loop/tool-set.js";
export type { DefinedTool, PlainToolSpec, SchemaToolSpec, ToolSet } from "../loop/tool-set.js";
export { resumeBlockedState, DEFAULT_DENIAL_MESSAGE } from "../loop/resume.js";
export type { ApprovalDecision, ApprovalDecisions } from "../loop/resume.js";
export {
  CHECKPOINT_VERSION,
  serializeBlockedState,
  deserializeBlockedState,
  saveBlockedState,
  loadBlockedState,
} from "../loop/checkpoint.js";

// Source middleware
export {
  applyMiddleware,
  buildMiddlewareChain,
  buildStreamMiddlewareChain,
  loggingMiddleware,
} from "../client/middleware.js";
export type { Middleware, NextFn, StreamNextFn } from "../client/middleware.js";

// Core types
export { Role } from "../types/role.js";
export { ContentKind, isTextPart, isToolUsePart, isToolResultPart } from "../types/content-part.js";
export type {
  ContentPart,
  TextPart,
  ToolUsePart,
  ToolResultPart,
} from "../types/content-part.js";
export {
  Message,
  systemMessage,
  userMessage,
  assistantMessage,
  toolUseMessage,
  toolResultMessage,
  messageText,
  messageToolCalls,
  messageToolResults,
  extensionsToEntries,
  extensionsFromEntries,
} from "../types/message.js";
export type { ProviderExtensions } from "../types/message.js";
export { ChatResponse, Usage, addUsage, sumUsage } from "../types/response.js";
export type { FinishReason, ProviderMetadata } from "../types/response.js";
export type { ChatRequest } from "../types/request.js";
export { ToolCall, toolCall, isStructuredToolHandler } from "../types/tool.js";
export type {
  ToolDefinition,
  ToolResult,
  ToolHandler,
  ToolHandlers,
  RawToolHandler,
  StructuredToolHandler,
  ToolExecutionContext,
} from "../types/tool.js";
export { StreamEventType } from "../types/stream-event.js";
export type {
  StreamEvent,
  TextDeltaEvent,
  ThinkingDeltaEvent,
  ToolCallDeltaEvent,
  CompletionEvent,
  ErrorEvent,
} from "../types/stream-event.js";
export { StreamPartType, isTerminalPart } from "../types/stream-part.js";
export type { StreamPart } from "../types/stream-part.js";
export { resolveSourceCapabilities } from "../types/event-source.js";
export type { EventSource, SourceCapabilities } from "../types/event-source.js";
export type { LoopState, ToolLoopBlockedState, ToolLoopStep } from "../types/loop-state.js";
export type { CancellationToken, CancellationListener } from "../types/cancellation.js";
export { OutputSpec } from "../types/output-spec.js";
export type { ObjectOutputOptions } from "../types/output-spec.js";
export { isJsonObject } from "../types/json.js";
export type { JsonValue, JsonObject, JsonPrimitive } from "../types/json.js";

// Errors
export {
  SDKError,
  InvalidRequestError,
  MaxStepsExceededError,
  ToolApprovalRequiredError,
  ResponseFormatError,
  StructuredOutputError,
  CancelledError,
  ProviderError,
  ConfigurationError,
  errorMessage,
} from "../types/errors.js";

// Utilities
export {
  CancellationTokenSource,
  cancellationFromAbortSignal,
  neverCancelled,
} from "../utils/cancellation.js";
export {
  extractStructuredOutput,
  extractJsonValue,
  extractFencedJson,
  extractBalancedJsonObject,
  validateJsonSchema,
  decodeStructuredOutput,
} from "../utils/structured-output.js";
export { safeJsonParse, partialJsonParse } from "../utils/json.js";
export { ConsoleLogger, LogLevel, silentLogger } from "../utils/logger.js";
export type { Logger, LogFields, LogWriter, ConsoleLoggerOptions } from "../utils/logger.js";
export {
  DEFAULT_MAX_STEPS,
  ToolLoopSettingsSchema,
  EnvConfigSchema,
  resolveToolLoopSettings,
  loadConfigFromEnv,
  createLogger,
} from "../utils/config.js";
export type {
  PolyllmConfig,
  ToolExecutionMode,
  ToolLoopSettings,
  ToolLoopSettingsInput,
} from "../utils/config.js";
export { validateToolDefinitions, validateToolName } from "../utils/validate-tools.js";
