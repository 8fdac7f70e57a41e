import type { CancellationToken } from "../types/cancellation.js";
import type { EventSource, SourceCapabilities } from "../types/event-source.js";
import { resolveSourceCapabilities } from "../types/event-source.js";
import type { LoopState, ToolLoopBlockedState, ToolLoopStep } from "../types/loop-state.js";
import type { Message } from "../types/message.js";
import { assistantMessage, toolResultMessage, toolUseMessage } from "../types/message.js";
import type { ChatRequest } from "../types/request.js";
import type { ChatResponse, Usage } from "../types/response.js";
import { sumUsage } from "../types/response.js";
import type { StreamPart } from "../types/stream-part.js";
import type { ToolCall, ToolDefinition, ToolHandlers, ToolResult } from "../types/tool.js";
import {
  InvalidRequestError,
  MaxStepsExceededError,
  ProviderError,
  SDKError,
  ToolApprovalRequiredError,
} from "../types/errors.js";
import { neverCancelled } from "../utils/cancellation.js";
import type { ToolExecutionMode, ToolLoopSettings } from "../utils/config.js";
import { resolveToolLoopSettings } from "../utils/config.js";
import type { Logger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import { validateToolDefinitions } from "../utils/validate-tools.js";
import type { ApprovalPolicy } from "./approval.js";
import { findToolCallsNeedingApproval } from "./approval.js";
import { StepPartEmitter } from "./part-emitter.js";
import { streamStep } from "./step-stream.js";
import { executeToolCalls } from "./tool-executor.js";

export interface ToolLoopOptions extends ApprovalPolicy {
  source: EventSource;
  /** Seed history. Copied; the caller's array is never mutated. */
  messages: readonly Message[];
  tools?: ToolDefinition[];
  toolHandlers?: ToolHandlers;
  /** Defaults to 10. */
  maxSteps?: number;
  toolExecution?: ToolExecutionMode;
  maxToolRetries?: number;
  cancelToken?: CancellationToken;
  logger?: Logger;
  providerOptions?: Record<string, Record<string, unknown>>;
}

export interface ToolLoopResult {
  /** Response of the final step, as the source returned it. */
  response: ChatResponse;
  text: string;
  /** Full history, ending with the final assistant reply. */
  messages: Message[];
  steps: ToolLoopStep[];
  /** Summed over all steps. */
  usage: Usage | undefined;
}

export type ToolLoopOutcome =
  | { status: "finished"; result: ToolLoopResult }
  | { status: "blocked"; state: ToolLoopBlockedState };

type StepDecision =
  | { kind: "finished"; result: ToolLoopResult }
  | { kind: "blocked"; state: ToolLoopBlockedState }
  | { kind: "execute"; toolCalls: readonly ToolCall[] };

/**
 * Drives one tool loop invocation: call the source, execute or block on the
 * requested tools, append the results, repeat. A controller runs once.
 */
export class ToolLoopController {
  private readonly options: ToolLoopOptions;
  private readonly settings: ToolLoopSettings;
  private readonly capabilities: SourceCapabilities;
  private readonly cancelToken: CancellationToken;
  private readonly logger: Logger;
  private readonly messages: Message[];
  private readonly steps: ToolLoopStep[] = [];
  private stepIndex = 0;
  private pendingToolCalls: readonly ToolCall[] = [];
  private gatedToolCalls: readonly ToolCall[] = [];
  private started = false;

  constructor(options: ToolLoopOptions) {
    this.settings = resolveToolLoopSettings({
      maxSteps: options.maxSteps,
      toolExecution: options.toolExecution,
      maxToolRetries: options.maxToolRetries,
    });
    validateToolDefinitions(options.tools);
    this.options = options;
    this.capabilities = resolveSourceCapabilities(options.source);
    this.cancelToken = options.cancelToken ?? neverCancelled;
    this.logger = (options.logger ?? silentLogger).child({
      component: "tool-loop",
      source: options.source.name,
    });
    this.messages = [...options.messages];
  }

  /** Snapshot of the loop state. */
  get state(): LoopState {
    return {
      messages: [...this.messages],
      pendingToolCalls: this.pendingToolCalls,
      toolCallsNeedingApproval: this.gatedToolCalls,
      stepIndex: this.stepIndex,
    };
  }

  /**
   * Run to completion. Throws ToolApprovalRequiredError when a call needs
   * approval.
   */
  async run(): Promise<ToolLoopResult> {
    const outcome = await this.runUntilBlocked();
    if (outcome.status === "blocked") {
      throw new ToolApprovalRequiredError(outcome.state);
    }
    return outcome.result;
  }

  /**
   * Run until the loop finishes or a call needs approval.
   */
  async runUntilBlocked(): Promise<ToolLoopOutcome> {
    this.begin();
    for (;;) {
      this.cancelToken.throwIfCancelled();
      const response = await this.complete();
      this.cancelToken.throwIfCancelled();

      const decision = await this.decide(response);
      if (decision.kind === "finished") {
        return { status: "finished", result: decision.result };
      }
      if (decision.kind === "blocked") {
        return { status: "blocked", state: decision.state };
      }
      const results = await this.execute(decision.toolCalls);
      this.advance(response, decision.toolCalls, results);
    }
  }

  /**
   * Stream every step as parts. Ends with a single finish part, or with an
   * error part when the loop fails, is cancelled or needs approval.
   */
  async *stream(): AsyncGenerator<StreamPart> {
    this.begin();
    let emitter = new StepPartEmitter(this.logger);
    try {
      for (;;) {
        this.cancelToken.throwIfCancelled();
        emitter = new StepPartEmitter(this.logger);
        const response = yield* this.streamSourceStep(emitter);

        const decision = await this.decide(response);
        if (decision.kind === "finished") {
          yield* emitter.finish(response);
          return;
        }
        yield* emitter.endBlocks(response.providerMetadata);
        if (decision.kind === "blocked") {
          yield* emitter.fail(new ToolApprovalRequiredError(decision.state));
          return;
        }
        const results = await this.execute(decision.toolCalls);
        yield* emitter.toolResults(results);
        this.advance(response, decision.toolCalls, results);
      }
    } catch (error) {
      const failure = error instanceof Error ? error : new SDKError(String(error));
      this.logger.warn("Tool loop failed", { step: this.stepIndex, error: failure });
      yield* emitter.fail(failure);
    }
  }

  private begin(): void {
    if (this.started) {
      throw new InvalidRequestError("ToolLoopController can only be run once");
    }
    this.started = true;
  }

  private request(): ChatRequest {
    return {
      messages: [...this.messages],
      tools: this.options.tools,
      cancelToken: this.cancelToken,
      providerOptions: this.options.providerOptions,
    };
  }

  private sourceError(error: unknown): Error {
    if (error instanceof SDKError) return error;
    return new ProviderError(this.capabilities.name, [...this.messages], { cause: error });
  }

  private async complete(): Promise<ChatResponse> {
    this.logger.debug("Calling source", { step: this.stepIndex });
    try {
      return await this.options.source.complete(this.request());
    } catch (error) {
      throw this.sourceError(error);
    }
  }

  private async *streamSourceStep(
    emitter: StepPartEmitter,
  ): AsyncGenerator<StreamPart, ChatResponse> {
    this.logger.debug("Streaming from source", { step: this.stepIndex });
    try {
      return yield* streamStep(this.capabilities, this.request(), emitter, this.cancelToken);
    } catch (error) {
      throw this.sourceError(error);
    }
  }

  private async decide(response: ChatResponse): Promise<StepDecision> {
    const toolCalls = response.toolCalls;
    if (toolCalls.length === 0) {
      const reply = response.assistantMessage ?? (response.text ? assistantMessage(response.text) : undefined);
      if (reply) this.messages.push(reply);
      this.steps.push({ stepIndex: this.stepIndex, response, toolCalls: [], toolResults: [] });
      this.pendingToolCalls = [];
      this.gatedToolCalls = [];
      this.logger.info("Tool loop finished", { steps: this.steps.length });
      return {
        kind: "finished",
        result: {
          response,
          text: response.text ?? "",
          messages: [...this.messages],
          steps: [...this.steps],
          usage: sumUsage(this.steps.map((step) => step.response.usage)),
        },
      };
    }

    this.pendingToolCalls = toolCalls;
    const needingApproval = await findToolCallsNeedingApproval(toolCalls, this.options, {
      messages: [...this.messages],
      stepIndex: this.stepIndex,
      cancelToken: this.cancelToken,
    });

    // Verbatim when the source supplied the assistant turn
    this.messages.push(response.assistantMessage ?? toolUseMessage(toolCalls, response.text));

    this.gatedToolCalls = needingApproval;
    if (needingApproval.length > 0) {
      this.logger.info("Tool loop blocked on approval", {
        step: this.stepIndex,
        tools: needingApproval.map((call) => call.function.name),
      });
      return {
        kind: "blocked",
        state: {
          messages: [...this.messages],
          pendingToolCalls: toolCalls,
          toolCallsNeedingApproval: needingApproval,
          stepIndex: this.stepIndex,
          response,
          steps: [...this.steps],
        },
      };
    }
    return { kind: "execute", toolCalls };
  }

  private execute(toolCalls: readonly ToolCall[]): Promise<ToolResult[]> {
    this.logger.info("Executing tool calls", {
      step: this.stepIndex,
      tools: toolCalls.map((call) => call.function.name),
    });
    return executeToolCalls(toolCalls, this.options.toolHandlers ?? {}, {
      cancelToken: this.cancelToken,
      mode: this.settings.toolExecution,
      maxRetries: this.settings.maxToolRetries,
      logger: this.logger,
    });
  }

  private advance(
    response: ChatResponse,
    toolCalls: readonly ToolCall[],
    toolResults: readonly ToolResult[],
  ): void {
    this.messages.push(toolResultMessage(toolResults));
    this.steps.push({ stepIndex: this.stepIndex, response, toolCalls, toolResults });
    this.pendingToolCalls = [];
    this.gatedToolCalls = [];
    if (this.stepIndex + 1 >= this.settings.maxSteps) {
      this.logger.warn("Tool loop exceeded max steps", { maxSteps: this.settings.maxSteps });
      throw new MaxStepsExceededError(this.settings.maxSteps, [...this.messages], [...this.steps]);
    }
    this.stepIndex++;
  }
}
