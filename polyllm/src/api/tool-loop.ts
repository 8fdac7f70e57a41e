import type { ToolLoopBlockedState } from "../types/loop-state.js";
import type { StreamPart } from "../types/stream-part.js";
import type { ToolLoopOptions, ToolLoopOutcome, ToolLoopResult } from "../loop/controller.js";
import { ToolLoopController } from "../loop/controller.js";
import type { ApprovalDecisions } from "../loop/resume.js";
import { resumeBlockedState } from "../loop/resume.js";

/**
 * Run the tool loop to completion. Throws ToolApprovalRequiredError if a
 * tool call needs approval, MaxStepsExceededError if the model keeps
 * requesting tools.
 */
export function runToolLoop(options: ToolLoopOptions): Promise<ToolLoopResult> {
  return new ToolLoopController(options).run();
}

/**
 * Run the tool loop until it finishes or blocks on approval.
 */
export function runToolLoopUntilBlocked(options: ToolLoopOptions): Promise<ToolLoopOutcome> {
  return new ToolLoopController(options).runUntilBlocked();
}

/**
 * Stream the tool loop as block-structured parts. Failures, cancellation
 * and approval requests arrive as a final error part.
 */
export function streamToolLoop(options: ToolLoopOptions): AsyncGenerator<StreamPart> {
  return new ToolLoopController(options).stream();
}

export interface ResumeToolLoopOptions extends Omit<ToolLoopOptions, "messages"> {
  state: ToolLoopBlockedState;
  /** Per tool call id. Calls needing approval without a decision are denied. */
  decisions: ApprovalDecisions;
}

/**
 * Apply approval decisions to a blocked loop, execute the step's calls and
 * continue until the loop finishes or blocks again.
 */
export async function resumeToolLoop(options: ResumeToolLoopOptions): Promise<ToolLoopOutcome> {
  const { state, decisions, ...loopOptions } = options;
  const messages = await resumeBlockedState(state, loopOptions.toolHandlers ?? {}, decisions, {
    cancelToken: loopOptions.cancelToken,
    mode: loopOptions.toolExecution,
    maxRetries: loopOptions.maxToolRetries,
    logger: loopOptions.logger,
  });
  return runToolLoopUntilBlocked({ ...loopOptions, messages });
}
