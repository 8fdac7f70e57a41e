import type { ToolLoopBlockedState } from "../types/loop-state.js";
import type { Message } from "../types/message.js";
import { toolResultMessage } from "../types/message.js";
import type { ToolCall, ToolHandlers, ToolResult } from "../types/tool.js";
import type { ToolExecutionOptions } from "./tool-executor.js";
import { executeToolCalls, toolErrorResult } from "./tool-executor.js";

export const DEFAULT_DENIAL_MESSAGE = "Tool call was not approved";

export interface ApprovalDecision {
  approved: boolean;
  /** Sent back to the model as the error content when denied. */
  reason?: string;
}

/** Decisions keyed by tool call id. */
export type ApprovalDecisions = Readonly<Record<string, boolean | ApprovalDecision>>;

function decisionFor(
  decisions: ApprovalDecisions,
  call: ToolCall,
): ApprovalDecision | undefined {
  const decision = Object.hasOwn(decisions, call.id) ? decisions[call.id] : undefined;
  if (decision === undefined) return undefined;
  return typeof decision === "boolean" ? { approved: decision } : decision;
}

/**
 * Execute the calls of a blocked step according to the caller's decisions
 * and return the history to re-invoke the loop with. Calls that did not
 * need approval always run; calls needing approval without a decision are
 * treated as denied. Results keep call order.
 */
export async function resumeBlockedState(
  state: ToolLoopBlockedState,
  handlers: ToolHandlers,
  decisions: ApprovalDecisions,
  options: ToolExecutionOptions = {},
): Promise<Message[]> {
  const gated = new Set(state.toolCallsNeedingApproval.map((call) => call.id));
  const denied = new Map<string, ToolResult>();
  const approved: ToolCall[] = [];

  for (const call of state.pendingToolCalls) {
    const decision: ApprovalDecision | undefined = gated.has(call.id)
      ? decisionFor(decisions, call)
      : { approved: true };
    if (decision?.approved) {
      approved.push(call);
    } else {
      denied.set(call.id, toolErrorResult(call, decision?.reason ?? DEFAULT_DENIAL_MESSAGE));
    }
  }

  const executed = await executeToolCalls(approved, handlers, options);
  const byId = new Map<string, ToolResult>(executed.map((result) => [result.toolCallId, result]));

  const results: ToolResult[] = [];
  for (const call of state.pendingToolCalls) {
    const result = byId.get(call.id) ?? denied.get(call.id);
    if (result) results.push(result);
  }
  return [...state.messages, toolResultMessage(results)];
}
