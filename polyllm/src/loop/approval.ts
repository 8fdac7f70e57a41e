import type { CancellationToken } from "../types/cancellation.js";
import type { Message } from "../types/message.js";
import type { ToolCall } from "../types/tool.js";
import { neverCancelled } from "../utils/cancellation.js";

export interface ApprovalContext {
  readonly messages: readonly Message[];
  readonly stepIndex: number;
  readonly cancelToken: CancellationToken;
}

export type ApprovalCheck = (
  call: ToolCall,
  context: ApprovalContext,
) => boolean | Promise<boolean>;

export interface ApprovalPolicy {
  /** Loop-wide gate. */
  needsApproval?: ApprovalCheck;
  /** Gates scoped to a single tool, by name. */
  toolApprovalChecks?: Readonly<Record<string, ApprovalCheck>>;
}

export function hasApprovalGate(policy: ApprovalPolicy): boolean {
  return (
    policy.needsApproval !== undefined ||
    Object.keys(policy.toolApprovalChecks ?? {}).length > 0
  );
}

/**
 * A call needs approval when either its scoped check or the global check
 * says so. No checks means nothing needs approval.
 */
export async function callNeedsApproval(
  call: ToolCall,
  policy: ApprovalPolicy,
  context: ApprovalContext,
): Promise<boolean> {
  const checks = policy.toolApprovalChecks ?? {};
  const name = call.function.name;
  const scoped = Object.hasOwn(checks, name) ? checks[name] : undefined;
  if (scoped && (await scoped(call, context))) {
    return true;
  }
  if (policy.needsApproval && (await policy.needsApproval(call, context))) {
    return true;
  }
  return false;
}

/**
 * The subset of `calls` that must be approved before running, in call order.
 */
export async function findToolCallsNeedingApproval(
  calls: readonly ToolCall[],
  policy: ApprovalPolicy,
  context: Partial<ApprovalContext> & Pick<ApprovalContext, "messages" | "stepIndex">,
): Promise<ToolCall[]> {
  if (!hasApprovalGate(policy)) return [];
  const full: ApprovalContext = {
    messages: context.messages,
    stepIndex: context.stepIndex,
    cancelToken: context.cancelToken ?? neverCancelled,
  };
  const decisions = await Promise.all(
    calls.map((call) => callNeedsApproval(call, policy, full)),
  );
  return calls.filter((_, index) => decisions[index] === true);
}
