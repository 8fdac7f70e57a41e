import type { ToolCall } from "../types/tool.js";
import { toolCall } from "../types/tool.js";
import type { Logger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";

interface ToolCallAccumulator {
  id: string;
  name: string;
  argumentsBuffer: string;
}

/**
 * Merges streamed tool-call fragments by id. The first non-empty name wins;
 * argument fragments are concatenated in arrival order. Completion is
 * decided by the caller, and argument validity is checked at execution.
 */
export class ToolCallAggregator {
  private readonly calls = new Map<string, ToolCallAccumulator>();
  private readonly logger: Logger;

  constructor(logger: Logger = silentLogger) {
    this.logger = logger;
  }

  get size(): number {
    return this.calls.size;
  }

  has(id: string): boolean {
    return this.calls.has(id);
  }

  /**
   * Merge one fragment. Returns the call as aggregated so far.
   */
  addDelta(delta: ToolCall): ToolCall {
    const existing = this.calls.get(delta.id);
    if (!existing) {
      const created: ToolCallAccumulator = {
        id: delta.id,
        name: delta.function.name,
        argumentsBuffer: delta.function.arguments,
      };
      this.calls.set(delta.id, created);
      return snapshot(created);
    }

    const name = delta.function.name;
    if (name) {
      if (!existing.name) {
        existing.name = name;
      } else if (existing.name !== name) {
        this.logger.debug("Ignoring conflicting tool name for call", {
          toolCallId: delta.id,
          kept: existing.name,
          ignored: name,
        });
      }
    }
    existing.argumentsBuffer += delta.function.arguments;
    return snapshot(existing);
  }

  /** The aggregated call for `id`, if any fragment has been seen. */
  get(id: string): ToolCall | undefined {
    const acc = this.calls.get(id);
    return acc ? snapshot(acc) : undefined;
  }

  /**
   * All calls in first-seen order. An empty argument buffer becomes "{}".
   */
  completed(): ToolCall[] {
    return [...this.calls.values()].map((acc) =>
      toolCall(acc.id, acc.name, acc.argumentsBuffer || "{}"),
    );
  }
}

function snapshot(acc: ToolCallAccumulator): ToolCall {
  return toolCall(acc.id, acc.name, acc.argumentsBuffer);
}

export function aggregateToolCalls(deltas: Iterable<ToolCall>): ToolCall[] {
  const aggregator = new ToolCallAggregator();
  for (const delta of deltas) {
    aggregator.addDelta(delta);
  }
  return aggregator.completed();
}
