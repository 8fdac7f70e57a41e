import type { CancellationToken } from "../types/cancellation.js";
import type { SourceCapabilities } from "../types/event-source.js";
import type { ChatRequest } from "../types/request.js";
import type { ChatResponse } from "../types/response.js";
import { StreamEventType } from "../types/stream-event.js";
import type { StreamPart } from "../types/stream-part.js";
import { StreamPartType } from "../types/stream-part.js";
import type { StepPartEmitter } from "./part-emitter.js";

/**
 * Stream one call to the source through `emitter`. Yields block parts
 * (starts, deltas, ends) as events arrive and returns the merged response.
 * Terminal parts are left to the caller. Source errors and cancellation
 * are thrown.
 */
export async function* streamStep(
  capabilities: SourceCapabilities,
  request: ChatRequest,
  emitter: StepPartEmitter,
  cancelToken: CancellationToken,
): AsyncGenerator<StreamPart, ChatResponse> {
  let completion: ChatResponse | undefined;

  if (capabilities.kind === "parts") {
    for await (const part of capabilities.streamParts(request)) {
      cancelToken.throwIfCancelled();
      if (part.type === StreamPartType.FINISH) {
        completion = part.response;
      } else if (part.type === StreamPartType.ERROR) {
        throw part.error;
      } else {
        yield* emitter.forward(part);
      }
    }
  } else {
    for await (const event of capabilities.stream(request)) {
      cancelToken.throwIfCancelled();
      switch (event.type) {
        case StreamEventType.TEXT_DELTA:
          yield* emitter.textDelta(event.text);
          break;
        case StreamEventType.THINKING_DELTA:
          yield* emitter.reasoningDelta(event.text);
          break;
        case StreamEventType.TOOL_CALL_DELTA:
          yield* emitter.toolCallDelta(event.toolCall);
          break;
        case StreamEventType.COMPLETION:
          completion = event.response;
          break;
        case StreamEventType.ERROR:
          throw event.error;
      }
    }
  }

  if (completion) {
    yield* emitter.completedToolCalls(completion.toolCalls);
  }
  return emitter.mergeResponse(completion);
}
