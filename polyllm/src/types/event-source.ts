import type { ChatRequest } from "./request.js";
import type { ChatResponse } from "./response.js";
import type { StreamEvent } from "./stream-event.js";
import type { StreamPart } from "./stream-part.js";

/**
 * A model backend, already constructed and configured by the caller.
 * Transport, framing and vendor field mapping live behind this interface.
 */
export interface EventSource {
  readonly name: string;
  complete(request: ChatRequest): Promise<ChatResponse>;
  /** Deltas in causal order, ending with a completion or an error. */
  stream(request: ChatRequest): AsyncIterable<StreamEvent>;
  /** Optional native block-structured stream. */
  streamParts?(request: ChatRequest): AsyncIterable<StreamPart>;
}

export type StreamEventsFn = (request: ChatRequest) => AsyncIterable<StreamEvent>;
export type StreamPartsFn = (request: ChatRequest) => AsyncIterable<StreamPart>;

export type SourceCapabilities =
  | { kind: "events"; name: string; stream: StreamEventsFn }
  | {
      kind: "parts";
      name: string;
      stream: StreamEventsFn;
      streamParts: StreamPartsFn;
    };

/**
 * Resolve what a source can do, once, at construction time.
 */
export function resolveSourceCapabilities(
  source: EventSource,
): SourceCapabilities {
  const stream: StreamEventsFn = (request) => source.stream(request);
  if (source.streamParts) {
    return {
      kind: "parts",
      name: source.name,
      stream,
      streamParts: source.streamParts.bind(source),
    };
  }
  return { kind: "events", name: source.name, stream };
}
