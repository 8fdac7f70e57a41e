import type { EventSource } from "../types/event-source.js";
import type { ChatRequest } from "../types/request.js";
import type { ChatResponse } from "../types/response.js";
import type { StreamEvent } from "../types/stream-event.js";
import { StreamEventType } from "../types/stream-event.js";
import type { Logger } from "../utils/logger.js";

export type NextFn = (request: ChatRequest) => Promise<ChatResponse>;
export type StreamNextFn = (request: ChatRequest) => AsyncIterable<StreamEvent>;

export interface Middleware {
  complete?: (request: ChatRequest, next: NextFn) => Promise<ChatResponse>;
  stream?: (request: ChatRequest, next: StreamNextFn) => AsyncIterable<StreamEvent>;
}

export function buildMiddlewareChain(
  middlewares: readonly Middleware[],
  handler: NextFn,
): NextFn {
  let chain = handler;
  for (const mw of [...middlewares].reverse()) {
    const complete = mw.complete;
    if (!complete) continue;
    const next = chain;
    chain = (request) => complete(request, next);
  }
  return chain;
}

export function buildStreamMiddlewareChain(
  middlewares: readonly Middleware[],
  handler: StreamNextFn,
): StreamNextFn {
  let chain = handler;
  for (const mw of [...middlewares].reverse()) {
    const stream = mw.stream;
    if (!stream) continue;
    const next = chain;
    chain = (request) => stream(request, next);
  }
  return chain;
}

/**
 * Wrap a source so every call passes through `middlewares`, first one
 * outermost. A native parts stream, if any, is passed through untouched.
 */
export function applyMiddleware(
  source: EventSource,
  middlewares: readonly Middleware[],
): EventSource {
  const complete = buildMiddlewareChain(middlewares, (request) => source.complete(request));
  const stream = buildStreamMiddlewareChain(middlewares, (request) => source.stream(request));
  const wrapped: EventSource = { name: source.name, complete, stream };
  if (source.streamParts) {
    wrapped.streamParts = source.streamParts.bind(source);
  }
  return wrapped;
}

export function loggingMiddleware(logger: Logger): Middleware {
  return {
    async complete(request, next) {
      const started = Date.now();
      logger.debug("Source request", { messages: request.messages.length });
      try {
        const response = await next(request);
        logger.debug("Source response", {
          durationMs: Date.now() - started,
          toolCalls: response.toolCalls.length,
          finishReason: response.finishReason,
        });
        return response;
      } catch (error) {
        logger.error("Source request failed", { error });
        throw error;
      }
    },
    async *stream(request, next) {
      const started = Date.now();
      let events = 0;
      logger.debug("Source stream", { messages: request.messages.length });
      for await (const event of next(request)) {
        events++;
        if (event.type === StreamEventType.ERROR) {
          logger.error("Source stream error", { error: event.error });
        }
        yield event;
      }
      logger.debug("Source stream ended", { durationMs: Date.now() - started, events });
    },
  };
}
