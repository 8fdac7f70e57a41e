import type { CancellationToken } from "../types/cancellation.js";
import type { EventSource } from "../types/event-source.js";
import type { JsonValue } from "../types/json.js";
import type { Message } from "../types/message.js";
import type { OutputSpec } from "../types/output-spec.js";
import type { ChatRequest } from "../types/request.js";
import type { ChatResponse } from "../types/response.js";
import type { StreamEvent } from "../types/stream-event.js";
import { StreamEventType } from "../types/stream-event.js";
import type { ToolDefinition } from "../types/tool.js";
import { ProviderError, ResponseFormatError, SDKError } from "../types/errors.js";
import { partialJsonParse } from "../utils/json.js";
import { extractStructuredOutput, requireOutputText } from "../utils/structured-output.js";

export interface StreamObjectOptions<T> {
  source: EventSource;
  messages: readonly Message[];
  output: OutputSpec<T>;
  tools?: ToolDefinition[];
  cancelToken?: CancellationToken;
  providerOptions?: Record<string, Record<string, unknown>>;
}

export interface StreamObjectResult<T> extends AsyncIterable<StreamEvent> {
  /** Decoded value, extracted once the stream has ended. */
  object(): Promise<T>;
  /** Completion response with its text filled in from the deltas. */
  response(): Promise<ChatResponse>;
  /** Best-effort values parsed from the text received so far. */
  partialObjects(): AsyncGenerator<JsonValue>;
}

type Settled<T> =
  | { status: "done"; object: T; response: ChatResponse }
  | { status: "failed"; error: Error; response?: ChatResponse };

class StreamObjectResultImpl<T> implements StreamObjectResult<T> {
  private readonly events: StreamEvent[] = [];
  private readonly listeners = new Set<() => void>();
  private textBuffer = "";
  private completion: ChatResponse | undefined;
  private settled: Settled<T> | undefined;
  private iterationStarted = false;
  private ended = false;

  constructor(
    private readonly options: StreamObjectOptions<T>,
    private readonly request: ChatRequest,
  ) {}

  [Symbol.asyncIterator](): AsyncIterator<StreamEvent> {
    if (this.iterationStarted) {
      return this.replay();
    }
    this.iterationStarted = true;
    return this.pump();
  }

  async object(): Promise<T> {
    const settled = await this.outcome();
    if (settled.status === "failed") throw settled.error;
    return settled.object;
  }

  async response(): Promise<ChatResponse> {
    const settled = await this.outcome();
    if (settled.response) return settled.response;
    throw settled.status === "failed" ? settled.error : new SDKError("No response");
  }

  async *partialObjects(): AsyncGenerator<JsonValue> {
    let text = "";
    let last: string | undefined;
    for await (const event of this) {
      if (event.type !== StreamEventType.TEXT_DELTA) continue;
      text += event.text;
      const start = text.indexOf("{");
      if (start === -1) continue;
      const partial = partialJsonParse(text.slice(start));
      if (partial === undefined) continue;
      const key = JSON.stringify(partial);
      if (key === last) continue;
      last = key;
      yield partial;
    }
  }

  private async outcome(): Promise<Settled<T>> {
    if (this.settled) return this.settled;
    if (!this.iterationStarted) {
      const iterator = this[Symbol.asyncIterator]();
      let step = await iterator.next();
      while (!step.done) {
        step = await iterator.next();
      }
    }
    let settled = this.settled;
    while (!settled) {
      await new Promise<void>((resolve) => this.listeners.add(resolve));
      settled = this.settled;
    }
    return settled;
  }

  private async *pump(): AsyncGenerator<StreamEvent> {
    try {
      for await (const event of this.options.source.stream(this.request)) {
        this.record(event);
        if (event.type === StreamEventType.ERROR) {
          this.settle({ status: "failed", error: this.sourceError(event.error) });
          yield event;
          return;
        }
        yield event;
        this.options.cancelToken?.throwIfCancelled();
      }
      if (!this.settled) this.settle(this.extract());
    } catch (error) {
      const failure = this.sourceError(error);
      const event: StreamEvent = { type: StreamEventType.ERROR, error: failure };
      this.record(event);
      this.settle({ status: "failed", error: failure });
      yield event;
      return;
    } finally {
      this.settle({
        status: "failed",
        error: new ResponseFormatError("Stream ended before completion", this.textBuffer),
      });
      this.ended = true;
      this.notify();
    }
  }

  private async *replay(): AsyncGenerator<StreamEvent> {
    let index = 0;
    for (;;) {
      const event = this.events[index];
      if (event) {
        index++;
        yield event;
        continue;
      }
      if (this.ended) return;
      await new Promise<void>((resolve) => this.listeners.add(resolve));
    }
  }

  private record(event: StreamEvent): void {
    this.events.push(event);
    if (event.type === StreamEventType.TEXT_DELTA) {
      this.textBuffer += event.text;
    } else if (event.type === StreamEventType.COMPLETION) {
      this.completion = event.response;
      // Settled before the event reaches the reader
      this.settle(this.extract());
    }
    this.notify();
  }

  private extract(): Settled<T> {
    // Deltas win; a source that sent none may still carry text on the completion
    const text = this.textBuffer.trim() ? this.textBuffer : this.completion?.text;
    const response: ChatResponse = {
      ...this.completion,
      toolCalls: this.completion?.toolCalls ?? [],
      text,
    };
    try {
      const object = extractStructuredOutput(requireOutputText(text), this.options.output);
      return { status: "done", object, response };
    } catch (error) {
      const failure = error instanceof Error ? error : new SDKError(String(error));
      return { status: "failed", error: failure, response };
    }
  }

  private sourceError(error: unknown): Error {
    if (error instanceof SDKError) return error;
    return new ProviderError(this.options.source.name, this.options.messages, { cause: error });
  }

  /** First outcome wins. */
  private settle(settled: Settled<T>): void {
    if (this.settled) return;
    this.settled = settled;
    this.notify();
  }

  private notify(): void {
    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) listener();
  }
}

/**
 * Stream a structured answer. Text deltas are buffered and extraction runs
 * once, when the stream ends.
 */
export function streamObject<T>(options: StreamObjectOptions<T>): StreamObjectResult<T> {
  options.cancelToken?.throwIfCancelled();
  return new StreamObjectResultImpl(options, {
    messages: [...options.messages],
    tools: options.tools,
    cancelToken: options.cancelToken,
    providerOptions: options.providerOptions,
  });
}
