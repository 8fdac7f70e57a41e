import type { CancellationToken } from "../types/cancellation.js";
import type { EventSource } from "../types/event-source.js";
import { resolveSourceCapabilities } from "../types/event-source.js";
import type { Message } from "../types/message.js";
import type { StreamPart } from "../types/stream-part.js";
import type { ToolDefinition } from "../types/tool.js";
import { ProviderError, SDKError } from "../types/errors.js";
import { neverCancelled } from "../utils/cancellation.js";
import type { Logger } from "../utils/logger.js";
import { silentLogger } from "../utils/logger.js";
import { StepPartEmitter } from "../loop/part-emitter.js";
import { streamStep } from "../loop/step-stream.js";

export interface StreamChatPartsOptions {
  source: EventSource;
  messages: readonly Message[];
  tools?: ToolDefinition[];
  cancelToken?: CancellationToken;
  logger?: Logger;
  providerOptions?: Record<string, Record<string, unknown>>;
}

/**
 * One call to the source as block-structured parts. Tool calls are
 * reported but not executed.
 */
export async function* streamChatParts(
  options: StreamChatPartsOptions,
): AsyncGenerator<StreamPart> {
  const { source } = options;
  const cancelToken = options.cancelToken ?? neverCancelled;
  const emitter = new StepPartEmitter(options.logger ?? silentLogger);
  try {
    cancelToken.throwIfCancelled();
    const response = yield* streamStep(
      resolveSourceCapabilities(source),
      {
        messages: [...options.messages],
        tools: options.tools,
        cancelToken,
        providerOptions: options.providerOptions,
      },
      emitter,
      cancelToken,
    );
    yield* emitter.finish(response);
  } catch (error) {
    const failure =
      error instanceof SDKError
        ? error
        : new ProviderError(source.name, options.messages, { cause: error });
    yield* emitter.fail(failure);
  }
}
