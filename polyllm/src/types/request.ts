import type { CancellationToken } from "./cancellation.js";
import type { Message } from "./message.js";
import type { ToolDefinition } from "./tool.js";

export interface ChatRequest {
  /** Message history */
  messages: Message[];
  /** Tool catalog, passed to the source opaquely */
  tools?: ToolDefinition[];
  /** Cooperative cancellation shared with the caller */
  cancelToken?: CancellationToken;
  /** Provider-specific options escape hatch */
  providerOptions?: Record<string, Record<string, unknown>>;
}
