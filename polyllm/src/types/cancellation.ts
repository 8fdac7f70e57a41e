export type CancellationListener = (reason: string | undefined) => void;

/**
 * Read side of a cooperative cancellation signal. Owned by the caller,
 * observed by the loop and tool handlers.
 */
export interface CancellationToken {
  readonly isCancelled: boolean;
  readonly reason: string | undefined;
  /** Abort signal that fires together with the token, for fetch-style APIs. */
  readonly signal: AbortSignal;
  /**
   * Register a listener. Runs immediately when the token is already
   * cancelled. Returns an unsubscribe function.
   */
  onCancelled(listener: CancellationListener): () => void;
  /** Throws CancelledError when cancellation has been requested. */
  throwIfCancelled(): void;
}
