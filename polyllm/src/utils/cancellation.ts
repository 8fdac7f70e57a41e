import type {
  CancellationListener,
  CancellationToken,
} from "../types/cancellation.js";
import { CancelledError } from "../types/errors.js";

class SourceToken implements CancellationToken {
  private readonly controller = new AbortController();
  private readonly listeners = new Set<CancellationListener>();
  private cancelReason: string | undefined;

  get isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  get reason(): string | undefined {
    return this.cancelReason;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  onCancelled(listener: CancellationListener): () => void {
    if (this.isCancelled) {
      listener(this.cancelReason);
      return () => {};
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  throwIfCancelled(): void {
    if (this.isCancelled) {
      throw new CancelledError(this.cancelReason);
    }
  }

  trigger(reason: string | undefined): void {
    if (this.isCancelled) return;
    this.cancelReason = reason;
    this.controller.abort(new CancelledError(reason));
    const listeners = [...this.listeners];
    this.listeners.clear();
    for (const listener of listeners) {
      listener(reason);
    }
  }
}

/**
 * Write side of a cancellation signal. Hand `token` to the loop and keep
 * the source to cancel it.
 */
export class CancellationTokenSource {
  private readonly sourceToken = new SourceToken();

  get token(): CancellationToken {
    return this.sourceToken;
  }

  get isCancelled(): boolean {
    return this.sourceToken.isCancelled;
  }

  /** Idempotent; only the first reason is kept. */
  cancel(reason?: string): void {
    this.sourceToken.trigger(reason);
  }
}

/** A token that is never cancelled. */
export const neverCancelled: CancellationToken = new CancellationTokenSource().token;

/**
 * Bridge a Node AbortSignal into a cancellation token.
 */
export function cancellationFromAbortSignal(
  signal: AbortSignal,
): CancellationToken {
  const source = new CancellationTokenSource();
  const abort = () => source.cancel(abortReason(signal.reason));
  if (signal.aborted) {
    abort();
  } else {
    signal.addEventListener("abort", abort, { once: true });
  }
  return source.token;
}

function abortReason(reason: unknown): string | undefined {
  if (typeof reason === "string") return reason;
  if (reason instanceof Error) return reason.message;
  return undefined;
}
