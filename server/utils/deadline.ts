import { ExecutionAbortedError, ExecutionTimeoutError } from '../core/errors.js';

/**
 * Wall-clock budget linked to an optional caller signal. `signal` aborts when
 * either the budget runs out or the caller aborts.
 */
export class Deadline {
  readonly signal: AbortSignal;
  private readonly controller = new AbortController();
  private readonly timer: ReturnType<typeof setTimeout> | null;
  private expired = false;

  constructor(
    readonly timeoutMs: number,
    private readonly parent?: AbortSignal,
    private readonly label = 'Operation',
  ) {
    this.signal = this.controller.signal;
    this.timer =
      timeoutMs > 0 && Number.isFinite(timeoutMs)
        ? setTimeout(() => {
            this.expired = true;
            this.controller.abort();
          }, timeoutMs)
        : null;
    if (parent?.aborted) {
      this.controller.abort();
    } else {
      parent?.addEventListener('abort', this.onParentAbort, { once: true });
    }
  }

  get timedOut(): boolean {
    return this.expired;
  }

  /** Throws when the budget is spent or the caller aborted. */
  check(): void {
    if (this.parent?.aborted) {
      throw new ExecutionAbortedError(`${this.label} aborted`, { cause: this.parent.reason });
    }
    if (this.expired) {
      throw new ExecutionTimeoutError(`${this.label} exceeded ${this.timeoutMs}ms`, this.timeoutMs);
    }
  }

  /** Maps an error raised while the deadline was active onto timeout/abort when applicable. */
  translate(error: unknown): unknown {
    if (this.expired) {
      return new ExecutionTimeoutError(`${this.label} exceeded ${this.timeoutMs}ms`, this.timeoutMs);
    }
    if (this.parent?.aborted && !(error instanceof ExecutionAbortedError)) {
      return new ExecutionAbortedError(`${this.label} aborted`, { cause: error });
    }
    return error;
  }

  dispose(): void {
    if (this.timer) {
      clearTimeout(this.timer);
    }
    this.parent?.removeEventListener('abort', this.onParentAbort);
  }

  private readonly onParentAbort = (): void => {
    this.controller.abort();
  };
}
