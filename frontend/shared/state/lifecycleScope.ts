// Cancellable task group bound to the lifetime of one owner (a view, a view model)

export type ScopeTask = (signal: AbortSignal) => Promise<void> | void;
export type ScopeErrorHandler = (error: unknown) => void;

/**
 * Owns the asynchronous work started on behalf of one owner.
 *
 * Tasks are started on a microtask so callers never wait on them. Disposing the
 * scope aborts its signal, runs the registered disposers, and drops any task that
 * has not started yet. Failures go to the scope's error handler.
 */
export class LifecycleScope {
  private readonly controller = new AbortController();
  private readonly inFlight = new Set<Promise<void>>();
  private readonly disposers: Array<() => void> = [];
  private readonly onError: ScopeErrorHandler;

  constructor(
    readonly name: string,
    onError?: ScopeErrorHandler
  ) {
    this.onError =
      onError ??
      ((error) => {
        console.error(`[${name}] Unhandled error in scope:`, error);
      });
  }

  get isActive(): boolean {
    return !this.controller.signal.aborted;
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  /**
   * Start `task` on this scope without blocking the caller
   */
  launch(task: ScopeTask): void {
    if (!this.isActive) {
      console.warn(`[${this.name}] Ignoring task launched after dispose`);
      return;
    }

    const signal = this.controller.signal;
    const job: Promise<void> = Promise.resolve()
      .then(() => {
        if (signal.aborted) return;
        return task(signal);
      })
      .catch((error: unknown) => {
        // A task cancelled by dispose() rejecting with the abort reason is not a failure
        if (signal.aborted && error === signal.reason) return;
        this.fail(error);
      })
      .finally(() => {
        this.inFlight.delete(job);
      });

    this.inFlight.add(job);
  }

  /**
   * Report a failure to the scope's error handler
   */
  fail(error: unknown): void {
    this.onError(error);
  }

  /**
   * Register cleanup to run on dispose. Runs immediately if already disposed.
   */
  addDisposer(disposer: () => void): void {
    if (!this.isActive) {
      disposer();
      return;
    }
    this.disposers.push(disposer);
  }

  /**
   * Resolves once no launched task is in flight
   */
  async whenIdle(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled(Array.from(this.inFlight));
    }
  }

  dispose(): void {
    if (!this.isActive) return;

    this.controller.abort();
    while (this.disposers.length > 0) {
      const disposer = this.disposers.pop();
      disposer?.();
    }
  }
}
