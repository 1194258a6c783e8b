import { CancellationToken, raceWithTimeout } from './CancellationToken';

export type SignalWaitResult = 'completed' | 'timed-out' | 'cancelled';

/**
 * Resettable one-shot signal. Pooled by the scope manager so frequently
 * awaited events (probe acknowledgements) do not allocate a promise pair each time.
 */
export class CompletionSignal {
  private completed = false;
  private resolveFn?: () => void;
  private promise: Promise<void>;

  constructor() {
    this.promise = this.createPromise();
  }

  get isCompleted(): boolean {
    return this.completed;
  }

  complete(): void {
    if (this.completed) return;
    this.completed = true;
    this.resolveFn?.();
  }

  async wait(timeoutMs: number, token?: CancellationToken): Promise<SignalWaitResult> {
    if (this.completed) return 'completed';

    const outcome = await raceWithTimeout(this.promise, timeoutMs, token);
    return outcome.status;
  }

  /**
   * Re-arm the signal. A completed promise cannot be reused, so a fresh one
   * is created only when the previous one was consumed.
   */
  reset(): void {
    if (this.completed) {
      this.completed = false;
      this.promise = this.createPromise();
    }
  }

  private createPromise(): Promise<void> {
    return new Promise<void>((resolve) => {
      this.resolveFn = resolve;
    });
  }
}
