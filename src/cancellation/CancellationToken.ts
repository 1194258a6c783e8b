/**
 * Cooperative cancellation primitives shared by every background loop
 */

export interface CancellationToken {
  readonly isCancellationRequested: boolean;
  readonly reason: string | undefined;

  /**
   * Register a listener; fires immediately (synchronously) if already cancelled.
   * Returns a function removing the listener.
   */
  onCancellationRequested(listener: (reason: string) => void): () => void;
}

const NONE: CancellationToken = {
  isCancellationRequested: false,
  reason: undefined,
  onCancellationRequested: () => () => undefined
};

export class CancellationTokenSource {
  private cancelled = false;
  private cancelReason: string | undefined;
  private listeners = new Set<(reason: string) => void>();
  private parentLinks: Array<() => void> = [];
  readonly token: CancellationToken;

  static readonly none: CancellationToken = NONE;

  /**
   * Create a source linked to the given parents: cancelling any parent
   * cancels this source, never the other way round.
   */
  constructor(...parents: CancellationToken[]) {
    const isCancelled = (): boolean => this.cancelled;
    const currentReason = (): string | undefined => this.cancelReason;
    this.token = {
      get isCancellationRequested() {
        return isCancelled();
      },
      get reason() {
        return currentReason();
      },
      onCancellationRequested: (listener) => this.subscribe(listener)
    };

    for (const parent of parents) {
      if (parent.isCancellationRequested) {
        this.cancel(parent.reason ?? 'cancelled');
        break;
      }
      this.parentLinks.push(parent.onCancellationRequested((reason) => this.cancel(reason)));
    }
  }

  get isCancellationRequested(): boolean {
    return this.cancelled;
  }

  cancel(reason: string = 'cancelled'): void {
    if (this.cancelled) return;

    this.cancelled = true;
    this.cancelReason = reason;
    this.unlinkParents();

    const listeners = Array.from(this.listeners);
    this.listeners.clear();
    for (const listener of listeners) {
      listener(reason);
    }
  }

  /**
   * Detach from parents without cancelling
   */
  dispose(): void {
    this.unlinkParents();
    this.listeners.clear();
  }

  private subscribe(listener: (reason: string) => void): () => void {
    if (this.cancelled) {
      listener(this.cancelReason ?? 'cancelled');
      return () => undefined;
    }
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private unlinkParents(): void {
    for (const unlink of this.parentLinks) {
      unlink();
    }
    this.parentLinks = [];
  }
}

/**
 * Wait `ms`, or less if the token is cancelled first.
 * Resolves to true when the full delay elapsed, false when cancelled.
 */
export function delay(ms: number, token: CancellationToken = NONE): Promise<boolean> {
  if (token.isCancellationRequested) {
    return Promise.resolve(false);
  }

  return new Promise<boolean>((resolve) => {
    let unsubscribe: () => void = () => undefined;
    const timer = setTimeout(() => {
      unsubscribe();
      resolve(true);
    }, Math.max(0, ms));

    unsubscribe = token.onCancellationRequested(() => {
      clearTimeout(timer);
      resolve(false);
    });
  });
}

export type RaceOutcome<T> =
  | { status: 'completed'; value: T }
  | { status: 'timed-out' }
  | { status: 'cancelled'; reason: string };

/**
 * Race a promise against a timeout and a token. The promise keeps running
 * after a timeout or cancellation; callers own its cleanup.
 */
export function raceWithTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  token: CancellationToken = NONE
): Promise<RaceOutcome<T>> {
  return new Promise<RaceOutcome<T>>((resolve, reject) => {
    let settled = false;
    let timer: NodeJS.Timeout | undefined;
    let unsubscribe: () => void = () => undefined;

    const finish = (): boolean => {
      if (settled) return false;
      settled = true;
      if (timer) clearTimeout(timer);
      unsubscribe();
      return true;
    };

    // A late settlement of `promise` after a timeout or cancellation is ignored
    promise.then(
      (value) => {
        if (finish()) resolve({ status: 'completed', value });
      },
      (error: unknown) => {
        if (finish()) reject(error);
      }
    );

    unsubscribe = token.onCancellationRequested((reason) => {
      if (finish()) resolve({ status: 'cancelled', reason });
    });
    if (settled) return;

    timer = setTimeout(() => {
      if (finish()) resolve({ status: 'timed-out' });
    }, Math.max(0, timeoutMs));
  });
}
