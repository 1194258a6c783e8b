import { EventEmitter } from 'events';
import { Endpoint, TransportKind } from '../types';
import { CancellationToken, raceWithTimeout } from '../cancellation/CancellationToken';
import { OperationCancelledError } from '../cancellation/CancellationScopeManager';
import { TransientError } from '../common/errors';

export interface ClientTransport {
  on(event: 'data', listener: (chunk: Buffer) => void): this;
  on(event: 'close', listener: (reason: string, error?: Error) => void): this;

  emit(event: 'data', chunk: Buffer): boolean;
  emit(event: 'close', reason: string, error?: Error): boolean;
}

/**
 * One outbound byte-stream connection. A transport instance is opened once;
 * reconnecting means creating a new instance through the factory.
 *
 * `close` fires at most once and only for closures the caller did not start
 * with `destroy()`.
 */
export abstract class ClientTransport extends EventEmitter {
  abstract readonly kind: TransportKind | 'memory';

  private opened = false;
  private closed = false;

  get isOpen(): boolean {
    return this.opened && !this.closed;
  }

  /**
   * Connect within `timeoutMs`. Rejects with TransientError on timeout or
   * refusal, OperationCancelledError when the token fires first.
   */
  async open(endpoint: Endpoint, timeoutMs: number, token: CancellationToken): Promise<void> {
    if (this.opened || this.closed) {
      throw new Error('Transport instances cannot be reopened');
    }

    const outcome = await raceWithTimeout(this.doOpen(endpoint, timeoutMs), timeoutMs, token);

    switch (outcome.status) {
      case 'completed':
        if (this.closed) {
          throw new TransientError('Connection closed during open', 'ECONNRESET');
        }
        this.opened = true;
        return;
      case 'timed-out':
        this.destroy();
        throw new TransientError(`Connect timed out after ${timeoutMs}ms`, 'ETIMEDOUT');
      case 'cancelled':
        this.destroy();
        throw new OperationCancelledError(outcome.reason);
    }
  }

  abstract write(frame: Buffer): Promise<void>;

  /**
   * Half-close: flush pending writes and signal end of stream
   */
  abstract end(): Promise<void>;

  /**
   * Release the underlying resource immediately
   */
  destroy(): void {
    if (this.closed) return;
    this.closed = true;
    this.doDestroy();
  }

  protected abstract doOpen(endpoint: Endpoint, timeoutMs: number): Promise<void>;

  protected abstract doDestroy(): void;

  /**
   * Called by implementations when the peer or the network ends the stream
   */
  protected markClosed(reason: string, error?: Error): void {
    if (this.closed) return;
    this.closed = true;
    this.doDestroy();
    if (this.opened) {
      this.emit('close', reason, error);
    }
  }

  protected get isClosed(): boolean {
    return this.closed;
  }
}

export type TransportFactory = (kind: TransportKind) => ClientTransport;
