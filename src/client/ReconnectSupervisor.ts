import { EventEmitter } from 'eventemitter3';
import { ConnectResult, ConnectionState } from '../types';
import { CancellationToken, delay } from '../cancellation/CancellationToken';
import { jitterInterval } from '../backoff/BackoffPolicy';
import { Logger, createLogger } from '../common/logger';

/**
 * The slice of the client the supervisor drives
 */
export interface ReconnectTarget {
  getState(): ConnectionState;
  connect(): Promise<ConnectResult>;
  dropConnection(reason: string): void;
}

export interface ReconnectSupervisorOptions {
  reconnectDelayMs: number;
  enableJitter?: boolean;
  jitterRatio?: number;
  random?: () => number;
  name?: string;
  enableLogging?: boolean;
  logger?: Logger;
}

/**
 * Ticks every `reconnectDelayMs` for the lifetime of a client session and
 * reconnects whenever the client sits in `disconnected`. `faulted` is left
 * alone: recovering from it takes an explicit disconnect.
 */
export class ReconnectSupervisor extends EventEmitter {
  private readonly options: Required<Omit<ReconnectSupervisorOptions, 'logger'>>;
  private readonly logger: Logger;
  private running = false;
  private reconnectAttempts = 0;
  private failuresReported = 0;

  constructor(private readonly target: ReconnectTarget, options: ReconnectSupervisorOptions) {
    super();
    this.options = {
      reconnectDelayMs: options.reconnectDelayMs,
      enableJitter: options.enableJitter ?? false,
      jitterRatio: options.jitterRatio ?? 0.2,
      random: options.random ?? Math.random,
      name: options.name ?? 'reconnect-supervisor',
      enableLogging: options.enableLogging ?? true
    };
    this.logger = options.logger ?? createLogger(`ReconnectSupervisor:${this.options.name}`, {
      enabled: this.options.enableLogging
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  getStats(): { reconnectAttempts: number; failuresReported: number } {
    return { reconnectAttempts: this.reconnectAttempts, failuresReported: this.failuresReported };
  }

  /**
   * Resolves once the token is cancelled
   */
  async start(token: CancellationToken): Promise<void> {
    if (this.running) {
      throw new Error('ReconnectSupervisor is already running');
    }
    this.running = true;
    this.emit('started');

    try {
      while (!token.isCancellationRequested) {
        const elapsed = await delay(this.nextInterval(), token);
        if (!elapsed) break;

        if (this.target.getState() !== ConnectionState.DISCONNECTED) continue;

        this.reconnectAttempts++;
        this.logger.info(`Reconnecting (attempt ${this.reconnectAttempts})`);
        this.emit('reconnect-attempt', this.reconnectAttempts);

        const result = await this.target.connect();
        this.emit('reconnect-result', result);
        if (result.ok) {
          this.logger.info('Reconnected');
        }
      }
    } finally {
      this.running = false;
      this.emit('stopped');
    }
  }

  /**
   * Health failure or another signal that the current connection is unusable
   */
  reportFailure(reason: string): void {
    this.failuresReported++;
    this.emit('failure-reported', reason);
    this.target.dropConnection(reason);
  }

  private nextInterval(): number {
    return this.options.enableJitter
      ? jitterInterval(this.options.reconnectDelayMs, this.options.jitterRatio, this.options.random)
      : this.options.reconnectDelayMs;
  }
}
