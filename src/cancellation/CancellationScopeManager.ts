import { EventEmitter } from 'eventemitter3';
import { CancellationToken, CancellationTokenSource, raceWithTimeout } from './CancellationToken';
import { CompletionSignal } from './CompletionSignal';
import { Logger, createLogger } from '../common/logger';
import { TransientError, errorMessage } from '../common/errors';

export type OperationScope = 'app' | 'session';

export type OperationStatus = 'running' | 'completed' | 'cancelled' | 'failed';

export interface OperationRecord {
  id: number;
  name: string;
  scope: OperationScope;
  status: OperationStatus;
  startTime: number;
  endTime?: number;
  error?: Error;
}

export type OperationOutcome<T> =
  | { status: 'completed'; value: T }
  | { status: 'cancelled'; reason: string }
  | { status: 'failed'; error: Error };

export interface RunOptions {
  scope?: OperationScope;
  /** Cancels the operation's token and reports it as failed once exceeded */
  timeoutMs?: number;
  /** Extra parent token, e.g. a per-connection token under the session scope */
  linkedToken?: CancellationToken;
}

export interface CancellationScopeManagerOptions {
  signalPoolSize?: number;
  enableLogging?: boolean;
  logger?: Logger;
}

/**
 * Thrown by operations that notice their token was cancelled and want to
 * unwind; the manager reports it as a cancellation, never as a failure.
 */
export class OperationCancelledError extends Error {
  constructor(public readonly reason: string = 'cancelled') {
    super(`Operation cancelled: ${reason}`);
    this.name = 'OperationCancelledError';
  }
}

/**
 * Hierarchical cancellation domains: an app scope living until `shutdown()`
 * and a session scope that is replaced on every `cancelSession()`/`resetSession()`.
 * Tracks running operations for introspection.
 */
export class CancellationScopeManager extends EventEmitter {
  private appSource = new CancellationTokenSource();
  private sessionSource: CancellationTokenSource;
  private readonly operations = new Map<number, OperationRecord>();
  private readonly signalPool: CompletionSignal[] = [];
  private readonly options: Required<Omit<CancellationScopeManagerOptions, 'logger'>>;
  private readonly logger: Logger;
  private nextOperationId = 1;
  private generation = 1;
  private isShutdown = false;

  constructor(options: CancellationScopeManagerOptions = {}) {
    super();
    this.options = {
      signalPoolSize: options.signalPoolSize ?? 20,
      enableLogging: options.enableLogging ?? true
    };
    this.logger = options.logger ?? createLogger('CancellationScopeManager', { enabled: this.options.enableLogging });
    this.sessionSource = new CancellationTokenSource(this.appSource.token);
  }

  get appToken(): CancellationToken {
    return this.appSource.token;
  }

  get sessionToken(): CancellationToken {
    return this.sessionSource.token;
  }

  get sessionGeneration(): number {
    return this.generation;
  }

  get isShutDown(): boolean {
    return this.isShutdown;
  }

  /**
   * Token cancelled when either the app scope or the current session scope is cancelled.
   * The session source is itself linked to the app source, so its token covers both.
   */
  getLinkedToken(): CancellationToken {
    return this.sessionSource.token;
  }

  resolveToken(scope: OperationScope): CancellationToken {
    return scope === 'session' ? this.getLinkedToken() : this.appToken;
  }

  /**
   * Run an operation under the resolved scope token, tracking it until it settles
   */
  async runAsync<T>(
    operation: (token: CancellationToken) => Promise<T>,
    name: string = 'operation',
    options: RunOptions = {}
  ): Promise<OperationOutcome<T>> {
    const scope = options.scope ?? 'session';
    const record: OperationRecord = {
      id: this.nextOperationId++,
      name,
      scope,
      status: 'running',
      startTime: Date.now()
    };

    if (this.isShutdown) {
      this.finish(record, 'cancelled');
      return { status: 'cancelled', reason: 'shutdown' };
    }

    const parents = options.linkedToken ? [this.resolveToken(scope), options.linkedToken] : [this.resolveToken(scope)];
    const source = new CancellationTokenSource(...parents);
    this.operations.set(record.id, record);
    this.emit('operation-started', { ...record });

    try {
      const running = operation(source.token);
      const timeoutMs = options.timeoutMs;
      if (timeoutMs === undefined) {
        const value = await running;
        return this.settle(record, source, value);
      }

      const outcome = await raceWithTimeout(running, timeoutMs);
      if (outcome.status === 'completed' || source.isCancellationRequested) {
        return outcome.status === 'completed'
          ? this.settle(record, source, outcome.value)
          : this.settleCancelled(record, source.token.reason ?? 'cancelled');
      }

      source.cancel('timeout');
      const error = new TransientError(`Operation '${name}' timed out after ${timeoutMs}ms`, 'ETIMEDOUT');
      this.finish(record, 'failed', error);
      this.logger.warn(`Operation timed out: ${name}`);
      return { status: 'failed', error };
    } catch (error) {
      if (error instanceof OperationCancelledError || source.isCancellationRequested) {
        const reason = error instanceof OperationCancelledError
          ? error.reason
          : source.token.reason ?? 'cancelled';
        return this.settleCancelled(record, reason);
      }

      const failure = error instanceof Error ? error : new Error(errorMessage(error));
      this.finish(record, 'failed', failure);
      this.logger.error(`Operation failed: ${name} - ${failure.message}`);
      return { status: 'failed', error: failure };
    } finally {
      source.dispose();
      this.operations.delete(record.id);
    }
  }

  runWithTimeout<T>(
    operation: (token: CancellationToken) => Promise<T>,
    timeoutMs: number,
    name: string = 'timed-operation',
    options: Omit<RunOptions, 'timeoutMs'> = {}
  ): Promise<OperationOutcome<T>> {
    return this.runAsync(operation, name, { ...options, timeoutMs });
  }

  /**
   * Start an operation without awaiting it; failures go to `onError` (or the log)
   */
  fireAndForget(
    operation: (token: CancellationToken) => Promise<void>,
    name: string = 'fire-and-forget',
    onError?: (error: Error) => void,
    options: RunOptions = {}
  ): void {
    this.runAsync(operation, name, options).then(
      (outcome) => {
        if (outcome.status === 'failed') {
          if (onError) {
            onError(outcome.error);
          } else {
            this.logger.error(`Background operation '${name}' failed: ${outcome.error.message}`);
          }
        }
      },
      (error: unknown) => this.logger.error(`Background operation '${name}' crashed: ${errorMessage(error)}`)
    );
  }

  /**
   * Cancel every session-scoped operation and start a fresh session scope.
   * App-scoped operations keep running.
   */
  cancelSession(reason: string = 'session-cancelled'): void {
    if (this.isShutdown) return;

    const previous = this.sessionSource;
    this.sessionSource = new CancellationTokenSource(this.appSource.token);
    previous.cancel(reason);

    this.logger.info(`Session operations cancelled (${reason})`);
    this.emit('session-cancelled', { reason, generation: this.generation });
  }

  /**
   * Start a new logical session, e.g. after a re-login
   */
  resetSession(): number {
    this.cancelSession('session-reset');
    this.generation++;
    this.emit('session-reset', { generation: this.generation });
    return this.generation;
  }

  /**
   * Cancel both scopes. The manager stays usable for introspection only:
   * later operations report `cancelled` immediately.
   */
  shutdown(): void {
    if (this.isShutdown) return;
    this.isShutdown = true;

    this.appSource.cancel('shutdown');
    this.sessionSource.cancel('shutdown');

    for (const record of this.operations.values()) {
      this.finish(record, 'cancelled');
    }
    this.operations.clear();
    this.signalPool.length = 0;

    this.logger.info('All operations cancelled');
    this.emit('shutdown');
    this.removeAllListeners();
  }

  getActiveOperations(name?: string): OperationRecord[] {
    return Array.from(this.operations.values())
      .filter(record => name === undefined || record.name === name)
      .map(record => ({ ...record }));
  }

  acquireSignal(): CompletionSignal {
    const signal = this.signalPool.pop();
    if (signal) {
      signal.reset();
      return signal;
    }
    return new CompletionSignal();
  }

  releaseSignal(signal: CompletionSignal): void {
    if (this.signalPool.length < this.options.signalPoolSize && !this.signalPool.includes(signal)) {
      this.signalPool.push(signal);
    }
  }

  getPooledSignalCount(): number {
    return this.signalPool.length;
  }

  /**
   * An operation that returns after its token fired was cancelled, whatever it returned
   */
  private settle<T>(record: OperationRecord, source: CancellationTokenSource, value: T): OperationOutcome<T> {
    if (source.isCancellationRequested) {
      return this.settleCancelled(record, source.token.reason ?? 'cancelled');
    }
    this.finish(record, 'completed');
    return { status: 'completed', value };
  }

  private settleCancelled<T>(record: OperationRecord, reason: string): OperationOutcome<T> {
    this.finish(record, 'cancelled');
    this.logger.info(`Operation cancelled: ${record.name}`);
    return { status: 'cancelled', reason };
  }

  private finish(record: OperationRecord, status: OperationStatus, error?: Error): void {
    if (record.status !== 'running') return;

    record.status = status;
    record.endTime = Date.now();
    record.error = error;
    this.emit('operation-finished', { ...record });
  }
}
