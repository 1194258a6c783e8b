import { EventEmitter } from 'eventemitter3';
import { ProbeResult } from '../types';
import { CancellationToken, delay } from '../cancellation/CancellationToken';
import { jitterInterval } from '../backoff/BackoffPolicy';
import { Logger, createLogger } from '../common/logger';

export interface ProbeTarget {
  probe(): Promise<ProbeResult>;
}

export interface HealthMonitorOptions {
  intervalMs: number;
  enableJitter?: boolean;
  jitterRatio?: number;
  random?: () => number;
  name?: string;
  enableLogging?: boolean;
  logger?: Logger;
}

/**
 * Periodic liveness probe for one connection. Started with the connection's
 * token; the first failed probe is reported and ends the loop.
 */
export class HealthMonitor extends EventEmitter {
  private readonly options: Required<Omit<HealthMonitorOptions, 'logger'>>;
  private readonly logger: Logger;
  private running = false;
  private probeCount = 0;
  private failureCount = 0;

  constructor(
    private readonly target: ProbeTarget,
    private readonly onFailure: (reason: string) => void,
    options: HealthMonitorOptions
  ) {
    super();
    this.options = {
      intervalMs: options.intervalMs,
      enableJitter: options.enableJitter ?? false,
      jitterRatio: options.jitterRatio ?? 0.2,
      random: options.random ?? Math.random,
      name: options.name ?? 'health-monitor',
      enableLogging: options.enableLogging ?? true
    };
    this.logger = options.logger ?? createLogger(`HealthMonitor:${this.options.name}`, {
      enabled: this.options.enableLogging
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  getStats(): { probes: number; failures: number } {
    return { probes: this.probeCount, failures: this.failureCount };
  }

  /**
   * Resolves when the token is cancelled or a probe fails
   */
  async start(token: CancellationToken): Promise<void> {
    if (this.running) {
      throw new Error('HealthMonitor is already running');
    }
    this.running = true;
    this.emit('started');

    try {
      while (!token.isCancellationRequested) {
        const elapsed = await delay(this.nextInterval(), token);
        if (!elapsed) break;

        const result = await this.target.probe();
        this.probeCount++;
        if (token.isCancellationRequested) break;

        if (result.ok) {
          this.emit('probe-succeeded', result);
          continue;
        }

        if (result.reason === 'cancelled') break;

        this.failureCount++;
        const reason = `health probe failed: ${result.reason}`;
        this.logger.warn(reason);
        this.emit('probe-failed', result);
        this.onFailure(reason);
        break;
      }
    } finally {
      this.running = false;
      this.emit('stopped');
    }
  }

  private nextInterval(): number {
    return this.options.enableJitter
      ? jitterInterval(this.options.intervalMs, this.options.jitterRatio, this.options.random)
      : this.options.intervalMs;
  }
}
