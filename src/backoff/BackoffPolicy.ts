import { BackoffStrategy } from '../types';
import { ConfigurationError } from '../common/errors';

export interface BackoffOptions {
  baseDelayMs: number;
  maxDelayMs?: number;
  jitter?: boolean;
  /** Fraction of the delay used as the jitter band, 0.2 means ±20% */
  jitterRatio?: number;
  /** Injectable random source in [0, 1) */
  random?: () => number;
}

/**
 * Delay to wait after the given (1-based) failed attempt
 */
export interface BackoffPolicy {
  readonly strategy: BackoffStrategy | string;
  delayFor(attempt: number): number;
}

abstract class BaseBackoffPolicy implements BackoffPolicy {
  abstract readonly strategy: BackoffStrategy;
  protected readonly options: Required<BackoffOptions>;

  constructor(options: BackoffOptions) {
    if (!Number.isFinite(options.baseDelayMs) || options.baseDelayMs < 0) {
      throw new ConfigurationError(`baseDelayMs must be a non-negative number, got ${options.baseDelayMs}`, 'baseDelayMs');
    }

    this.options = {
      baseDelayMs: options.baseDelayMs,
      maxDelayMs: options.maxDelayMs ?? Number.POSITIVE_INFINITY,
      jitter: options.jitter ?? false,
      jitterRatio: options.jitterRatio ?? 0.2,
      random: options.random ?? Math.random
    };
  }

  delayFor(attempt: number): number {
    const n = Math.max(1, Math.floor(attempt));
    let delay = Math.min(this.rawDelay(n), this.options.maxDelayMs);

    if (this.options.jitter) {
      const jitterAmount = delay * this.options.jitterRatio;
      const jitter = (this.options.random() - 0.5) * 2 * jitterAmount;
      delay = Math.max(0, delay + jitter);
    }

    return Math.round(delay);
  }

  protected abstract rawDelay(attempt: number): number;
}

/**
 * delay = base * attempt
 */
export class LinearBackoff extends BaseBackoffPolicy {
  readonly strategy = 'linear' as const;

  protected rawDelay(attempt: number): number {
    return this.options.baseDelayMs * attempt;
  }
}

/**
 * delay = base * 2^(attempt - 1), capped at maxDelayMs
 */
export class ExponentialBackoff extends BaseBackoffPolicy {
  readonly strategy = 'exponential' as const;

  protected rawDelay(attempt: number): number {
    return this.options.baseDelayMs * Math.pow(2, attempt - 1);
  }
}

export function createBackoffPolicy(strategy: BackoffStrategy, options: BackoffOptions): BackoffPolicy {
  switch (strategy) {
    case 'linear':
      return new LinearBackoff(options);
    case 'exponential':
      return new ExponentialBackoff(options);
  }
}

/**
 * Apply the same ±ratio jitter to a fixed interval (reconnect and keepalive timers)
 */
export function jitterInterval(intervalMs: number, ratio: number, random: () => number = Math.random): number {
  const jitter = (random() - 0.5) * 2 * intervalMs * ratio;
  return Math.max(0, Math.round(intervalMs + jitter));
}
