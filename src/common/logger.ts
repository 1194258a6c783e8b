/**
 * Logging utility for the network client
 * Provides per-component, switchable console logging
 */

export interface Logger {
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
  debug(message: string, ...args: unknown[]): void;
}

export interface LoggingConfig {
  enabled?: boolean;
  enableTestMode?: boolean;
}

export class ComponentLogger implements Logger {
  private readonly config: Required<LoggingConfig>;

  constructor(private readonly component: string, config: LoggingConfig = {}) {
    this.config = {
      enabled: config.enabled ?? true,
      // Auto-detect test mode if not explicitly set
      enableTestMode: config.enableTestMode ??
        (process.env.NODE_ENV === 'test' || process.env.JEST_WORKER_ID !== undefined)
    };
  }

  info(message: string, ...args: unknown[]): void {
    if (this.isActive()) {
      console.log(`[${this.component}] ${message}`, ...args);
    }
  }

  /**
   * Warnings and errors are shown even when component logging is disabled,
   * unless running under test
   */
  warn(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.warn(`[WARN] [${this.component}] ${message}`, ...args);
    }
  }

  error(message: string, ...args: unknown[]): void {
    if (!this.config.enableTestMode) {
      console.error(`[ERROR] [${this.component}] ${message}`, ...args);
    }
  }

  /**
   * Debug messages (only in development)
   */
  debug(message: string, ...args: unknown[]): void {
    if (process.env.NODE_ENV === 'development' && this.isActive()) {
      console.debug(`[DEBUG] [${this.component}] ${message}`, ...args);
    }
  }

  private isActive(): boolean {
    return this.config.enabled && !this.config.enableTestMode;
  }
}

/**
 * Create a logger for a component, e.g. `createLogger('ConnectionClient:lobby')`
 */
export function createLogger(component: string, config: LoggingConfig = {}): Logger {
  return new ComponentLogger(component, config);
}
