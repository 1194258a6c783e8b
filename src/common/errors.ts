export type ErrorCategory = 'transient' | 'protocol' | 'configuration';

/**
 * Base class for every error the client raises or reports
 */
export abstract class NetworkClientError extends Error {
  abstract readonly category: ErrorCategory;

  constructor(message: string, public readonly cause?: Error) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Timeouts, refused or reset connections. Retried with backoff.
 */
export class TransientError extends NetworkClientError {
  readonly category = 'transient' as const;

  constructor(message: string, public readonly code?: string, cause?: Error) {
    super(message, cause);
  }
}

/**
 * Oversized or malformed frames, unexpected handshake replies.
 * A non-fatal protocol error tears the connection down and leaves recovery to
 * the reconnect supervisor; a fatal one faults the client.
 */
export class ProtocolError extends NetworkClientError {
  readonly category = 'protocol' as const;

  constructor(message: string, public readonly fatal: boolean = false, cause?: Error) {
    super(message, cause);
  }
}

/**
 * Invalid address or option values. Never retried.
 */
export class ConfigurationError extends NetworkClientError {
  readonly category = 'configuration' as const;

  constructor(message: string, public readonly field?: string) {
    super(message);
  }
}

const TRANSIENT_CODES = new Set([
  'ECONNREFUSED',
  'ECONNRESET',
  'ECONNABORTED',
  'ETIMEDOUT',
  'EPIPE',
  'EHOSTUNREACH',
  'ENETUNREACH',
  'ENETDOWN',
  'EAI_AGAIN',
  'ENOTFOUND'
]);

function errorCode(error: Error): string | undefined {
  const code: unknown = Reflect.get(error, 'code');
  return typeof code === 'string' ? code : undefined;
}

/**
 * Map anything thrown by a transport into the client's error taxonomy.
 * Unknown failures are treated as transient so they go through the retry path.
 */
export function classifyError(error: unknown): NetworkClientError {
  if (error instanceof NetworkClientError) {
    return error;
  }

  if (error instanceof Error) {
    const code = errorCode(error);
    if (code && TRANSIENT_CODES.has(code)) {
      return new TransientError(error.message, code, error);
    }
    if (code === 'ERR_SOCKET_BAD_PORT' || code === 'ERR_INVALID_URL' || code === 'ERR_INVALID_ARG_VALUE') {
      return new ConfigurationError(error.message);
    }
    return new TransientError(error.message, code, error);
  }

  return new TransientError(String(error));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
