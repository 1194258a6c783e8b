import { BackoffStrategy, Endpoint, HeartbeatMode, TransportKind } from '../types';
import { ConfigurationError } from '../common/errors';

export interface ConnectionConfig {
  /** `host:port`, optionally prefixed with `tcp://`, `grpc://` or `ws://` */
  serverAddress: string;
  transport: TransportKind;
  connectTimeoutMs: number;
  maxRetryAttempts: number;
  retryBaseDelayMs: number;
  retryMaxDelayMs: number;
  backoffStrategy: BackoffStrategy;
  enableJitter: boolean;
  jitterRatio: number;
  enableKeepalive: boolean;
  keepaliveIntervalMs: number;
  probeTimeoutMs: number;
  heartbeatMode: HeartbeatMode;
  enableAutoReconnect: boolean;
  reconnectDelayMs: number;
  enableCompression: boolean;
  compressionThresholdBytes: number;
  maxFrameSizeBytes: number;
  sendQueueCapacity: number;
  disconnectTimeoutMs: number;
  gracefulCloseTimeoutMs: number;
  disposeTimeoutMs: number;
  protocolVersion: number;
  name: string;
  enableLogging: boolean;
}

export type ConnectionConfigInput = Partial<ConnectionConfig> & Pick<ConnectionConfig, 'serverAddress'>;

export type ResolvedConnectionConfig = Readonly<ConnectionConfig> & { readonly endpoint: Readonly<Endpoint> };

export const DEFAULT_CONNECTION_CONFIG: Readonly<Omit<ConnectionConfig, 'serverAddress' | 'transport' | 'heartbeatMode'>> = {
  connectTimeoutMs: 5000,
  maxRetryAttempts: 3,
  retryBaseDelayMs: 1000,
  retryMaxDelayMs: 30000,
  backoffStrategy: 'linear',
  enableJitter: false,
  jitterRatio: 0.2,
  enableKeepalive: true,
  keepaliveIntervalMs: 30000,
  probeTimeoutMs: 5000,
  enableAutoReconnect: true,
  reconnectDelayMs: 5000,
  enableCompression: true,
  compressionThresholdBytes: 512,
  maxFrameSizeBytes: 64 * 1024,
  sendQueueCapacity: 1024,
  disconnectTimeoutMs: 2000,
  gracefulCloseTimeoutMs: 100,
  disposeTimeoutMs: 5000,
  protocolVersion: 1,
  name: 'connection-client',
  enableLogging: true
};

const SCHEMES: Record<string, TransportKind> = {
  'tcp': 'tcp',
  'grpc': 'grpc',
  'ws': 'websocket'
};

/**
 * Split `scheme://host:port` into its parts. IPv6 hosts go in brackets: `[::1]:4000`.
 */
export function parseServerAddress(address: string): { transport?: TransportKind; endpoint: Endpoint } {
  const trimmed = address.trim();
  if (trimmed.length === 0) {
    throw new ConfigurationError('serverAddress must not be empty', 'serverAddress');
  }

  let transport: TransportKind | undefined;
  let rest = trimmed;
  const schemeIndex = trimmed.indexOf('://');
  if (schemeIndex !== -1) {
    const scheme = trimmed.slice(0, schemeIndex).toLowerCase();
    transport = SCHEMES[scheme];
    if (!transport) {
      throw new ConfigurationError(`Unsupported address scheme '${scheme}'`, 'serverAddress');
    }
    rest = trimmed.slice(schemeIndex + 3);
  }

  const match = /^(\[[^\]]+\]|[^:/\s]+):(\d+)$/.exec(rest);
  if (!match) {
    throw new ConfigurationError(`Invalid server address '${address}', expected host:port`, 'serverAddress');
  }

  const host = match[1].startsWith('[') ? match[1].slice(1, -1) : match[1];
  const port = Number(match[2]);
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigurationError(`Invalid port ${match[2]} in server address`, 'serverAddress');
  }

  return { transport, endpoint: { host, port } };
}

function requirePositive(config: ConnectionConfig, field: keyof ConnectionConfig): void {
  const value = config[field];
  if (typeof value !== 'number' || !Number.isFinite(value) || value <= 0) {
    throw new ConfigurationError(`${field} must be a positive number, got ${String(value)}`, field);
  }
}

function requireNonNegative(config: ConnectionConfig, field: keyof ConnectionConfig): void {
  const value = config[field];
  if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
    throw new ConfigurationError(`${field} must be a non-negative number, got ${String(value)}`, field);
  }
}

/**
 * Apply defaults, validate and freeze. Throws ConfigurationError synchronously.
 */
export function resolveConnectionConfig(input: ConnectionConfigInput): ResolvedConnectionConfig {
  const { transport: schemeTransport, endpoint } = parseServerAddress(input.serverAddress);
  const transport = input.transport ?? schemeTransport ?? 'tcp';

  if (schemeTransport && input.transport && schemeTransport !== input.transport) {
    throw new ConfigurationError(
      `serverAddress scheme implies '${schemeTransport}' but transport is '${input.transport}'`,
      'transport'
    );
  }

  const config: ConnectionConfig = {
    ...DEFAULT_CONNECTION_CONFIG,
    heartbeatMode: transport === 'grpc' ? 'ack' : 'emit',
    ...input,
    transport
  };

  for (const field of [
    'connectTimeoutMs',
    'keepaliveIntervalMs',
    'probeTimeoutMs',
    'reconnectDelayMs',
    'maxFrameSizeBytes',
    'sendQueueCapacity',
    'disconnectTimeoutMs',
    'disposeTimeoutMs'
  ] as const) {
    requirePositive(config, field);
  }

  for (const field of ['retryBaseDelayMs', 'retryMaxDelayMs', 'compressionThresholdBytes', 'gracefulCloseTimeoutMs'] as const) {
    requireNonNegative(config, field);
  }

  if (!Number.isInteger(config.maxRetryAttempts) || config.maxRetryAttempts < 1) {
    throw new ConfigurationError(
      `maxRetryAttempts must be an integer >= 1, got ${config.maxRetryAttempts}`,
      'maxRetryAttempts'
    );
  }

  if (!Number.isInteger(config.sendQueueCapacity)) {
    throw new ConfigurationError('sendQueueCapacity must be an integer', 'sendQueueCapacity');
  }

  if (config.jitterRatio < 0 || config.jitterRatio >= 1) {
    throw new ConfigurationError(`jitterRatio must be in [0, 1), got ${config.jitterRatio}`, 'jitterRatio');
  }

  if (config.backoffStrategy !== 'linear' && config.backoffStrategy !== 'exponential') {
    throw new ConfigurationError(`Unknown backoffStrategy '${String(config.backoffStrategy)}'`, 'backoffStrategy');
  }

  if (config.heartbeatMode !== 'emit' && config.heartbeatMode !== 'ack') {
    throw new ConfigurationError(`Unknown heartbeatMode '${String(config.heartbeatMode)}'`, 'heartbeatMode');
  }

  return Object.freeze({ ...config, endpoint: Object.freeze({ ...endpoint }) });
}

export function formatEndpoint(endpoint: Endpoint): string {
  return endpoint.host.includes(':') ? `[${endpoint.host}]:${endpoint.port}` : `${endpoint.host}:${endpoint.port}`;
}
