import * as yaml from 'js-yaml';
import { promises as fs } from 'fs';
import { EventEmitter } from 'events';
import {
  ConnectionConfig,
  ConnectionConfigInput,
  ResolvedConnectionConfig,
  resolveConnectionConfig
} from './ConnectionConfig';
import { BackoffStrategy, HeartbeatMode, TransportKind } from '../types';
import { ConfigurationError, errorMessage } from '../common/errors';

/**
 * YAML layout:
 *
 * ```yaml
 * connections:
 *   lobby:
 *     server_address: tcp://lobby.internal:7000
 *     max_retry_attempts: 5
 *   matchmaking:
 *     server_address: grpc://mm.internal:50051
 * environments:
 *   production:
 *     connections:
 *       lobby:
 *         enable_jitter: true
 * ```
 */
export interface YamlConnectionDocument {
  connections: Record<string, Record<string, unknown>>;
  environments?: Record<string, { connections?: Record<string, Record<string, unknown>> }>;
}

type KeysOfType<V> = { [K in keyof ConnectionConfig]: ConnectionConfig[K] extends V ? K : never }[keyof ConnectionConfig];

const NUMBER_FIELDS: Record<string, KeysOfType<number>> = {
  connect_timeout_ms: 'connectTimeoutMs',
  max_retry_attempts: 'maxRetryAttempts',
  retry_base_delay_ms: 'retryBaseDelayMs',
  retry_max_delay_ms: 'retryMaxDelayMs',
  jitter_ratio: 'jitterRatio',
  keepalive_interval_ms: 'keepaliveIntervalMs',
  probe_timeout_ms: 'probeTimeoutMs',
  reconnect_delay_ms: 'reconnectDelayMs',
  compression_threshold_bytes: 'compressionThresholdBytes',
  max_frame_size_bytes: 'maxFrameSizeBytes',
  send_queue_capacity: 'sendQueueCapacity',
  disconnect_timeout_ms: 'disconnectTimeoutMs',
  graceful_close_timeout_ms: 'gracefulCloseTimeoutMs',
  dispose_timeout_ms: 'disposeTimeoutMs',
  protocol_version: 'protocolVersion'
};

const BOOLEAN_FIELDS: Record<string, KeysOfType<boolean>> = {
  enable_jitter: 'enableJitter',
  enable_keepalive: 'enableKeepalive',
  enable_auto_reconnect: 'enableAutoReconnect',
  enable_compression: 'enableCompression',
  enable_logging: 'enableLogging'
};

const STRING_FIELDS = ['server_address', 'name', 'transport', 'backoff_strategy', 'heartbeat_mode'];

const TRANSPORTS: readonly TransportKind[] = ['tcp', 'grpc', 'websocket'];
const BACKOFF_STRATEGIES: readonly BackoffStrategy[] = ['linear', 'exponential'];
const HEARTBEAT_MODES: readonly HeartbeatMode[] = ['emit', 'ack'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setField<K extends keyof ConnectionConfig>(
  target: Partial<ConnectionConfig>,
  key: K,
  value: ConnectionConfig[K]
): void {
  target[key] = value;
}

function pickOption<T extends string>(value: unknown, allowed: readonly T[], field: string): T {
  const match = allowed.find(option => option === value);
  if (match === undefined) {
    throw new ConfigurationError(`${field} must be one of ${allowed.join(', ')}, got ${String(value)}`, field);
  }
  return match;
}

/**
 * Loads named connection configurations from YAML, applying `environments`
 * overrides for the selected environment before resolution.
 */
export class ConnectionConfigLoader extends EventEmitter {
  private configs = new Map<string, ResolvedConnectionConfig>();
  private configPath: string | null = null;
  private currentEnvironment: string;

  constructor(environment: string = 'development') {
    super();
    this.currentEnvironment = environment;
  }

  async loadFromFile(filePath: string): Promise<ResolvedConnectionConfig[]> {
    try {
      const yamlContent = await fs.readFile(filePath, 'utf8');
      const configs = this.parseFromYaml(yamlContent);
      this.configPath = filePath;
      this.emit('config-loaded', { filePath, names: configs.map(config => config.name) });
      return configs;
    } catch (error) {
      this.emit('config-error', { filePath, error });
      if (error instanceof ConfigurationError) {
        throw error;
      }
      throw new ConfigurationError(`Failed to load connection configuration from ${filePath}: ${errorMessage(error)}`);
    }
  }

  /**
   * Parse and resolve every connection in the document. Replaces previously loaded configs.
   */
  parseFromYaml(yamlContent: string): ResolvedConnectionConfig[] {
    let parsed: unknown;
    try {
      parsed = yaml.load(yamlContent);
    } catch (error) {
      throw new ConfigurationError(`Failed to parse YAML configuration: ${errorMessage(error)}`);
    }

    const document = ConnectionConfigLoader.validateDocument(parsed);
    const sections = this.applyEnvironmentOverrides(document);

    const configs = new Map<string, ResolvedConnectionConfig>();
    for (const [name, section] of Object.entries(sections)) {
      configs.set(name, resolveConnectionConfig(ConnectionConfigLoader.toConfigInput(name, section)));
    }

    this.configs = configs;
    return Array.from(configs.values());
  }

  getConnection(name: string): ResolvedConnectionConfig | undefined {
    return this.configs.get(name);
  }

  getConnections(): ResolvedConnectionConfig[] {
    return Array.from(this.configs.values());
  }

  getConfigPath(): string | null {
    return this.configPath;
  }

  getEnvironment(): string {
    return this.currentEnvironment;
  }

  /**
   * Takes effect on the next load
   */
  setEnvironment(environment: string): void {
    this.currentEnvironment = environment;
  }

  async saveToFile(filePath: string, configs: ConnectionConfig[] = this.getConnections()): Promise<void> {
    try {
      await fs.writeFile(filePath, ConnectionConfigLoader.toYaml(configs), 'utf8');
      this.emit('config-saved', { filePath });
    } catch (error) {
      this.emit('config-error', { filePath, error });
      throw new ConfigurationError(`Failed to save connection configuration to ${filePath}: ${errorMessage(error)}`);
    }
  }

  /**
   * Dump configs back to the snake_case document layout, keyed by config name
   */
  static toYaml(configs: ConnectionConfig[]): string {
    const connections: Record<string, Record<string, unknown>> = {};

    for (const config of configs) {
      const section: Record<string, unknown> = {
        server_address: config.serverAddress,
        transport: config.transport,
        backoff_strategy: config.backoffStrategy,
        heartbeat_mode: config.heartbeatMode
      };
      for (const [snake, key] of Object.entries(NUMBER_FIELDS)) {
        section[snake] = config[key];
      }
      for (const [snake, key] of Object.entries(BOOLEAN_FIELDS)) {
        section[snake] = config[key];
      }
      connections[config.name] = section;
    }

    return yaml.dump({ connections }, {
      indent: 2,
      lineWidth: 100,
      quotingType: '"',
      forceQuotes: false
    });
  }

  static toConfigInput(name: string, section: Record<string, unknown>): ConnectionConfigInput {
    const serverAddress = section.server_address;
    if (typeof serverAddress !== 'string') {
      throw new ConfigurationError(`connections.${name}.server_address is required`, 'serverAddress');
    }

    const input: Partial<ConnectionConfig> = { name };

    for (const [snake, value] of Object.entries(section)) {
      if (value === undefined || value === null) continue;

      const numberKey = NUMBER_FIELDS[snake];
      const booleanKey = BOOLEAN_FIELDS[snake];

      if (numberKey) {
        if (typeof value !== 'number') {
          throw new ConfigurationError(`connections.${name}.${snake} must be a number`, numberKey);
        }
        setField(input, numberKey, value);
      } else if (booleanKey) {
        if (typeof value !== 'boolean') {
          throw new ConfigurationError(`connections.${name}.${snake} must be a boolean`, booleanKey);
        }
        setField(input, booleanKey, value);
      } else if (!STRING_FIELDS.includes(snake)) {
        throw new ConfigurationError(`Unknown option connections.${name}.${snake}`, snake);
      }
    }

    if (typeof section.name === 'string') {
      input.name = section.name;
    }
    if (section.transport !== undefined) {
      input.transport = pickOption(section.transport, TRANSPORTS, 'transport');
    }
    if (section.backoff_strategy !== undefined) {
      input.backoffStrategy = pickOption(section.backoff_strategy, BACKOFF_STRATEGIES, 'backoffStrategy');
    }
    if (section.heartbeat_mode !== undefined) {
      input.heartbeatMode = pickOption(section.heartbeat_mode, HEARTBEAT_MODES, 'heartbeatMode');
    }

    return { ...input, serverAddress };
  }

  private static validateDocument(parsed: unknown): YamlConnectionDocument {
    if (!isRecord(parsed)) {
      throw new ConfigurationError('Configuration document must be a mapping');
    }

    const connections = parsed.connections;
    if (!isRecord(connections) || Object.keys(connections).length === 0) {
      throw new ConfigurationError('connections mapping is required and must not be empty');
    }

    const document: YamlConnectionDocument = { connections: {} };
    for (const [name, section] of Object.entries(connections)) {
      if (!isRecord(section)) {
        throw new ConfigurationError(`connections.${name} must be a mapping`);
      }
      document.connections[name] = section;
    }

    const environments = parsed.environments;
    if (environments !== undefined) {
      if (!isRecord(environments)) {
        throw new ConfigurationError('environments must be a mapping');
      }
      document.environments = {};
      for (const [env, override] of Object.entries(environments)) {
        if (!isRecord(override)) {
          throw new ConfigurationError(`environments.${env} must be a mapping`);
        }
        const overrideConnections: Record<string, Record<string, unknown>> = {};
        const rawConnections = override.connections ?? {};
        if (!isRecord(rawConnections)) {
          throw new ConfigurationError(`environments.${env}.connections must be a mapping`);
        }
        for (const [name, section] of Object.entries(rawConnections)) {
          if (!isRecord(section)) {
            throw new ConfigurationError(`environments.${env}.connections.${name} must be a mapping`);
          }
          overrideConnections[name] = section;
        }
        document.environments[env] = { connections: overrideConnections };
      }
    }

    return document;
  }

  private applyEnvironmentOverrides(document: YamlConnectionDocument): Record<string, Record<string, unknown>> {
    const merged: Record<string, Record<string, unknown>> = { ...document.connections };
    const overrides = document.environments?.[this.currentEnvironment]?.connections;
    if (!overrides) {
      return merged;
    }

    for (const [name, override] of Object.entries(overrides)) {
      merged[name] = { ...merged[name], ...override };
    }
    return merged;
  }
}
