import { EventEmitter } from 'events';
import { ConnectResult, ConnectionMetrics, ConnectionState, DisconnectResult } from '../types';
import { ConnectionClient } from '../client/ConnectionClient';
import { ResumptionStore } from '../client/ResumptionStore';
import { ConnectionConfigInput } from '../config/ConnectionConfig';
import { CancellationScopeManager } from '../cancellation/CancellationScopeManager';
import { TransportFactory } from '../transport/ClientTransport';
import { Subscription } from '../events/EventNotifier';
import { ConfigurationError } from '../common/errors';
import { Logger, createLogger } from '../common/logger';

export interface ConnectionManagerOptions {
  scopes?: CancellationScopeManager;
  transportFactory?: TransportFactory;
  resumptionStore?: ResumptionStore;
  enableLogging?: boolean;
  logger?: Logger;
}

export interface AggregatedMetrics {
  clients: number;
  connected: number;
  totalConnections: number;
  totalDisconnections: number;
  totalErrors: number;
  messagesSent: number;
  messagesReceived: number;
  bytesSent: number;
  bytesReceived: number;
  byName: Record<string, ConnectionMetrics>;
}

export interface ConnectionManager {
  on(event: 'protocol-connected', listener: (event: { name: string; serverAddress: string }) => void): this;
  on(event: 'protocol-disconnected', listener: (event: { name: string; reason: string }) => void): this;
  on(event: 'protocol-error', listener: (event: { name: string; message: string }) => void): this;
  on(event: 'client-registered' | 'client-removed', listener: (name: string) => void): this;

  emit(event: 'protocol-connected', payload: { name: string; serverAddress: string }): boolean;
  emit(event: 'protocol-disconnected', payload: { name: string; reason: string }): boolean;
  emit(event: 'protocol-error', payload: { name: string; message: string }): boolean;
  emit(event: 'client-registered' | 'client-removed', name: string): boolean;
}

interface Registration {
  client: ConnectionClient;
  subscriptions: Subscription[];
}

/**
 * Registry of named clients (one per backend/protocol) sharing a scope manager,
 * transport factory and resumption store.
 */
export class ConnectionManager extends EventEmitter {
  private readonly registrations = new Map<string, Registration>();
  private readonly scopes: CancellationScopeManager;
  private readonly ownsScopes: boolean;
  private readonly logger: Logger;
  private disposed = false;

  constructor(private readonly options: ConnectionManagerOptions = {}) {
    super();
    this.ownsScopes = options.scopes === undefined;
    this.scopes = options.scopes ?? new CancellationScopeManager({ enableLogging: options.enableLogging });
    this.logger = options.logger ?? createLogger('ConnectionManager', { enabled: options.enableLogging ?? true });
  }

  /**
   * Create and register a client. Its `name` is the registry key.
   */
  register(config: ConnectionConfigInput): ConnectionClient {
    if (this.disposed) {
      throw new Error('ConnectionManager has been disposed');
    }

    const client = new ConnectionClient(config, {
      scopes: this.scopes,
      transportFactory: this.options.transportFactory,
      resumptionStore: this.options.resumptionStore
    });
    const name = client.getConfig().name;

    if (this.registrations.has(name)) {
      throw new ConfigurationError(`Connection '${name}' is already registered`, 'name');
    }

    const subscriptions = [
      client.events.onConnected((serverAddress) => this.emit('protocol-connected', { name, serverAddress })),
      client.events.onDisconnected((reason) => this.emit('protocol-disconnected', { name, reason })),
      client.events.onError((message) => this.emit('protocol-error', { name, message }))
    ];

    this.registrations.set(name, { client, subscriptions });
    this.logger.info(`Registered ${name} -> ${client.getConfig().serverAddress}`);
    this.emit('client-registered', name);
    return client;
  }

  get(name: string): ConnectionClient | undefined {
    return this.registrations.get(name)?.client;
  }

  has(name: string): boolean {
    return this.registrations.has(name);
  }

  getNames(): string[] {
    return Array.from(this.registrations.keys());
  }

  connect(name: string): Promise<ConnectResult> {
    return this.require(name).connect();
  }

  async connectAll(): Promise<Map<string, ConnectResult>> {
    const entries = Array.from(this.registrations.entries());
    const results = await Promise.all(entries.map(([, registration]) => registration.client.connect()));
    return new Map(entries.map(([name], index) => [name, results[index]]));
  }

  disconnect(name: string): Promise<DisconnectResult> {
    return this.require(name).disconnect();
  }

  async disconnectAll(): Promise<void> {
    await Promise.all(Array.from(this.registrations.values()).map(({ client }) => client.disconnect()));
  }

  /**
   * Dispose and unregister a client
   */
  async remove(name: string): Promise<boolean> {
    const registration = this.registrations.get(name);
    if (!registration) return false;

    this.registrations.delete(name);
    registration.subscriptions.forEach(subscription => subscription.unsubscribe());
    await registration.client.dispose();
    this.emit('client-removed', name);
    return true;
  }

  getState(name: string): ConnectionState | undefined {
    return this.registrations.get(name)?.client.getState();
  }

  getConnectedNames(): string[] {
    return Array.from(this.registrations.entries())
      .filter(([, { client }]) => client.isConnected())
      .map(([name]) => name);
  }

  getMetrics(): AggregatedMetrics {
    const aggregate: AggregatedMetrics = {
      clients: this.registrations.size,
      connected: 0,
      totalConnections: 0,
      totalDisconnections: 0,
      totalErrors: 0,
      messagesSent: 0,
      messagesReceived: 0,
      bytesSent: 0,
      bytesReceived: 0,
      byName: {}
    };

    for (const [name, { client }] of this.registrations) {
      const metrics = client.getMetrics();
      aggregate.byName[name] = metrics;
      aggregate.connected += client.isConnected() ? 1 : 0;
      aggregate.totalConnections += metrics.totalConnections;
      aggregate.totalDisconnections += metrics.totalDisconnections;
      aggregate.totalErrors += metrics.totalErrors;
      aggregate.messagesSent += metrics.messagesSent;
      aggregate.messagesReceived += metrics.messagesReceived;
      aggregate.bytesSent += metrics.bytesSent;
      aggregate.bytesReceived += metrics.bytesReceived;
    }

    return aggregate;
  }

  /**
   * Dispose every client; shuts the scope manager down when this manager created it
   */
  async dispose(): Promise<void> {
    if (this.disposed) return;
    this.disposed = true;

    await Promise.all(this.getNames().map(name => this.remove(name)));
    if (this.ownsScopes) {
      this.scopes.shutdown();
    }
    this.removeAllListeners();
  }

  private require(name: string): ConnectionClient {
    const client = this.registrations.get(name)?.client;
    if (!client) {
      throw new ConfigurationError(`Unknown connection '${name}'`, 'name');
    }
    return client;
  }
}
