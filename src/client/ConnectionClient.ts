import { EventEmitter } from 'events';
import {
  ConnectError,
  ConnectErrorKind,
  ConnectResult,
  ConnectionMetrics,
  ConnectionState,
  DisconnectResult,
  Message,
  MessageType,
  OutboundMessage,
  ProbeResult,
  SendRejection,
  SendResult
} from '../types';
import { ConnectionConfigInput, ResolvedConnectionConfig, resolveConnectionConfig } from '../config/ConnectionConfig';
import { MessageCodec } from '../codec/MessageCodec';
import { FrameDecoder } from '../codec/FrameDecoder';
import { BackoffPolicy, createBackoffPolicy } from '../backoff/BackoffPolicy';
import {
  CancellationToken,
  CancellationTokenSource,
  delay,
  raceWithTimeout
} from '../cancellation/CancellationToken';
import { CancellationScopeManager, OperationCancelledError } from '../cancellation/CancellationScopeManager';
import { CompletionSignal } from '../cancellation/CompletionSignal';
import { EventNotifier } from '../events/EventNotifier';
import { HealthMonitor } from '../monitoring/HealthMonitor';
import { LatencyTracker } from '../monitoring/LatencyTracker';
import { ClientTransport, TransportFactory } from '../transport/ClientTransport';
import { createTransportFactory } from '../transport/createTransport';
import { OutgoingQueue } from './OutgoingQueue';
import { ReconnectSupervisor, ReconnectTarget } from './ReconnectSupervisor';
import { InMemoryResumptionStore, ResumptionStore } from './ResumptionStore';
import { Logger, createLogger } from '../common/logger';
import {
  NetworkClientError,
  ProtocolError,
  TransientError,
  classifyError,
  errorMessage
} from '../common/errors';

export interface ConnectionClientDependencies {
  scopes?: CancellationScopeManager;
  notifier?: EventNotifier;
  transportFactory?: TransportFactory;
  backoff?: BackoffPolicy;
  resumptionStore?: ResumptionStore;
  logger?: Logger;
  /** Random source for jitter */
  random?: () => number;
}

export interface StateChange {
  from: ConnectionState;
  to: ConnectionState;
  reason?: string;
}

export interface ConnectionClient {
  on(event: 'state-changed', listener: (change: StateChange) => void): this;
  emit(event: 'state-changed', change: StateChange): boolean;
}

const VALID_TRANSITIONS: Record<ConnectionState, readonly ConnectionState[]> = {
  [ConnectionState.DISCONNECTED]: [ConnectionState.CONNECTING],
  [ConnectionState.CONNECTING]: [
    ConnectionState.CONNECTED,
    ConnectionState.DISCONNECTED,
    ConnectionState.DISCONNECTING,
    ConnectionState.FAULTED
  ],
  [ConnectionState.CONNECTED]: [ConnectionState.DISCONNECTING, ConnectionState.FAULTED],
  [ConnectionState.DISCONNECTING]: [ConnectionState.DISCONNECTED],
  [ConnectionState.FAULTED]: [ConnectionState.DISCONNECTING]
};

const SEQUENCE_MODULUS = 0x100000000;

/**
 * Per-connection state; replaced wholesale on every successful connect
 */
interface ActiveConnection {
  id: number;
  transport: ClientTransport;
  source: CancellationTokenSource;
  queue: OutgoingQueue<Buffer>;
  decoder: FrameDecoder;
  connectedAt: number;
}

interface HandshakePayload {
  protocolVersion: number;
  client: string;
  resumptionToken?: string;
}

interface PendingProbe {
  sequenceNumber: number;
  signal: CompletionSignal;
}

/**
 * Resilient connection to a single backend endpoint.
 *
 * `connect()` retries transient failures with backoff, then runs a sender
 * loop, a health monitor and (optionally) a reconnect supervisor until
 * `disconnect()`. Lifecycle notifications go through `events`.
 */
export class ConnectionClient extends EventEmitter implements ReconnectTarget {
  readonly events: EventNotifier;
  private readonly config: ResolvedConnectionConfig;
  private readonly scopes: CancellationScopeManager;
  private readonly transportFactory: TransportFactory;
  private readonly backoff: BackoffPolicy;
  private readonly resumptionStore: ResumptionStore;
  private readonly logger: Logger;
  private readonly codec: MessageCodec;
  private readonly latency = new LatencyTracker(100);
  private readonly healthMonitor: HealthMonitor;
  private readonly supervisor: ReconnectSupervisor;

  private state = ConnectionState.DISCONNECTED;
  private sessionSource?: CancellationTokenSource;
  private connection?: ActiveConnection;
  private pendingProbe?: PendingProbe;
  private disconnectPromise?: Promise<DisconnectResult>;
  private disposePromise?: Promise<void>;
  private readonly backgroundTasks = new Set<Promise<unknown>>();
  private supervisorRunning = false;
  private disposed = false;
  private sequence = 0;
  private connectionCounter = 0;

  private totalConnections = 0;
  private totalDisconnections = 0;
  private totalErrors = 0;
  private messagesSent = 0;
  private messagesReceived = 0;
  private bytesSent = 0;
  private bytesReceived = 0;
  private lastActivity = 0;

  constructor(config: ConnectionConfigInput, dependencies: ConnectionClientDependencies = {}) {
    super();
    this.config = resolveConnectionConfig(config);

    const name = this.config.name;
    const enableLogging = this.config.enableLogging;
    const random = dependencies.random ?? Math.random;

    this.logger = dependencies.logger ?? createLogger(`ConnectionClient:${name}`, { enabled: enableLogging });
    this.scopes = dependencies.scopes ?? new CancellationScopeManager({ enableLogging });
    this.events = dependencies.notifier ?? new EventNotifier({ enableLogging });
    this.transportFactory = dependencies.transportFactory ?? createTransportFactory();
    this.resumptionStore = dependencies.resumptionStore ?? new InMemoryResumptionStore();
    this.backoff = dependencies.backoff ?? createBackoffPolicy(this.config.backoffStrategy, {
      baseDelayMs: this.config.retryBaseDelayMs,
      maxDelayMs: this.config.retryMaxDelayMs,
      jitter: this.config.enableJitter,
      jitterRatio: this.config.jitterRatio,
      random
    });

    this.codec = new MessageCodec({
      enableCompression: this.config.enableCompression,
      compressionThresholdBytes: this.config.compressionThresholdBytes,
      maxFrameSizeBytes: this.config.maxFrameSizeBytes
    });

    this.supervisor = new ReconnectSupervisor(this, {
      reconnectDelayMs: this.config.reconnectDelayMs,
      enableJitter: this.config.enableJitter,
      jitterRatio: this.config.jitterRatio,
      random,
      name,
      logger: this.logger
    });

    this.healthMonitor = new HealthMonitor(this, (reason) => this.supervisor.reportFailure(reason), {
      intervalMs: this.config.keepaliveIntervalMs,
      enableJitter: this.config.enableJitter,
      jitterRatio: this.config.jitterRatio,
      random,
      name,
      logger: this.logger
    });
  }

  getState(): ConnectionState {
    return this.state;
  }

  isConnected(): boolean {
    return this.state === ConnectionState.CONNECTED;
  }

  getConfig(): ResolvedConnectionConfig {
    return this.config;
  }

  getMetrics(): ConnectionMetrics {
    const connectedAt = this.connection?.connectedAt;
    return {
      totalConnections: this.totalConnections,
      totalDisconnections: this.totalDisconnections,
      totalErrors: this.totalErrors,
      averageLatency: this.latency.getAverage(),
      messagesSent: this.messagesSent,
      messagesReceived: this.messagesReceived,
      bytesSent: this.bytesSent,
      bytesReceived: this.bytesReceived,
      lastActivity: this.lastActivity,
      connectedAt,
      uptimeMs: connectedAt !== undefined && this.state === ConnectionState.CONNECTED ? Date.now() - connectedAt : 0
    };
  }

  async connect(): Promise<ConnectResult> {
    if (this.disposed) {
      return this.connectFailure('disposed', 'Client has been disposed');
    }

    switch (this.state) {
      case ConnectionState.CONNECTING:
        return this.connectFailure('already-in-progress', 'Connect already in progress');
      case ConnectionState.CONNECTED:
        return this.connectFailure('already-connected', 'Already connected');
      case ConnectionState.DISCONNECTING:
        return this.connectFailure('invalid-state', 'Disconnect in progress');
      case ConnectionState.FAULTED:
        return this.connectFailure('faulted', 'Client is faulted; call disconnect() before connecting again');
      case ConnectionState.DISCONNECTED:
        break;
    }

    this.transition(ConnectionState.CONNECTING, 'connect requested');
    const session = this.ensureSession();
    return this.track(this.runConnectAttempts(session.token));
  }

  /**
   * Queue a message for the sender loop. Never waits on the network.
   */
  send(message: OutboundMessage): SendResult {
    if (this.disposed) {
      return this.sendFailure('disposed');
    }

    const connection = this.connection;
    if (!connection || this.state !== ConnectionState.CONNECTED) {
      return this.sendFailure('not-connected');
    }

    const payload = typeof message.payload === 'string' ? Buffer.from(message.payload, 'utf8') : message.payload;
    return this.enqueue(connection, message.type ?? MessageType.DATA, payload);
  }

  disconnect(): Promise<DisconnectResult> {
    if (!this.disconnectPromise) {
      this.disconnectPromise = this.performDisconnect().finally(() => {
        this.disconnectPromise = undefined;
      });
    }
    return this.disconnectPromise;
  }

  dispose(): Promise<void> {
    if (!this.disposePromise) {
      this.disposePromise = this.performDispose();
    }
    return this.disposePromise;
  }

  /**
   * Heartbeat probe. In `ack` mode waits for the matching acknowledgement and
   * records the round trip.
   */
  async probe(): Promise<ProbeResult> {
    const connection = this.connection;
    if (!connection || this.state !== ConnectionState.CONNECTED) {
      return { ok: false, reason: 'not-connected' };
    }

    if (this.config.heartbeatMode === 'emit') {
      const sent = this.enqueue(connection, MessageType.HEARTBEAT);
      return sent.ok ? { ok: true } : { ok: false, reason: 'send-failed' };
    }

    const signal = this.scopes.acquireSignal();
    const sent = this.enqueue(connection, MessageType.HEARTBEAT);
    if (!sent.ok) {
      this.scopes.releaseSignal(signal);
      return { ok: false, reason: 'send-failed' };
    }

    const probe: PendingProbe = { sequenceNumber: sent.sequenceNumber, signal };
    this.pendingProbe = probe;
    const startedAt = Date.now();

    try {
      const outcome = await signal.wait(this.config.probeTimeoutMs, connection.source.token);
      if (outcome === 'completed') {
        const latencyMs = Date.now() - startedAt;
        this.latency.record(latencyMs);
        this.events.publish({ type: 'latency', value: latencyMs });
        return { ok: true, latencyMs };
      }
      return { ok: false, reason: outcome === 'timed-out' ? 'timeout' : 'cancelled' };
    } finally {
      if (this.pendingProbe === probe) {
        this.pendingProbe = undefined;
      }
      this.scopes.releaseSignal(signal);
    }
  }

  /**
   * Tear down the current connection as lost; the supervisor reconnects later
   */
  dropConnection(reason: string): void {
    const connection = this.connection;
    if (connection) {
      this.handleConnectionLost(connection, reason, new TransientError(reason));
    }
  }

  async saveResumptionToken(token: Buffer): Promise<void> {
    await this.resumptionStore.save(this.resumptionKey(), token);
  }

  loadResumptionToken(): Promise<Buffer | undefined> {
    return this.resumptionStore.load(this.resumptionKey());
  }

  private async runConnectAttempts(token: CancellationToken): Promise<ConnectResult> {
    const maxAttempts = this.config.maxRetryAttempts;
    const address = this.config.serverAddress;

    if (token.isCancellationRequested) {
      return this.connectCancelled(token);
    }

    const resumptionToken = await this.readResumptionToken();
    let lastError: NetworkClientError | undefined;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (attempt > 1) {
        const waitMs = this.backoff.delayFor(attempt - 1);
        this.logger.info(`Retrying ${address} in ${waitMs}ms (attempt ${attempt}/${maxAttempts})`);
        await delay(waitMs, token);
      }

      if (token.isCancellationRequested || this.state !== ConnectionState.CONNECTING) {
        return this.connectCancelled(token);
      }

      let transport: ClientTransport;
      try {
        transport = this.transportFactory(this.config.transport);
      } catch (error) {
        return this.faultDuringConnect(classifyError(error));
      }

      try {
        await transport.open(this.config.endpoint, this.config.connectTimeoutMs, token);
      } catch (error) {
        transport.destroy();
        if (error instanceof OperationCancelledError || token.isCancellationRequested ||
            this.state !== ConnectionState.CONNECTING) {
          return this.connectCancelled(token);
        }

        const classified = classifyError(error);
        this.totalErrors++;
        lastError = classified;

        if (classified.category !== 'transient') {
          return this.faultDuringConnect(classified);
        }

        this.logger.warn(`Connect attempt ${attempt}/${maxAttempts} to ${address} failed: ${classified.message}`);
        continue;
      }

      if (token.isCancellationRequested || this.state !== ConnectionState.CONNECTING) {
        transport.destroy();
        return this.connectCancelled(token);
      }

      this.establish(transport, token, resumptionToken);
      return { ok: true, attempts: attempt };
    }

    const message = `Failed to connect to ${address} after ${maxAttempts} attempts: ${lastError?.message ?? 'unknown error'}`;
    this.logger.error(message);
    this.transition(ConnectionState.DISCONNECTED, 'retries exhausted');
    this.events.publish({ type: 'error', message, category: 'transient' });
    return this.connectFailure('retries-exhausted', message, lastError);
  }

  private establish(
    transport: ClientTransport,
    sessionToken: CancellationToken,
    resumptionToken: Buffer | undefined
  ): void {
    const connection: ActiveConnection = {
      id: ++this.connectionCounter,
      transport,
      source: new CancellationTokenSource(sessionToken),
      queue: new OutgoingQueue<Buffer>(this.config.sendQueueCapacity),
      decoder: new FrameDecoder(this.config.maxFrameSizeBytes),
      connectedAt: Date.now()
    };

    transport.on('data', (chunk) => this.handleData(connection, chunk));
    transport.on('close', (reason, error) => {
      this.handleConnectionLost(connection, reason, error ?? new TransientError(reason, 'ECONNRESET'));
    });

    this.connection = connection;
    this.sequence = 0;
    this.lastActivity = connection.connectedAt;
    this.totalConnections++;
    this.transition(ConnectionState.CONNECTED, 'transport open');

    const handshake: HandshakePayload = {
      protocolVersion: this.config.protocolVersion,
      client: this.config.name
    };
    if (resumptionToken) {
      handshake.resumptionToken = resumptionToken.toString('base64');
    }
    this.enqueue(connection, MessageType.CONNECT, Buffer.from(JSON.stringify(handshake), 'utf8'));

    const name = this.config.name;
    const linkedToken = connection.source.token;
    this.track(this.scopes.runAsync((token) => this.runSender(connection, token), `${name}:sender`, { linkedToken }));
    if (this.config.enableKeepalive) {
      this.track(this.scopes.runAsync((token) => this.healthMonitor.start(token), `${name}:health`, { linkedToken }));
    }
    this.ensureSupervisor(sessionToken);

    this.logger.info(`Connected to ${this.config.serverAddress} (connection #${connection.id})`);
    this.events.publish({ type: 'connected', serverAddress: this.config.serverAddress });
  }

  private async runSender(connection: ActiveConnection, token: CancellationToken): Promise<void> {
    while (!token.isCancellationRequested) {
      const frame = await connection.queue.dequeue(token);
      if (!frame || token.isCancellationRequested) break;

      try {
        await connection.transport.write(frame);
      } catch (error) {
        if (!token.isCancellationRequested) {
          const classified = classifyError(error);
          this.handleConnectionLost(connection, `send failed: ${classified.message}`, classified);
        }
        break;
      }

      this.messagesSent++;
      this.bytesSent += frame.length;
      this.lastActivity = Date.now();
    }
  }

  private handleData(connection: ActiveConnection, chunk: Buffer): void {
    if (connection !== this.connection || this.state !== ConnectionState.CONNECTED) return;

    this.bytesReceived += chunk.length;
    this.lastActivity = Date.now();

    let bodies: Buffer[];
    try {
      bodies = connection.decoder.push(chunk);
    } catch (error) {
      const classified = classifyError(error);
      this.handleConnectionLost(connection, `protocol error: ${classified.message}`, classified);
      return;
    }

    for (const body of bodies) {
      if (connection !== this.connection || this.state !== ConnectionState.CONNECTED) return;

      let message: Message;
      try {
        message = this.codec.decodeMessage(body);
      } catch (error) {
        const classified = classifyError(error);
        this.handleConnectionLost(connection, `protocol error: ${classified.message}`, classified);
        return;
      }

      this.messagesReceived++;
      this.handleMessage(connection, message);
    }
  }

  private handleMessage(connection: ActiveConnection, message: Message): void {
    switch (message.type) {
      case MessageType.CONNECT_ACK:
        this.handleConnectAck(connection, message);
        break;
      case MessageType.HEARTBEAT_ACK:
        this.handleHeartbeatAck(message);
        break;
      case MessageType.HEARTBEAT:
        break;
      case MessageType.DISCONNECT: {
        const detail = message.payload?.toString('utf8');
        this.handleConnectionLost(connection, detail ? `server closed connection: ${detail}` : 'server closed connection');
        break;
      }
      case MessageType.ERROR: {
        const detail = message.payload?.toString('utf8') ?? 'unspecified';
        this.totalErrors++;
        this.logger.warn(`Server reported error: ${detail}`);
        this.events.publish({ type: 'error', message: `server error: ${detail}`, category: 'protocol' });
        break;
      }
      default:
        this.events.publish({ type: 'message', message });
    }
  }

  private handleConnectAck(connection: ActiveConnection, message: Message): void {
    if (!message.payload || message.payload.length === 0) return;

    let ack: unknown;
    try {
      ack = JSON.parse(message.payload.toString('utf8'));
    } catch (error) {
      this.handleConnectionLost(connection, 'protocol error: malformed connect_ack',
        new ProtocolError('Malformed connect_ack payload', false, error instanceof Error ? error : undefined));
      return;
    }
    if (typeof ack !== 'object' || ack === null) return;

    const version: unknown = Reflect.get(ack, 'protocolVersion');
    if (typeof version === 'number' && version !== this.config.protocolVersion) {
      this.fault(connection, new ProtocolError(
        `Protocol version mismatch: client ${this.config.protocolVersion}, server ${version}`,
        true
      ));
      return;
    }

    const resumptionToken: unknown = Reflect.get(ack, 'resumptionToken');
    if (typeof resumptionToken === 'string') {
      this.saveResumptionToken(Buffer.from(resumptionToken, 'base64')).catch((error: unknown) => {
        this.logger.warn(`Failed to store resumption token: ${errorMessage(error)}`);
      });
    }
  }

  private handleHeartbeatAck(message: Message): void {
    const pending = this.pendingProbe;
    if (!pending) return;

    const echoed = message.payload?.toString('utf8');
    if (echoed === undefined || echoed === String(pending.sequenceNumber)) {
      pending.signal.complete();
    }
  }

  /**
   * Abnormal loss while connected: `disconnecting` → `disconnected`, error
   * (unless the server said goodbye) then disconnected are published.
   */
  private handleConnectionLost(connection: ActiveConnection, reason: string, error?: NetworkClientError | Error): void {
    if (connection !== this.connection || this.state !== ConnectionState.CONNECTED) return;

    this.logger.warn(`Connection lost: ${reason}`);
    this.transition(ConnectionState.DISCONNECTING, reason);
    this.teardown(connection);
    this.transition(ConnectionState.DISCONNECTED, reason);
    this.totalDisconnections++;

    if (error) {
      this.totalErrors++;
      const category = classifyError(error).category;
      this.events.publish({ type: 'error', message: reason, category });
    }
    this.events.publish({ type: 'disconnected', reason });
  }

  private fault(connection: ActiveConnection, error: ProtocolError): void {
    if (connection !== this.connection || this.state !== ConnectionState.CONNECTED) return;

    this.logger.error(`Connection faulted: ${error.message}`);
    this.totalErrors++;
    this.teardown(connection);
    this.transition(ConnectionState.FAULTED, error.message);
    this.events.publish({ type: 'error', message: error.message, category: error.category });
  }

  private faultDuringConnect(error: NetworkClientError): ConnectResult {
    this.logger.error(`Connect failed permanently: ${error.message}`);
    this.transition(ConnectionState.FAULTED, error.message);
    this.events.publish({ type: 'error', message: error.message, category: error.category });
    return this.connectFailure(error.category === 'configuration' ? 'configuration' : 'protocol', error.message, error);
  }

  private connectCancelled(token: CancellationToken): ConnectResult {
    if (this.state === ConnectionState.CONNECTING) {
      this.transition(ConnectionState.DISCONNECTED, 'connect cancelled');
    }
    return this.connectFailure('cancelled', `Connect cancelled: ${token.reason ?? 'disconnect requested'}`);
  }

  private teardown(connection: ActiveConnection): void {
    connection.source.cancel('connection closed');
    connection.queue.clear();
    connection.decoder.reset();
    connection.transport.removeAllListeners();
    connection.transport.destroy();
    if (this.connection === connection) {
      this.connection = undefined;
    }
  }

  private async performDisconnect(): Promise<DisconnectResult> {
    const session = this.sessionSource;
    const wasDisconnected = this.state === ConnectionState.DISCONNECTED;

    if (wasDisconnected && !session) {
      return { ok: true, forced: false };
    }

    if (!wasDisconnected) {
      this.transition(ConnectionState.DISCONNECTING, 'disconnect requested');
    }

    // Stops the supervisor, health monitor, sender and any connect backoff
    this.sessionSource = undefined;
    session?.cancel('disconnect');

    const connection = this.connection;
    if (connection && connection.transport.isOpen) {
      await this.sendGoodbye(connection);
    }

    const join = await raceWithTimeout(
      Promise.allSettled(Array.from(this.backgroundTasks)),
      this.config.disconnectTimeoutMs
    );
    const forced = join.status !== 'completed';
    if (forced) {
      this.logger.warn(`Background tasks did not stop within ${this.config.disconnectTimeoutMs}ms; forcing close`);
    }

    if (connection) {
      this.teardown(connection);
    }
    session?.dispose();

    if (!wasDisconnected) {
      this.transition(ConnectionState.DISCONNECTED, 'disconnected by client');
      this.totalDisconnections++;
      this.logger.info(`Disconnected from ${this.config.serverAddress}`);
      this.events.publish({ type: 'disconnected', reason: 'client disconnect' });
    }

    return { ok: true, forced };
  }

  /**
   * Best-effort `disconnect` message and half-close, bounded by the graceful close timeout
   */
  private async sendGoodbye(connection: ActiveConnection): Promise<void> {
    const message = this.nextMessage(MessageType.DISCONNECT, Buffer.from('client disconnect', 'utf8'));
    try {
      const frame = this.codec.encodeMessage(message);
      const transport = connection.transport;
      const outcome = await raceWithTimeout(
        transport.write(frame).then(() => transport.end()),
        this.config.gracefulCloseTimeoutMs
      );
      if (outcome.status !== 'completed') {
        this.logger.debug('Graceful close timed out');
      }
    } catch (error) {
      this.logger.warn(`Graceful close failed: ${errorMessage(error)}`);
    }
  }

  private async performDispose(): Promise<void> {
    this.disposed = true;

    const outcome = await raceWithTimeout(this.disconnect(), this.config.disposeTimeoutMs);
    if (outcome.status !== 'completed') {
      this.logger.warn(`Disconnect did not finish within ${this.config.disposeTimeoutMs}ms during dispose`);
      const connection = this.connection;
      if (connection) {
        this.teardown(connection);
      }
    }

    this.latency.clear();
    this.healthMonitor.removeAllListeners();
    this.supervisor.removeAllListeners();
    this.events.clear();
    this.removeAllListeners();
    this.logger.info('Disposed');
  }

  private ensureSession(): CancellationTokenSource {
    const existing = this.sessionSource;
    if (existing && !existing.isCancellationRequested) {
      return existing;
    }

    // Subscribe before publishing the source: a scope that is already cancelled
    // fails the connect attempt instead of starting a disconnect
    const source = new CancellationTokenSource(this.scopes.getLinkedToken());
    source.token.onCancellationRequested((reason) => this.handleSessionCancelled(source, reason));
    this.sessionSource = source;
    return source;
  }

  /**
   * The owning scope (not our own disconnect) ended the session
   */
  private handleSessionCancelled(source: CancellationTokenSource, reason: string): void {
    if (source !== this.sessionSource) return;

    this.logger.info(`Session scope cancelled (${reason}), disconnecting`);
    this.disconnect().catch((error: unknown) => {
      this.logger.error(`Disconnect after session cancellation failed: ${errorMessage(error)}`);
    });
  }

  private ensureSupervisor(sessionToken: CancellationToken): void {
    if (!this.config.enableAutoReconnect || this.supervisorRunning) return;

    this.supervisorRunning = true;
    const task = this.scopes.runAsync(
      (token) => this.supervisor.start(token),
      `${this.config.name}:reconnect-supervisor`,
      { linkedToken: sessionToken }
    ).finally(() => {
      this.supervisorRunning = false;
    });
    this.track(task);
  }

  private enqueue(connection: ActiveConnection, type: MessageType, payload?: Buffer): SendResult {
    if (connection.queue.isFull) {
      return this.sendFailure('backpressure');
    }

    const message = this.nextMessage(type, payload);
    let frame: Buffer;
    try {
      frame = this.codec.encodeMessage(message);
    } catch (error) {
      if (error instanceof ProtocolError) {
        this.logger.warn(`Rejected outgoing ${type}: ${error.message}`);
        return this.sendFailure('frame-too-large');
      }
      throw error;
    }

    if (!connection.queue.tryEnqueue(frame)) {
      return this.sendFailure('backpressure');
    }

    this.sequence = message.sequenceNumber;
    return { ok: true, sequenceNumber: message.sequenceNumber };
  }

  /**
   * Builds the next message without committing its sequence number
   */
  private nextMessage(type: MessageType, payload?: Buffer): Message {
    const message: Message = {
      type,
      sequenceNumber: (this.sequence + 1) % SEQUENCE_MODULUS,
      timestamp: Date.now()
    };
    if (payload !== undefined) {
      message.payload = payload;
    }
    return message;
  }

  private async readResumptionToken(): Promise<Buffer | undefined> {
    try {
      return await this.loadResumptionToken();
    } catch (error) {
      this.logger.warn(`Failed to load resumption token: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private resumptionKey(): string {
    return `resumption:${this.config.name}`;
  }

  private transition(to: ConnectionState, reason?: string): void {
    const from = this.state;
    if (from === to) return;

    if (!VALID_TRANSITIONS[from].includes(to)) {
      throw new Error(`Invalid state transition ${from} -> ${to}`);
    }

    this.state = to;
    this.logger.debug(`State ${from} -> ${to}${reason ? ` (${reason})` : ''}`);
    this.emit('state-changed', { from, to, reason });
  }

  private track<T>(task: Promise<T>): Promise<T> {
    this.backgroundTasks.add(task);
    const untrack = (): void => {
      this.backgroundTasks.delete(task);
    };
    task.then(untrack, untrack);
    return task;
  }

  private connectFailure(kind: ConnectErrorKind, message: string, cause?: Error): ConnectResult {
    const error: ConnectError = { kind, message };
    if (cause) {
      error.cause = cause;
    }
    return { ok: false, error };
  }

  private sendFailure(reason: SendRejection): SendResult {
    return { ok: false, reason };
  }
}
