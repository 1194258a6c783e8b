import { EventEmitter } from 'events';
import { ClientTransport } from './ClientTransport';
import { Endpoint } from '../types';
import { formatEndpoint } from '../config/ConnectionConfig';
import { TransientError } from '../common/errors';

/**
 * Accepts (or stalls) an incoming connection. Connect completes when the
 * returned promise resolves, so a never-settling promise simulates a hung server.
 */
export type InMemoryConnectionHandler = (peer: InMemoryServerPeer) => void | Promise<void>;

interface ClientSink {
  receive(chunk: Buffer): void;
  remoteClosed(reason: string, error?: Error): void;
}

export interface InMemoryServerPeer {
  on(event: 'data', listener: (chunk: Buffer) => void): this;
  on(event: 'close', listener: (reason: string) => void): this;

  emit(event: 'data', chunk: Buffer): boolean;
  emit(event: 'close', reason: string): boolean;
}

/**
 * Server side of an in-memory connection. Delivery in both directions is
 * asynchronous (next macrotask) and ordered.
 */
export class InMemoryServerPeer extends EventEmitter {
  private closed = false;

  constructor(readonly address: string, private readonly client: ClientSink) {
    super();
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  write(chunk: Buffer): boolean {
    if (this.closed) return false;
    const copy = Buffer.from(chunk);
    setImmediate(() => this.client.receive(copy));
    return true;
  }

  /**
   * Close from the server side. Passing an error simulates a reset.
   */
  close(reason: string = 'server closed', error?: Error): void {
    if (this.closed) return;
    this.closed = true;
    setImmediate(() => {
      this.client.remoteClosed(reason, error);
      this.emit('close', reason);
    });
  }

  /** @internal */
  deliverFromClient(chunk: Buffer): void {
    if (this.closed) return;
    setImmediate(() => {
      if (!this.closed) this.emit('data', chunk);
    });
  }

  /** @internal */
  clientClosed(reason: string): void {
    if (this.closed) return;
    this.closed = true;
    setImmediate(() => this.emit('close', reason));
  }
}

/**
 * Process-local network of named listeners. Each test builds its own instance.
 */
export class InMemoryNetwork {
  private readonly listeners = new Map<string, InMemoryConnectionHandler>();
  private readonly attempts = new Map<string, number>();
  private readonly peers = new Set<InMemoryServerPeer>();

  listen(address: string, handler: InMemoryConnectionHandler): () => void {
    if (this.listeners.has(address)) {
      throw new Error(`Address already in use: ${address}`);
    }
    this.listeners.set(address, handler);
    return () => this.unlisten(address);
  }

  unlisten(address: string): void {
    this.listeners.delete(address);
  }

  getConnectionAttempts(address: string): number {
    return this.attempts.get(address) ?? 0;
  }

  getOpenPeers(address?: string): InMemoryServerPeer[] {
    return Array.from(this.peers).filter(peer => peer.isOpen && (address === undefined || peer.address === address));
  }

  createTransport(): InMemoryTransport {
    return new InMemoryTransport(this);
  }

  /**
   * Close every open server-side peer
   */
  closeAll(reason: string = 'network shutdown'): void {
    for (const peer of this.peers) {
      peer.close(reason);
    }
    this.peers.clear();
  }

  async connect(address: string, client: ClientSink): Promise<InMemoryServerPeer> {
    this.attempts.set(address, this.getConnectionAttempts(address) + 1);

    // Connection setup is never synchronous on a real network
    await new Promise<void>(resolve => setImmediate(resolve));

    const handler = this.listeners.get(address);
    if (!handler) {
      throw new TransientError(`connect ECONNREFUSED ${address}`, 'ECONNREFUSED');
    }

    const peer = new InMemoryServerPeer(address, client);
    this.peers.add(peer);
    peer.on('close', () => this.peers.delete(peer));
    await handler(peer);
    return peer;
  }
}

export class InMemoryTransport extends ClientTransport {
  readonly kind = 'memory' as const;
  private peer?: InMemoryServerPeer;

  constructor(private readonly network: InMemoryNetwork) {
    super();
  }

  protected async doOpen(endpoint: Endpoint): Promise<void> {
    const peer = await this.network.connect(formatEndpoint(endpoint), {
      receive: (chunk) => {
        if (this.isOpen) this.emit('data', chunk);
      },
      remoteClosed: (reason, error) => this.markClosed(reason, error)
    });

    this.peer = peer;
    if (this.isClosed) {
      // Destroyed (timeout or cancel) while the server was still accepting
      peer.clientClosed('client aborted');
    }
  }

  write(frame: Buffer): Promise<void> {
    const peer = this.peer;
    if (!peer || !this.isOpen || !peer.isOpen) {
      return Promise.reject(new TransientError('Connection is not open', 'EPIPE'));
    }
    peer.deliverFromClient(Buffer.from(frame));
    return Promise.resolve();
  }

  end(): Promise<void> {
    this.peer?.clientClosed('client ended');
    return Promise.resolve();
  }

  protected doDestroy(): void {
    this.peer?.clientClosed('client closed');
  }
}
