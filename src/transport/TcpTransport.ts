import * as net from 'net';
import { ClientTransport } from './ClientTransport';
import { Endpoint } from '../types';
import { TransientError, classifyError } from '../common/errors';

export interface TcpTransportOptions {
  enableNagle?: boolean;
  /** OS-level TCP keepalive probe delay; 0 disables it */
  socketKeepAliveMs?: number;
}

/**
 * Framed-stream transport over a plain TCP socket
 */
export class TcpTransport extends ClientTransport {
  readonly kind = 'tcp' as const;
  private readonly options: Required<TcpTransportOptions>;
  private socket?: net.Socket;

  constructor(options: TcpTransportOptions = {}) {
    super();
    this.options = {
      enableNagle: options.enableNagle ?? false,
      socketKeepAliveMs: options.socketKeepAliveMs ?? 0
    };
  }

  protected doOpen(endpoint: Endpoint): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      let connected = false;
      let lastError: Error | undefined;

      const socket = net.createConnection({ host: endpoint.host, port: endpoint.port });
      this.socket = socket;

      socket.on('error', (error) => {
        lastError = error;
        if (!connected) {
          reject(classifyError(error));
        }
      });

      socket.on('close', (hadError) => {
        if (!connected) {
          reject(lastError ? classifyError(lastError) : new TransientError('Socket closed before connect', 'ECONNRESET'));
          return;
        }
        const error = hadError && lastError ? classifyError(lastError) : undefined;
        this.markClosed(error ? `socket error: ${error.message}` : 'remote closed', error);
      });

      socket.once('connect', () => {
        connected = true;
        socket.setNoDelay(!this.options.enableNagle);
        if (this.options.socketKeepAliveMs > 0) {
          socket.setKeepAlive(true, this.options.socketKeepAliveMs);
        }
        socket.on('data', (chunk: Buffer) => this.emit('data', chunk));
        resolve();
      });
    });
  }

  write(frame: Buffer): Promise<void> {
    const socket = this.socket;
    if (!socket || !this.isOpen) {
      return Promise.reject(new TransientError('Socket is not open', 'EPIPE'));
    }

    return new Promise<void>((resolve, reject) => {
      socket.write(frame, (error) => {
        if (error) {
          reject(classifyError(error));
        } else {
          resolve();
        }
      });
    });
  }

  end(): Promise<void> {
    const socket = this.socket;
    if (!socket || !this.isOpen) {
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      socket.end(() => resolve());
    });
  }

  get remoteAddress(): string | undefined {
    return this.socket?.remoteAddress;
  }

  protected doDestroy(): void {
    this.socket?.destroy();
  }
}
