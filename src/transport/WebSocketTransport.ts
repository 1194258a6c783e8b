import WebSocket = require('ws');
import { ClientTransport } from './ClientTransport';
import { Endpoint } from '../types';
import { formatEndpoint } from '../config/ConnectionConfig';
import { TransientError, classifyError } from '../common/errors';

export interface WebSocketTransportOptions {
  path?: string;
  secure?: boolean;
  perMessageDeflate?: boolean;
}

function toBuffer(data: WebSocket.RawData): Buffer {
  if (Buffer.isBuffer(data)) return data;
  if (Array.isArray(data)) return Buffer.concat(data);
  return Buffer.from(data);
}

/**
 * Frames travel as binary WebSocket messages. The length prefix is kept so the
 * receive path is the same as for stream transports.
 */
export class WebSocketTransport extends ClientTransport {
  readonly kind = 'websocket' as const;
  private readonly options: Required<WebSocketTransportOptions>;
  private ws?: WebSocket;

  constructor(options: WebSocketTransportOptions = {}) {
    super();
    this.options = {
      path: options.path ?? '/',
      secure: options.secure ?? false,
      // Frames above the threshold are already gzip compressed
      perMessageDeflate: options.perMessageDeflate ?? false
    };
  }

  protected doOpen(endpoint: Endpoint): Promise<void> {
    const url = `${this.options.secure ? 'wss' : 'ws'}://${formatEndpoint(endpoint)}${this.options.path}`;

    return new Promise<void>((resolve, reject) => {
      let connected = false;
      const ws = new WebSocket(url, { perMessageDeflate: this.options.perMessageDeflate });
      ws.binaryType = 'nodebuffer';
      this.ws = ws;

      ws.on('open', () => {
        connected = true;
        resolve();
      });

      ws.on('message', (data: WebSocket.RawData) => this.emit('data', toBuffer(data)));

      ws.on('error', (error: Error) => {
        if (!connected) {
          reject(classifyError(error));
          return;
        }
        this.markClosed(`websocket error: ${error.message}`, classifyError(error));
      });

      ws.on('close', (code: number, reason: Buffer) => {
        if (!connected) {
          reject(new TransientError(`WebSocket closed before open (${code})`, 'ECONNRESET'));
          return;
        }
        const text = reason.toString();
        this.markClosed(text ? `remote closed (${code}: ${text})` : `remote closed (${code})`);
      });
    });
  }

  write(frame: Buffer): Promise<void> {
    const ws = this.ws;
    if (!ws || !this.isOpen || ws.readyState !== WebSocket.OPEN) {
      return Promise.reject(new TransientError('WebSocket is not open', 'EPIPE'));
    }

    return new Promise<void>((resolve, reject) => {
      ws.send(frame, { binary: true }, (error?: Error) => {
        if (error) {
          reject(classifyError(error));
        } else {
          resolve();
        }
      });
    });
  }

  end(): Promise<void> {
    if (this.ws && this.ws.readyState === WebSocket.OPEN) {
      this.ws.close(1000, 'client disconnect');
    }
    return Promise.resolve();
  }

  protected doDestroy(): void {
    this.ws?.terminate();
  }
}
