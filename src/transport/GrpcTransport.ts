import * as grpc from '@grpc/grpc-js';
import { ClientTransport } from './ClientTransport';
import { Endpoint } from '../types';
import { formatEndpoint } from '../config/ConnectionConfig';
import { TransientError, classifyError } from '../common/errors';

export interface GrpcTransportOptions {
  /** Fully qualified bidirectional streaming method carrying the frames */
  methodPath?: string;
  keepaliveTimeMs?: number;
  keepaliveTimeoutMs?: number;
  keepalivePermitWithoutCalls?: boolean;
  maxMessageLength?: number;
}

const passthrough = (value: Buffer): Buffer => value;

/**
 * RPC-style transport: one long-lived bidirectional stream whose messages are
 * whole frames. Serialization is the identity; framing is done by the client codec.
 */
export class GrpcTransport extends ClientTransport {
  readonly kind = 'grpc' as const;
  private readonly options: Required<GrpcTransportOptions>;
  private client?: grpc.Client;
  private stream?: grpc.ClientDuplexStream<Buffer, Buffer>;

  constructor(options: GrpcTransportOptions = {}) {
    super();
    this.options = {
      methodPath: options.methodPath ?? '/netclient.ConnectionService/Stream',
      keepaliveTimeMs: options.keepaliveTimeMs ?? 30000,
      keepaliveTimeoutMs: options.keepaliveTimeoutMs ?? 5000,
      keepalivePermitWithoutCalls: options.keepalivePermitWithoutCalls ?? true,
      maxMessageLength: options.maxMessageLength ?? 4 * 1024 * 1024
    };
  }

  protected doOpen(endpoint: Endpoint, timeoutMs: number): Promise<void> {
    const client = new grpc.Client(formatEndpoint(endpoint), grpc.credentials.createInsecure(), {
      'grpc.keepalive_time_ms': this.options.keepaliveTimeMs,
      'grpc.keepalive_timeout_ms': this.options.keepaliveTimeoutMs,
      'grpc.keepalive_permit_without_calls': this.options.keepalivePermitWithoutCalls ? 1 : 0,
      'grpc.max_receive_message_length': this.options.maxMessageLength,
      'grpc.max_send_message_length': this.options.maxMessageLength
    });
    this.client = client;

    return new Promise<void>((resolve, reject) => {
      client.waitForReady(Date.now() + timeoutMs, (error) => {
        if (error) {
          reject(new TransientError(`gRPC channel not ready: ${error.message}`, 'ETIMEDOUT', error));
          return;
        }
        if (this.isClosed) {
          reject(new TransientError('Transport destroyed while connecting', 'ECONNABORTED'));
          return;
        }

        const stream = client.makeBidiStreamRequest<Buffer, Buffer>(this.options.methodPath, passthrough, passthrough);
        this.stream = stream;

        stream.on('data', (chunk: Buffer) => this.emit('data', chunk));
        stream.on('error', (streamError: Error) => {
          this.markClosed(`stream error: ${streamError.message}`, classifyError(streamError));
        });
        stream.on('end', () => this.markClosed('remote closed'));

        resolve();
      });
    });
  }

  write(frame: Buffer): Promise<void> {
    const stream = this.stream;
    if (!stream || !this.isOpen) {
      return Promise.reject(new TransientError('Stream is not open', 'EPIPE'));
    }

    return new Promise<void>((resolve, reject) => {
      stream.write(frame, (error: Error | null | undefined) => {
        if (error) {
          reject(classifyError(error));
        } else {
          resolve();
        }
      });
    });
  }

  end(): Promise<void> {
    this.stream?.end();
    return Promise.resolve();
  }

  protected doDestroy(): void {
    this.stream?.cancel();
    this.client?.close();
  }
}
