import { TransportKind } from '../types';
import { ClientTransport, TransportFactory } from './ClientTransport';
import { TcpTransport, TcpTransportOptions } from './TcpTransport';
import { GrpcTransport, GrpcTransportOptions } from './GrpcTransport';
import { WebSocketTransport, WebSocketTransportOptions } from './WebSocketTransport';

export interface TransportOptions {
  tcp?: TcpTransportOptions;
  grpc?: GrpcTransportOptions;
  websocket?: WebSocketTransportOptions;
}

export function createTransport(kind: TransportKind, options: TransportOptions = {}): ClientTransport {
  switch (kind) {
    case 'tcp':
      return new TcpTransport(options.tcp);
    case 'grpc':
      return new GrpcTransport(options.grpc);
    case 'websocket':
      return new WebSocketTransport(options.websocket);
  }
}

export function createTransportFactory(options: TransportOptions = {}): TransportFactory {
  return (kind) => createTransport(kind, options);
}
