/**
 * Type definitions for the resilient network client
 */

export enum ConnectionState {
  DISCONNECTED = 'disconnected',
  CONNECTING = 'connecting',
  CONNECTED = 'connected',
  DISCONNECTING = 'disconnecting',
  FAULTED = 'faulted'
}

export enum MessageType {
  CONNECT = 'connect',
  CONNECT_ACK = 'connect_ack',
  DISCONNECT = 'disconnect',
  HEARTBEAT = 'heartbeat',
  HEARTBEAT_ACK = 'heartbeat_ack',
  DATA = 'data',
  ERROR = 'error'
}

export type TransportKind = 'tcp' | 'grpc' | 'websocket';

export type BackoffStrategy = 'linear' | 'exponential';

export type HeartbeatMode = 'emit' | 'ack';

/**
 * Logical message carried inside a frame
 */
export interface Message {
  type: MessageType;
  sequenceNumber: number;
  timestamp: number;
  payload?: Buffer;
}

/**
 * What application code hands to `send`; sequence number and timestamp are
 * assigned by the client
 */
export interface OutboundMessage {
  type?: MessageType;
  payload?: Buffer | string;
}

export interface Endpoint {
  host: string;
  port: number;
}

export interface ConnectionMetrics {
  totalConnections: number;
  totalDisconnections: number;
  totalErrors: number;
  averageLatency: number;
  messagesSent: number;
  messagesReceived: number;
  bytesSent: number;
  bytesReceived: number;
  lastActivity: number;
  connectedAt?: number;
  uptimeMs: number;
}

export type ConnectErrorKind =
  | 'already-in-progress'
  | 'already-connected'
  | 'invalid-state'
  | 'faulted'
  | 'disposed'
  | 'retries-exhausted'
  | 'cancelled'
  | 'protocol'
  | 'configuration';

export interface ConnectError {
  kind: ConnectErrorKind;
  message: string;
  cause?: Error;
}

export type ConnectResult =
  | { ok: true; attempts: number }
  | { ok: false; error: ConnectError };

export type SendRejection = 'not-connected' | 'backpressure' | 'frame-too-large' | 'disposed';

export type SendResult =
  | { ok: true; sequenceNumber: number }
  | { ok: false; reason: SendRejection };

export interface DisconnectResult {
  ok: true;
  /** True when background tasks did not finish within the disconnect timeout */
  forced: boolean;
}

export type ProbeResult =
  | { ok: true; latencyMs?: number }
  | { ok: false; reason: 'timeout' | 'not-connected' | 'cancelled' | 'send-failed' };
