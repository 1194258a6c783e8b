// Main entry point for resilient-net-client

// Types
export * from './types';

// Client
export * from './client/ConnectionClient';
export * from './client/OutgoingQueue';
export * from './client/ReconnectSupervisor';
export * from './client/ResumptionStore';
export * from './connections/ConnectionManager';

// Framing
export * from './codec/MessageCodec';
export * from './codec/FrameDecoder';

// Cancellation
export * from './cancellation/CancellationToken';
export * from './cancellation/CancellationScopeManager';
export * from './cancellation/CompletionSignal';

// Retry and health
export * from './backoff/BackoffPolicy';
export * from './monitoring/HealthMonitor';
export * from './monitoring/LatencyTracker';

// Events
export * from './events/EventNotifier';

// Transports
export * from './transport/ClientTransport';
export * from './transport/TcpTransport';
export * from './transport/GrpcTransport';
export * from './transport/WebSocketTransport';
export * from './transport/InMemoryTransport';
export * from './transport/createTransport';

// Configuration
export * from './config/ConnectionConfig';
export * from './config/ConnectionConfigLoader';

// Common
export * from './common/errors';
export * from './common/logger';
