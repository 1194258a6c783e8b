import {
  DEFAULT_CONNECTION_CONFIG,
  formatEndpoint,
  parseServerAddress,
  resolveConnectionConfig
} from '../../../src/config/ConnectionConfig';
import { ConfigurationError } from '../../../src/common/errors';

describe('ConnectionConfig', () => {
  describe('parseServerAddress', () => {
    test('should parse host:port without a scheme', () => {
      expect(parseServerAddress('localhost:7000')).toEqual({
        transport: undefined,
        endpoint: { host: 'localhost', port: 7000 }
      });
    });

    test('should map schemes to transports', () => {
      expect(parseServerAddress('tcp://game.local:9000').transport).toBe('tcp');
      expect(parseServerAddress('grpc://game.local:50051').transport).toBe('grpc');
      expect(parseServerAddress('ws://game.local:8080').transport).toBe('websocket');
    });

    test('should accept bracketed IPv6 hosts', () => {
      expect(parseServerAddress('[::1]:4000').endpoint).toEqual({ host: '::1', port: 4000 });
    });

    test.each([
      ['', 'serverAddress must not be empty'],
      ['localhost', "Invalid server address 'localhost', expected host:port"],
      ['localhost:0', 'Invalid port 0 in server address'],
      ['localhost:70000', 'Invalid port 70000 in server address'],
      ['http://localhost:80', "Unsupported address scheme 'http'"]
    ])('should reject %p', (address, message) => {
      expect(() => parseServerAddress(address)).toThrow(message);
    });
  });

  describe('resolveConnectionConfig', () => {
    test('should apply defaults', () => {
      const config = resolveConnectionConfig({ serverAddress: 'localhost:7000' });

      expect(config.transport).toBe('tcp');
      expect(config.heartbeatMode).toBe('emit');
      expect(config.maxRetryAttempts).toBe(DEFAULT_CONNECTION_CONFIG.maxRetryAttempts);
      expect(config.compressionThresholdBytes).toBe(512);
      expect(config.maxFrameSizeBytes).toBe(65536);
      expect(config.enableJitter).toBe(false);
      expect(config.endpoint).toEqual({ host: 'localhost', port: 7000 });
    });

    test('should take the transport from the scheme and default grpc to ack heartbeats', () => {
      const config = resolveConnectionConfig({ serverAddress: 'grpc://localhost:50051' });

      expect(config.transport).toBe('grpc');
      expect(config.heartbeatMode).toBe('ack');
    });

    test('should keep an explicit heartbeat mode', () => {
      const config = resolveConnectionConfig({ serverAddress: 'grpc://localhost:50051', heartbeatMode: 'emit' });

      expect(config.heartbeatMode).toBe('emit');
    });

    test('should reject a transport that contradicts the scheme', () => {
      expect(() => resolveConnectionConfig({ serverAddress: 'ws://localhost:8080', transport: 'tcp' }))
        .toThrow("serverAddress scheme implies 'websocket' but transport is 'tcp'");
    });

    test('should freeze the resolved config', () => {
      const config = resolveConnectionConfig({ serverAddress: 'localhost:7000' });

      expect(Object.isFrozen(config)).toBe(true);
      expect(Object.isFrozen(config.endpoint)).toBe(true);
    });

    test.each([
      [{ connectTimeoutMs: 0 }, 'connectTimeoutMs must be a positive number, got 0'],
      [{ retryBaseDelayMs: -5 }, 'retryBaseDelayMs must be a non-negative number, got -5'],
      [{ maxRetryAttempts: 0 }, 'maxRetryAttempts must be an integer >= 1, got 0'],
      [{ maxRetryAttempts: 1.5 }, 'maxRetryAttempts must be an integer >= 1, got 1.5'],
      [{ sendQueueCapacity: 2.5 }, 'sendQueueCapacity must be an integer'],
      [{ jitterRatio: 1 }, 'jitterRatio must be in [0, 1), got 1']
    ])('should reject %p', (overrides, message) => {
      expect(() => resolveConnectionConfig({ serverAddress: 'localhost:7000', ...overrides }))
        .toThrow(message);
    });

    test('should report the offending field', () => {
      let caught: unknown;
      try {
        resolveConnectionConfig({ serverAddress: 'localhost:7000', probeTimeoutMs: -1 });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ConfigurationError);
      expect(caught).toMatchObject({ field: 'probeTimeoutMs', category: 'configuration' });
    });
  });

  test('should format endpoints back to addresses', () => {
    expect(formatEndpoint({ host: '127.0.0.1', port: 7000 })).toBe('127.0.0.1:7000');
    expect(formatEndpoint({ host: '::1', port: 4000 })).toBe('[::1]:4000');
  });
});
