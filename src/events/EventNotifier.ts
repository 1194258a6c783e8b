import { Message } from '../types';
import { ErrorCategory } from '../common/errors';
import { Logger, createLogger } from '../common/logger';

/**
 * Connection lifecycle events published to application code
 */
export type ConnectionEvent =
  | { type: 'connected'; serverAddress: string }
  | { type: 'disconnected'; reason: string }
  | { type: 'error'; message: string; category?: ErrorCategory }
  | { type: 'latency'; value: number }
  | { type: 'message'; message: Message };

export type ConnectionEventType = ConnectionEvent['type'];

export type ConnectionEventOf<K extends ConnectionEventType> = Extract<ConnectionEvent, { type: K }>;

export type ConnectionEventHandler<K extends ConnectionEventType> = (event: ConnectionEventOf<K>) => void;

type HandlerTable = { [K in ConnectionEventType]: Array<ConnectionEventHandler<K>> };

export interface Subscription {
  readonly closed: boolean;
  unsubscribe(): void;
}

export interface EventNotifierOptions {
  enableLogging?: boolean;
  logger?: Logger;
}

/**
 * Synchronous fan-out of connection events.
 *
 * Handlers run in registration order against the list as it was when `publish`
 * started; a throwing handler is logged and the remaining handlers still run.
 */
export class EventNotifier {
  private handlers: HandlerTable = EventNotifier.emptyTable();
  private readonly logger: Logger;
  private handlerErrors = 0;

  constructor(options: EventNotifierOptions = {}) {
    this.logger = options.logger ?? createLogger('EventNotifier', { enabled: options.enableLogging ?? true });
  }

  subscribe<K extends ConnectionEventType>(type: K, handler: ConnectionEventHandler<K>): Subscription {
    const list: Array<ConnectionEventHandler<K>> = this.handlers[type];
    list.push(handler);

    let closed = false;
    return {
      get closed() {
        return closed;
      },
      unsubscribe: () => {
        if (closed) return;
        closed = true;
        // The list may belong to a cleared notifier; removing from it is harmless
        const index = list.indexOf(handler);
        if (index !== -1) list.splice(index, 1);
      }
    };
  }

  onConnected(handler: (serverAddress: string) => void): Subscription {
    return this.subscribe('connected', (event) => handler(event.serverAddress));
  }

  onDisconnected(handler: (reason: string) => void): Subscription {
    return this.subscribe('disconnected', (event) => handler(event.reason));
  }

  onError(handler: (message: string) => void): Subscription {
    return this.subscribe('error', (event) => handler(event.message));
  }

  onLatencyMeasured(handler: (value: number) => void): Subscription {
    return this.subscribe('latency', (event) => handler(event.value));
  }

  onMessage(handler: (message: Message) => void): Subscription {
    return this.subscribe('message', (event) => handler(event.message));
  }

  publish(event: ConnectionEvent): void {
    switch (event.type) {
      case 'connected':
        this.dispatch('connected', event);
        break;
      case 'disconnected':
        this.dispatch('disconnected', event);
        break;
      case 'error':
        this.dispatch('error', event);
        break;
      case 'latency':
        this.dispatch('latency', event);
        break;
      case 'message':
        this.dispatch('message', event);
        break;
    }
  }

  listenerCount(type?: ConnectionEventType): number {
    if (type) {
      return this.handlers[type].length;
    }
    return Object.values(this.handlers).reduce((total, list) => total + list.length, 0);
  }

  getHandlerErrorCount(): number {
    return this.handlerErrors;
  }

  /**
   * Drop every subscription. Outstanding handles stay safe to unsubscribe.
   */
  clear(): void {
    this.handlers = EventNotifier.emptyTable();
  }

  private dispatch<K extends ConnectionEventType>(type: K, event: ConnectionEventOf<K>): void {
    const list: Array<ConnectionEventHandler<K>> = this.handlers[type];
    for (const handler of list.slice()) {
      try {
        handler(event);
      } catch (error) {
        this.handlerErrors++;
        this.logger.warn(`Handler for '${type}' threw`, error);
      }
    }
  }

  private static emptyTable(): HandlerTable {
    return { connected: [], disconnected: [], error: [], latency: [], message: [] };
  }
}
