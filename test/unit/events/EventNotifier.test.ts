import { EventNotifier } from '../../../src/events/EventNotifier';
import { MessageType } from '../../../src/types';
import { SpyLogger } from '../../helpers/spyLogger';

describe('EventNotifier', () => {
  let notifier: EventNotifier;
  let logger: SpyLogger;

  beforeEach(() => {
    logger = new SpyLogger();
    notifier = new EventNotifier({ logger });
  });

  test('should invoke handlers in registration order', () => {
    const calls: string[] = [];
    notifier.onConnected(address => calls.push(`first:${address}`));
    notifier.onConnected(address => calls.push(`second:${address}`));

    notifier.publish({ type: 'connected', serverAddress: '127.0.0.1:7000' });

    expect(calls).toEqual(['first:127.0.0.1:7000', 'second:127.0.0.1:7000']);
  });

  test('should only deliver events of the subscribed type', () => {
    const onError = jest.fn();
    const onLatency = jest.fn();
    notifier.onError(onError);
    notifier.onLatencyMeasured(onLatency);

    notifier.publish({ type: 'latency', value: 12 });

    expect(onLatency).toHaveBeenCalledWith(12);
    expect(onError).not.toHaveBeenCalled();
  });

  test('should keep invoking handlers after one throws', () => {
    const after = jest.fn();
    notifier.onDisconnected(() => {
      throw new Error('handler bug');
    });
    notifier.onDisconnected(after);

    notifier.publish({ type: 'disconnected', reason: 'client disconnect' });

    expect(after).toHaveBeenCalledWith('client disconnect');
    expect(notifier.getHandlerErrorCount()).toBe(1);
    expect(logger.getMessages('warn')).toEqual(["Handler for 'disconnected' threw"]);
  });

  test('should pass full message objects to message handlers', () => {
    const onMessage = jest.fn();
    notifier.onMessage(onMessage);
    const message = { type: MessageType.DATA, sequenceNumber: 3, timestamp: 10, payload: Buffer.from('x') };

    notifier.publish({ type: 'message', message });

    expect(onMessage).toHaveBeenCalledWith(message);
  });

  test('should stop delivering after unsubscribe and tolerate repeated calls', () => {
    const handler = jest.fn();
    const subscription = notifier.onError(handler);

    subscription.unsubscribe();
    subscription.unsubscribe();
    notifier.publish({ type: 'error', message: 'late' });

    expect(subscription.closed).toBe(true);
    expect(handler).not.toHaveBeenCalled();
    expect(notifier.listenerCount('error')).toBe(0);
  });

  test('should not run a handler added during publish until the next publish', () => {
    const late = jest.fn();
    notifier.onLatencyMeasured(() => {
      notifier.onLatencyMeasured(late);
    });

    notifier.publish({ type: 'latency', value: 1 });
    expect(late).not.toHaveBeenCalled();

    notifier.publish({ type: 'latency', value: 2 });
    expect(late).toHaveBeenCalledWith(2);
  });

  test('should drop every subscription on clear and keep old handles safe', () => {
    const subscription = notifier.onConnected(jest.fn());
    notifier.onMessage(jest.fn());
    expect(notifier.listenerCount()).toBe(2);

    notifier.clear();

    expect(notifier.listenerCount()).toBe(0);
    expect(() => subscription.unsubscribe()).not.toThrow();
  });
});
