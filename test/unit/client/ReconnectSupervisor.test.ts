import { ReconnectSupervisor, ReconnectTarget } from '../../../src/client/ReconnectSupervisor';
import { CancellationTokenSource } from '../../../src/cancellation/CancellationToken';
import { ConnectResult, ConnectionState } from '../../../src/types';
import { SpyLogger } from '../../helpers/spyLogger';
import { sleep, waitFor } from '../../helpers/waitFor';

class FakeTarget implements ReconnectTarget {
  state: ConnectionState = ConnectionState.CONNECTED;
  connectCalls = 0;
  dropped: string[] = [];

  getState(): ConnectionState {
    return this.state;
  }

  async connect(): Promise<ConnectResult> {
    this.connectCalls++;
    this.state = ConnectionState.CONNECTED;
    return { ok: true, attempts: 1 };
  }

  dropConnection(reason: string): void {
    this.dropped.push(reason);
    this.state = ConnectionState.DISCONNECTED;
  }
}

describe('ReconnectSupervisor', () => {
  let target: FakeTarget;
  let source: CancellationTokenSource;
  let supervisor: ReconnectSupervisor;

  beforeEach(() => {
    target = new FakeTarget();
    source = new CancellationTokenSource();
    supervisor = new ReconnectSupervisor(target, { reconnectDelayMs: 5, logger: new SpyLogger() });
  });

  afterEach(() => {
    source.cancel();
  });

  test('should leave a healthy connection alone', async () => {
    const running = supervisor.start(source.token);
    await sleep(40);
    source.cancel();
    await running;

    expect(target.connectCalls).toBe(0);
  });

  test('should reconnect when the client is disconnected', async () => {
    const attempts: number[] = [];
    supervisor.on('reconnect-attempt', (attempt: number) => attempts.push(attempt));
    const running = supervisor.start(source.token);

    target.state = ConnectionState.DISCONNECTED;
    await waitFor(() => target.connectCalls === 1);
    source.cancel();
    await running;

    expect(attempts).toEqual([1]);
    expect(supervisor.getStats().reconnectAttempts).toBe(1);
  });

  test('should not reconnect out of the faulted state', async () => {
    target.state = ConnectionState.FAULTED;
    const running = supervisor.start(source.token);
    await sleep(40);
    source.cancel();
    await running;

    expect(target.connectCalls).toBe(0);
  });

  test('should drop the connection on a reported failure and then reconnect', async () => {
    const running = supervisor.start(source.token);

    supervisor.reportFailure('health probe failed: timeout');
    await waitFor(() => target.connectCalls === 1);
    source.cancel();
    await running;

    expect(target.dropped).toEqual(['health probe failed: timeout']);
    expect(supervisor.getStats()).toEqual({ reconnectAttempts: 1, failuresReported: 1 });
  });

  test('should stop when its token is cancelled', async () => {
    const running = supervisor.start(source.token);
    expect(supervisor.isRunning).toBe(true);

    source.cancel();
    await running;

    expect(supervisor.isRunning).toBe(false);
  });
});
