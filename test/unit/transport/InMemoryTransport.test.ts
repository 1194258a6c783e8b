import { InMemoryNetwork, InMemoryServerPeer } from '../../../src/transport/InMemoryTransport';
import { CancellationTokenSource } from '../../../src/cancellation/CancellationToken';
import { OperationCancelledError } from '../../../src/cancellation/CancellationScopeManager';
import { TransientError } from '../../../src/common/errors';
import { waitFor } from '../../helpers/waitFor';

const ENDPOINT = { host: '127.0.0.1', port: 7000 };
const ADDRESS = '127.0.0.1:7000';

describe('InMemoryTransport', () => {
  let network: InMemoryNetwork;
  let peers: InMemoryServerPeer[];

  beforeEach(() => {
    network = new InMemoryNetwork();
    peers = [];
  });

  afterEach(() => {
    network.closeAll();
  });

  function listen(accept: boolean = true): void {
    network.listen(ADDRESS, (peer) => {
      if (!accept) {
        return new Promise<void>(() => undefined);
      }
      peers.push(peer);
    });
  }

  test('should deliver bytes in both directions', async () => {
    listen();
    const transport = network.createTransport();
    const received: string[] = [];
    transport.on('data', chunk => received.push(chunk.toString()));

    await transport.open(ENDPOINT, 100, CancellationTokenSource.none);
    const fromClient: string[] = [];
    peers[0].on('data', chunk => fromClient.push(chunk.toString()));

    await transport.write(Buffer.from('hello'));
    peers[0].write(Buffer.from('world'));

    await waitFor(() => fromClient.length === 1 && received.length === 1);
    expect(fromClient).toEqual(['hello']);
    expect(received).toEqual(['world']);
  });

  test('should refuse connections with nobody listening and count the attempt', async () => {
    const transport = network.createTransport();

    await expect(transport.open(ENDPOINT, 100, CancellationTokenSource.none)).rejects.toThrow(TransientError);
    expect(network.getConnectionAttempts(ADDRESS)).toBe(1);
  });

  test('should time out when the server never accepts', async () => {
    listen(false);
    const transport = network.createTransport();

    await expect(transport.open(ENDPOINT, 20, CancellationTokenSource.none)).rejects.toThrow('Connect timed out after 20ms');
    expect(transport.isOpen).toBe(false);
  });

  test('should abort an open when the token is cancelled', async () => {
    listen(false);
    const transport = network.createTransport();
    const source = new CancellationTokenSource();

    const opening = transport.open(ENDPOINT, 1000, source.token);
    source.cancel('shutdown');

    await expect(opening).rejects.toBeInstanceOf(OperationCancelledError);
  });

  test('should emit close when the server closes, with the server reason', async () => {
    listen();
    const transport = network.createTransport();
    const reasons: string[] = [];
    transport.on('close', reason => reasons.push(reason));
    await transport.open(ENDPOINT, 100, CancellationTokenSource.none);

    peers[0].close('maintenance');

    await waitFor(() => reasons.length === 1);
    expect(reasons).toEqual(['maintenance']);
    await expect(transport.write(Buffer.from('late'))).rejects.toThrow('Connection is not open');
  });

  test('should tell the server when the client destroys the connection', async () => {
    listen();
    const transport = network.createTransport();
    await transport.open(ENDPOINT, 100, CancellationTokenSource.none);
    const serverSide: string[] = [];
    peers[0].on('close', reason => serverSide.push(reason));

    transport.destroy();

    await waitFor(() => serverSide.length === 1);
    expect(serverSide).toEqual(['client closed']);
    expect(network.getOpenPeers(ADDRESS)).toEqual([]);
  });

  test('should not reopen a transport', async () => {
    listen();
    const transport = network.createTransport();
    await transport.open(ENDPOINT, 100, CancellationTokenSource.none);

    await expect(transport.open(ENDPOINT, 100, CancellationTokenSource.none))
      .rejects.toThrow('Transport instances cannot be reopened');
  });
});
