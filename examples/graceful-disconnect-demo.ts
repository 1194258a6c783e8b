import { ConnectionManager } from '../src/connections/ConnectionManager';
import { InMemoryNetwork } from '../src/transport/InMemoryTransport';
import { MessageCodec } from '../src/codec/MessageCodec';
import { FrameDecoder } from '../src/codec/FrameDecoder';
import { MessageType } from '../src/types';

/**
 * Demonstration of a client that reconnects after the server drops it and
 * says goodbye before shutting down. Runs against an in-process network.
 */
async function demonstrateGracefulDisconnect() {
  console.log('=== Graceful Disconnect Demonstration ===\n');

  const network = new InMemoryNetwork();
  const codec = new MessageCodec();

  network.listen('127.0.0.1:7000', (peer) => {
    const decoder = new FrameDecoder(65536);
    peer.on('data', (chunk) => {
      for (const body of decoder.push(chunk)) {
        const message = codec.decodeMessage(body);
        console.log(`   server <- ${message.type} #${message.sequenceNumber}`);
        if (message.type === MessageType.CONNECT) {
          peer.write(codec.encodeMessage({
            type: MessageType.CONNECT_ACK,
            sequenceNumber: 1,
            timestamp: Date.now(),
            payload: Buffer.from(JSON.stringify({ protocolVersion: 1 }))
          }));
        }
      }
    });
  });

  const manager = new ConnectionManager({
    transportFactory: () => network.createTransport(),
    enableLogging: false
  });
  manager.on('protocol-connected', ({ name, serverAddress }) => console.log(`   ✓ ${name} connected to ${serverAddress}`));
  manager.on('protocol-disconnected', ({ name, reason }) => console.log(`   ✗ ${name} disconnected (${reason})`));

  console.log('1. Registering and connecting...');
  const lobby = manager.register({
    name: 'lobby',
    serverAddress: '127.0.0.1:7000',
    reconnectDelayMs: 250,
    enableKeepalive: false,
    enableLogging: false
  });
  await manager.connect('lobby');
  lobby.send({ payload: 'hello' });

  console.log('\n2. Server drops every connection; the supervisor reconnects...');
  network.closeAll('server restart');
  await new Promise<void>(resolve => setTimeout(resolve, 500));

  console.log('\n3. Disconnecting gracefully...');
  const result = await manager.disconnect('lobby');
  console.log(`   ✓ Disconnected (forced: ${result.forced})\n`);

  await manager.dispose();
  console.log('=== Demonstration Complete ===');
}

export { demonstrateGracefulDisconnect };
