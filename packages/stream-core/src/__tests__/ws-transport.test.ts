import { describe, it, expect, afterEach } from 'vitest';
import { createServer, type Server, type Socket } from 'node:net';
import type { AddressInfo } from 'node:net';
import { WebSocketServer } from 'ws';
import { createSilentLogger } from '@streamgate/utils';
import { ConnectTimeoutError, TransportClosedError } from '../errors';
import { WsTransport } from '../transport/ws-transport';

function portOf(address: AddressInfo | string | null): number {
  if (address === null || typeof address === 'string') {
    throw new Error('Server is not listening on a TCP port');
  }
  return address.port;
}

async function echoServer(): Promise<{ server: WebSocketServer; url: string }> {
  const server = new WebSocketServer({ port: 0, host: '127.0.0.1' });
  await new Promise<void>((resolve) => server.once('listening', () => resolve()));
  server.on('connection', (socket) => {
    socket.on('message', (data) => {
      const text = data.toString();
      if (text === 'bye') {
        socket.close(1000, 'done');
        return;
      }
      socket.send(`echo:${text}`);
    });
  });
  return { server, url: `ws://127.0.0.1:${portOf(server.address())}` };
}

const closers: Array<() => Promise<void>> = [];

afterEach(async () => {
  for (const close of closers.splice(0)) {
    await close();
  }
});

describe('WsTransport', () => {
  const transport = new WsTransport({ logger: createSilentLogger() });

  it('sends and receives text frames', async () => {
    const { server, url } = await echoServer();
    closers.push(() => new Promise((resolve) => server.close(() => resolve())));

    const connection = await transport.open(url, { timeoutMs: 2_000 });
    expect(connection.isOpen()).toBe(true);

    await connection.send('hello');
    await connection.send('bye');

    const received: string[] = [];
    for await (const frame of connection.frames()) {
      received.push(frame);
    }

    expect(received).toEqual(['echo:hello']);
    expect(connection.isOpen()).toBe(false);
    await expect(connection.send('late')).rejects.toBeInstanceOf(TransportClosedError);
  });

  it('reports protocol pongs', async () => {
    const { server, url } = await echoServer();
    closers.push(() => new Promise((resolve) => server.close(() => resolve())));
    const connection = await transport.open(url, { timeoutMs: 2_000 });

    const pong = new Promise<void>((resolve) => connection.onPong(() => resolve()));
    await connection.ping();
    await pong;

    await connection.close();
    expect(connection.isOpen()).toBe(false);
    await expect(connection.ping()).rejects.toBeInstanceOf(TransportClosedError);
  });

  it('rejects when nothing listens', async () => {
    const spare = createServer();
    await new Promise<void>((resolve) => spare.listen(0, '127.0.0.1', () => resolve()));
    const port = portOf(spare.address());
    await new Promise<void>((resolve) => spare.close(() => resolve()));

    await expect(transport.open(`ws://127.0.0.1:${port}`, { timeoutMs: 2_000 })).rejects.toBeInstanceOf(
      TransportClosedError
    );
  });

  it('times out a handshake that never completes', async () => {
    const sockets: Socket[] = [];
    const silent: Server = createServer((socket) => sockets.push(socket));
    await new Promise<void>((resolve) => silent.listen(0, '127.0.0.1', () => resolve()));
    closers.push(
      () =>
        new Promise((resolve) => {
          for (const socket of sockets) socket.destroy();
          silent.close(() => resolve());
        })
    );

    await expect(
      transport.open(`ws://127.0.0.1:${portOf(silent.address())}`, { timeoutMs: 100 })
    ).rejects.toBeInstanceOf(ConnectTimeoutError);
  });
});
