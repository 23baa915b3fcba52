import { createSocket, type Socket } from 'node:dgram';
import { afterEach, describe, expect, it } from 'vitest';
import { toWireFrame } from '../frame';
import { fakeDiagnostics, makeFrame } from '../testing';
import { UdpTransport } from './udp';

function bindReceiver(): Promise<{ socket: Socket; port: number }> {
  const socket = createSocket('udp4');
  return new Promise((resolve, reject) => {
    socket.once('error', reject);
    socket.bind(0, '127.0.0.1', () => {
      const { port } = socket.address();
      resolve({ socket, port });
    });
  });
}

function nextDatagram(socket: Socket): Promise<string> {
  return new Promise((resolve) => socket.once('message', (msg) => resolve(msg.toString('utf8'))));
}

describe('UdpTransport', () => {
  let receiver: Socket | null = null;
  let transport: UdpTransport | null = null;

  afterEach(async () => {
    await transport?.close();
    receiver?.close();
    receiver = null;
    transport = null;
  });

  it('sends one JSON datagram per frame', async () => {
    const bound = await bindReceiver();
    receiver = bound.socket;
    transport = new UdpTransport({ host: '127.0.0.1', port: bound.port }, fakeDiagnostics());
    await transport.connect();

    const received = nextDatagram(bound.socket);
    const frame = makeFrame(99, { seat: 'x' });
    await transport.send(frame);

    expect(JSON.parse(await received)).toEqual(toWireFrame(frame));
  });

  it('drops frames before connect and closes idempotently', async () => {
    transport = new UdpTransport({ host: '127.0.0.1', port: 9 }, fakeDiagnostics());
    await expect(transport.send(makeFrame(1))).resolves.toBeUndefined();
    await transport.connect();
    await transport.connect();
    await transport.close();
    await expect(transport.close()).resolves.toBeUndefined();
  });
});
