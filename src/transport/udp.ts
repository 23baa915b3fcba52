import { createSocket, type Socket } from 'node:dgram';
import { isIPv6 } from 'node:net';
import type { Diagnostics } from '../diagnostics';
import { describeError, ResourceError, TransientIOError } from '../errors';
import { encodeFrame } from '../frame';
import type { SkeletonFrame } from '../types';
import type { SkeletonTransport, UdpEndpoint } from './types';

/** Fire-and-forget datagrams, one per frame. No acknowledgement, no retry. */
export class UdpTransport implements SkeletonTransport {
  readonly kind = 'udp' as const;
  private socket: Socket | null = null;

  constructor(
    private readonly endpoint: UdpEndpoint,
    private readonly diagnostics: Diagnostics
  ) {}

  async connect(): Promise<void> {
    if (this.socket) return;
    const { host, port } = this.endpoint;
    this.diagnostics.info(`Preparing UDP socket to ${host}:${port}`);
    const socket = createSocket(isIPv6(host) ? 'udp6' : 'udp4');
    try {
      await new Promise<void>((resolve, reject) => {
        socket.once('error', reject);
        socket.bind(0, () => {
          socket.off('error', reject);
          resolve();
        });
      });
    } catch (err) {
      socket.close();
      throw new ResourceError(`Could not open UDP socket for ${host}:${port}`, { cause: err });
    }
    socket.on('error', (err) => this.diagnostics.warn(`UDP socket error: ${describeError(err)}`));
    this.socket = socket;
  }

  async send(frame: SkeletonFrame): Promise<void> {
    const socket = this.socket;
    if (!socket) return;
    const payload = Buffer.from(encodeFrame(frame), 'utf8');
    const { host, port } = this.endpoint;
    await new Promise<void>((resolve) => {
      try {
        socket.send(payload, port, host, (err) => {
          if (err) {
            const dropped = new TransientIOError('UDP send failed; dropping frame', { cause: err });
            this.diagnostics.warn(`${dropped.message}: ${describeError(err)}`);
          }
          resolve();
        });
      } catch (err) {
        this.diagnostics.warn(`UDP send failed; dropping frame: ${describeError(err)}`);
        resolve();
      }
    });
    this.diagnostics.debug(`Sent skeleton frame (${frame.joints.size} joints) via UDP`);
  }

  async close(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    if (!socket) return;
    await new Promise<void>((resolve) => socket.close(() => resolve()));
    this.diagnostics.info('Closed UDP socket');
  }
}
