import type { IncomingMessage } from 'node:http';
import { WebSocket, WebSocketServer } from 'ws';
import type { Diagnostics } from '../diagnostics';
import { describeError, ResourceError, TransientIOError } from '../errors';
import { encodeFrame } from '../frame';
import type { SkeletonFrame } from '../types';
import { normalizePath } from './endpoint';
import type { SkeletonTransport, WebSocketEndpoint } from './types';

const CLOSE_POLICY_VIOLATION = 1008;
const CLOSE_GOING_AWAY = 1001;
const SHUTDOWN_GRACE_MS = 1000;

/**
 * WebSocket server that streams frames to a single subscriber.
 *
 * Last connection wins: a new client replaces the tracked handle. The previous socket
 * is left to its own close handling rather than being terminated here.
 */
export class WebSocketServerTransport implements SkeletonTransport {
  readonly kind = 'ws' as const;
  private server: WebSocketServer | null = null;
  private opening: Promise<void> | null = null;
  private client: WebSocket | null = null;

  constructor(
    private readonly endpoint: WebSocketEndpoint,
    private readonly diagnostics: Diagnostics
  ) {}

  get hasSubscriber(): boolean {
    return this.client !== null;
  }

  /** Bound address once listening; useful when the configured port is 0. */
  address(): { host: string; port: number } | null {
    const addr = this.server?.address();
    if (!addr || typeof addr === 'string') return null;
    return { host: addr.address, port: addr.port };
  }

  connect(): Promise<void> {
    if (this.server) return Promise.resolve();
    if (!this.opening) {
      this.opening = this.listen().finally(() => {
        this.opening = null;
      });
    }
    return this.opening;
  }

  private async listen(): Promise<void> {
    const { host, port, path } = this.endpoint;
    const server = new WebSocketServer({ host, port });
    try {
      await new Promise<void>((resolve, reject) => {
        const onListening = () => {
          server.off('error', onError);
          resolve();
        };
        const onError = (err: Error) => {
          server.off('listening', onListening);
          reject(err);
        };
        server.once('listening', onListening);
        server.once('error', onError);
      });
    } catch (err) {
      server.close();
      throw new ResourceError(`Could not listen on ${host}:${port}`, { cause: err });
    }
    server.on('connection', (socket, request) => this.handleConnection(socket, request));
    server.on('error', (err) => this.diagnostics.error(`WebSocket server error: ${describeError(err)}`));
    this.server = server;
    const bound = this.address();
    this.diagnostics.info(`Listening for WebSocket subscribers on ${host}:${bound?.port ?? port}${path ?? ''}`);
  }

  private handleConnection(socket: WebSocket, request: IncomingMessage): void {
    const requested = normalizePath(request.url ?? '/');
    const peer = request.socket.remoteAddress ?? 'unknown';
    if (this.endpoint.path !== null && requested !== this.endpoint.path) {
      this.diagnostics.warn(`Rejected subscriber ${peer} on unexpected path ${requested}`);
      socket.close(CLOSE_POLICY_VIOLATION, 'Unexpected path');
      return;
    }
    if (this.client) {
      this.diagnostics.info(`Subscriber ${peer} replaces the previous connection`);
    } else {
      this.diagnostics.info(`Subscriber ${peer} connected`);
    }
    this.client = socket;
    socket.on('close', () => {
      this.diagnostics.info(`Subscriber ${peer} disconnected`);
      this.release(socket);
    });
    socket.on('error', (err) => {
      this.diagnostics.warn(`Subscriber ${peer} connection error: ${describeError(err)}`);
      this.release(socket);
    });
  }

  /** Clears the tracked handle only if it still points at `socket`. */
  private release(socket: WebSocket): void {
    if (this.client === socket) this.client = null;
  }

  async send(frame: SkeletonFrame): Promise<void> {
    const client = this.client;
    if (!client) return;
    if (client.readyState !== WebSocket.OPEN) {
      this.release(client);
      return;
    }
    const payload = encodeFrame(frame);
    await new Promise<void>((resolve) => {
      const fail = (err: unknown) => {
        const dropped = new TransientIOError('WebSocket send failed; dropping frame', { cause: err });
        this.diagnostics.warn(`${dropped.message}: ${describeError(err)}`);
        this.release(client);
        resolve();
      };
      try {
        client.send(payload, (err) => {
          if (err) fail(err);
          else resolve();
        });
      } catch (err) {
        fail(err);
      }
    });
    this.diagnostics.debug(`Sent skeleton frame (${frame.joints.size} joints) via WebSocket`);
  }

  async close(): Promise<void> {
    if (this.opening) {
      await this.opening.catch(() => undefined);
    }
    const server = this.server;
    this.server = null;
    this.client = null;
    if (!server) return;
    for (const socket of server.clients) {
      socket.close(CLOSE_GOING_AWAY, 'Server shutting down');
    }
    const grace = setTimeout(() => {
      for (const socket of server.clients) socket.terminate();
    }, SHUTDOWN_GRACE_MS);
    await new Promise<void>((resolve) => server.close(() => resolve()));
    clearTimeout(grace);
    this.diagnostics.info('Closed WebSocket server');
  }
}
