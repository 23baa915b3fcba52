import type { SkeletonFrame } from '../types';

/**
 * Consumer-facing sink for skeleton frames.
 *
 * `connect` and `close` are idempotent. `send` is best effort: a missing or broken
 * peer is a silent drop, never a rejection.
 */
export interface SkeletonTransport {
  readonly kind: TransportKind;
  connect(): Promise<void>;
  send(frame: SkeletonFrame): Promise<void>;
  close(): Promise<void>;
}

export type TransportKind = 'ws' | 'udp';

export interface WebSocketEndpoint {
  host: string;
  port: number;
  /** Normalized, e.g. `/pose`; null accepts any path. */
  path: string | null;
}

export interface UdpEndpoint {
  host: string;
  port: number;
}
