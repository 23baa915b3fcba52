import type { Diagnostics } from '../diagnostics';
import { ConfigurationError } from '../errors';
import { parseUdpEndpoint, parseWebSocketEndpoint } from './endpoint';
import type { SkeletonTransport } from './types';
import { UdpTransport } from './udp';
import { WebSocketServerTransport } from './websocketServer';

export type { SkeletonTransport, TransportKind, UdpEndpoint, WebSocketEndpoint } from './types';
export { normalizePath, parseUdpEndpoint, parseWebSocketEndpoint } from './endpoint';
export { UdpTransport } from './udp';
export { WebSocketServerTransport } from './websocketServer';

export function createTransport(kind: string, endpoint: string, diagnostics: Diagnostics): SkeletonTransport {
  if (kind === 'ws') {
    return new WebSocketServerTransport(parseWebSocketEndpoint(endpoint), diagnostics.child('ws'));
  }
  if (kind === 'udp') {
    return new UdpTransport(parseUdpEndpoint(endpoint), diagnostics.child('udp'));
  }
  throw new ConfigurationError(`Unsupported transport type '${kind}'`);
}
