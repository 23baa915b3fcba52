import { ConfigurationError } from '../errors';
import type { UdpEndpoint, WebSocketEndpoint } from './types';

function parsePort(raw: string, endpoint: string): number {
  const port = Number(raw);
  if (!/^\d+$/.test(raw) || port < 1 || port > 65535) {
    throw new ConfigurationError(`Invalid port in endpoint '${endpoint}'`);
  }
  return port;
}

/** `/pose/`, `pose` and `/pose?x=1` all normalize to `/pose`; an empty path to `/`. */
export function normalizePath(raw: string): string {
  const withoutQuery = raw.split(/[?#]/, 1)[0] ?? '';
  const trimmed = withoutQuery.replace(/\/+$/, '');
  if (!trimmed) return '/';
  return trimmed.startsWith('/') ? trimmed : `/${trimmed}`;
}

/**
 * Accepts `host:port[/path]` or `ws://host:port[/path]`.
 */
export function parseWebSocketEndpoint(endpoint: string): WebSocketEndpoint {
  const raw = endpoint.trim();
  const withScheme = /^wss?:\/\//.test(raw) ? raw : `ws://${raw}`;
  let url: URL;
  try {
    url = new URL(withScheme);
  } catch (err) {
    throw new ConfigurationError(`Invalid WebSocket endpoint '${endpoint}'`, { cause: err });
  }
  if (url.protocol === 'wss:') {
    throw new ConfigurationError(`TLS endpoints are not supported: '${endpoint}'`);
  }
  // URL drops the default port 80, so fall back to what was written.
  const port = url.port || (/:80(?:[/?#]|$)/.test(raw) ? '80' : '');
  if (!port) throw new ConfigurationError(`WebSocket endpoint '${endpoint}' is missing a port`);
  const host = url.hostname.replace(/^\[(.*)\]$/, '$1');
  const path = url.pathname === '/' && !raw.replace(/^wss?:\/\//, '').includes('/') ? null : normalizePath(url.pathname);
  return { host: host || '0.0.0.0', port: parsePort(port, endpoint), path };
}

/** `host:port`; an empty host means `127.0.0.1`. */
export function parseUdpEndpoint(endpoint: string): UdpEndpoint {
  const raw = endpoint.trim();
  const sep = raw.lastIndexOf(':');
  if (sep === -1) throw new ConfigurationError('UDP endpoint must be in host:port format');
  const host = raw.slice(0, sep).replace(/^\[(.*)\]$/, '$1');
  return { host: host || '127.0.0.1', port: parsePort(raw.slice(sep + 1), endpoint) };
}
