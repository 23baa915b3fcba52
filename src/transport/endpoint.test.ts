import { describe, expect, it } from 'vitest';
import { ConfigurationError } from '../errors';
import { fakeDiagnostics } from '../testing';
import { normalizePath, parseUdpEndpoint, parseWebSocketEndpoint } from './endpoint';
import { createTransport } from './index';
import { UdpTransport } from './udp';
import { WebSocketServerTransport } from './websocketServer';

describe('parseWebSocketEndpoint', () => {
  it('reads host, port and path with or without a scheme', () => {
    expect(parseWebSocketEndpoint('0.0.0.0:9000/pose')).toEqual({ host: '0.0.0.0', port: 9000, path: '/pose' });
    expect(parseWebSocketEndpoint('ws://localhost:9100/pose/')).toEqual({
      host: 'localhost',
      port: 9100,
      path: '/pose',
    });
  });

  it('accepts any path when none is configured', () => {
    expect(parseWebSocketEndpoint('127.0.0.1:9000').path).toBeNull();
  });

  it('rejects endpoints without a usable port', () => {
    expect(() => parseWebSocketEndpoint('localhost/pose')).toThrow(ConfigurationError);
    expect(() => parseWebSocketEndpoint('localhost:99999')).toThrow(ConfigurationError);
  });
});

describe('parseUdpEndpoint', () => {
  it('requires host:port and defaults an empty host to loopback', () => {
    expect(parseUdpEndpoint('10.0.0.5:7000')).toEqual({ host: '10.0.0.5', port: 7000 });
    expect(parseUdpEndpoint(':7000')).toEqual({ host: '127.0.0.1', port: 7000 });
    expect(() => parseUdpEndpoint('10.0.0.5')).toThrow('UDP endpoint must be in host:port format');
  });
});

describe('normalizePath', () => {
  it('strips trailing slashes and query strings', () => {
    expect(normalizePath('/pose/')).toBe('/pose');
    expect(normalizePath('pose?token=x')).toBe('/pose');
    expect(normalizePath('')).toBe('/');
  });
});

describe('createTransport', () => {
  it('builds the requested variant', () => {
    expect(createTransport('ws', '127.0.0.1:9000/pose', fakeDiagnostics())).toBeInstanceOf(WebSocketServerTransport);
    expect(createTransport('udp', '127.0.0.1:7000', fakeDiagnostics())).toBeInstanceOf(UdpTransport);
  });

  it('rejects unknown kinds', () => {
    expect(() => createTransport('tcp', '127.0.0.1:7000', fakeDiagnostics())).toThrow(
      "Unsupported transport type 'tcp'"
    );
  });
});
