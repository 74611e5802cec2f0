import net from 'node:net';

import { SocketAddress } from '@condition-gate/api/predicates';

import { ConfigError } from '../errors.js';

export const DEFAULT_PORT = 80;

const BRACKETED_PATTERN = /^\[([^\]]+)\](?::(\d+))?$/;
const HOST_PORT_PATTERN = /^([^:]+)(?::(\d+))?$/;

/**
 * Parses `host`, `host:port`, `[ipv6]:port` or a bare IPv6 literal. The port defaults to 80.
 */
export function parseSocketAddress(value: string): SocketAddress {
  const text = value.trim();
  if (net.isIPv6(text)) {
    return Object.freeze({ host: text, port: DEFAULT_PORT });
  }
  const match = BRACKETED_PATTERN.exec(text) ?? HOST_PORT_PATTERN.exec(text);
  if (!match || (text.startsWith('[') && !net.isIPv6(match[1]))) {
    throw new ConfigError(`Socket address "${value}" is not correct, expected host or host:port`);
  }
  const port = match[2] === undefined ? DEFAULT_PORT : Number(match[2]);
  assertPort(port, value);
  return Object.freeze({ host: match[1], port });
}

export function assertPort(port: number, context: string): void {
  if (!Number.isInteger(port) || port < 1 || port > 65535) {
    throw new ConfigError(`Port of socket address "${context}" should be between 1 and 65535`);
  }
}

export function formatSocketAddress({ host, port }: SocketAddress): string {
  return net.isIPv6(host) ? `[${host}]:${port}` : `${host}:${port}`;
}
