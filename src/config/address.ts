/**
 * Socket address parsing and hostname resolution.
 *
 * @packageDocumentation
 */

import { lookup } from 'node:dns/promises';
import { isIP } from 'node:net';

/**
 * A concrete IP address and port.
 */
export interface SocketAddress {
  /** Literal IPv4 or IPv6 address, without brackets. */
  readonly host: string;
  readonly port: number;
  readonly family: 4 | 6;
}

/**
 * Resolves hostnames to IP addresses.
 *
 * Injected so that config loading can be tested without touching DNS.
 */
export interface HostResolver {
  /**
   * Looks up all addresses for a hostname.
   *
   * @param hostname - Hostname to resolve.
   * @returns Literal IP addresses, in resolver order.
   */
  resolve(hostname: string): Promise<readonly string[]>;
}

/**
 * Resolver backed by the system resolver (`getaddrinfo`).
 */
export const systemHostResolver: HostResolver = {
  async resolve(hostname: string): Promise<readonly string[]> {
    const results = await lookup(hostname, { all: true });
    return results.map((result) => result.address);
  },
};

/**
 * Error thrown when an address cannot be parsed or resolved.
 */
export class AddressResolutionError extends Error {
  /** The address text that failed. */
  public readonly address: string;
  /** The underlying error, if any. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new AddressResolutionError.
   *
   * @param message - Descriptive error message.
   * @param address - The address text that failed.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, address: string, cause?: Error) {
    super(message);
    this.name = 'AddressResolutionError';
    this.address = address;
    this.cause = cause;
  }
}

/**
 * Host and port split from an address string, before resolution.
 */
export interface HostPort {
  readonly host: string;
  readonly port: number;
}

const PORT_PATTERN = /^\d{1,5}$/;

function parsePort(text: string, address: string): number {
  if (!PORT_PATTERN.test(text)) {
    throw new AddressResolutionError(`Invalid port in address '${address}'`, address);
  }
  const port = Number(text);
  if (port > 65535) {
    throw new AddressResolutionError(`Port out of range in address '${address}'`, address);
  }
  return port;
}

/**
 * Splits `host:port` or `[ipv6]:port` into its parts.
 *
 * @param address - Address text.
 * @returns Host (without brackets) and port.
 * @throws AddressResolutionError if the text is not a valid host and port.
 */
export function splitHostPort(address: string): HostPort {
  if (address.startsWith('[')) {
    const close = address.indexOf(']');
    if (close === -1 || address.charAt(close + 1) !== ':') {
      throw new AddressResolutionError(`Invalid address '${address}': expected [host]:port`, address);
    }
    const host = address.slice(1, close);
    if (isIP(host) !== 6) {
      throw new AddressResolutionError(`Invalid IPv6 address in '${address}'`, address);
    }
    return { host, port: parsePort(address.slice(close + 2), address) };
  }

  const colon = address.lastIndexOf(':');
  if (colon === -1) {
    throw new AddressResolutionError(`Invalid address '${address}': missing port`, address);
  }
  const host = address.slice(0, colon);
  if (host === '' || host.includes(':')) {
    throw new AddressResolutionError(`Invalid address '${address}': expected host:port`, address);
  }
  return { host, port: parsePort(address.slice(colon + 1), address) };
}

function toSocketAddress(host: string, port: number): SocketAddress | undefined {
  const family = isIP(host);
  if (family === 4 || family === 6) {
    return { host, port, family };
  }
  return undefined;
}

/**
 * Parses an address whose host is a literal IP. Hostnames are not resolved.
 *
 * @param address - Address text such as `127.0.0.1:25566` or `[::1]:25565`.
 * @returns The parsed address.
 * @throws AddressResolutionError if the text is invalid or the host is not a literal IP.
 */
export function parseSocketAddress(address: string): SocketAddress {
  const { host, port } = splitHostPort(address);
  const parsed = toSocketAddress(host, port);
  if (parsed === undefined) {
    throw new AddressResolutionError(`Host in '${address}' is not an IP address`, address);
  }
  return parsed;
}

/**
 * Resolves an address to a concrete IP and port.
 *
 * Literal IPs are used as-is. Hostnames are looked up and the first returned
 * address is used.
 *
 * @param address - Address text.
 * @param resolver - Hostname resolver.
 * @returns The resolved address.
 * @throws AddressResolutionError if the text is invalid or the hostname does not resolve.
 *
 * @example
 * ```typescript
 * const addr = await resolveSocketAddress('localhost:25565', systemHostResolver);
 * formatSocketAddress(addr); // "127.0.0.1:25565" (or "[::1]:25565")
 * ```
 */
export async function resolveSocketAddress(
  address: string,
  resolver: HostResolver
): Promise<SocketAddress> {
  const { host, port } = splitHostPort(address);

  const literal = toSocketAddress(host, port);
  if (literal !== undefined) {
    return literal;
  }

  let resolved: readonly string[];
  try {
    resolved = await resolver.resolve(host);
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new AddressResolutionError(
      `Failed to resolve host '${host}' in '${address}': ${cause.message}`,
      address,
      cause
    );
  }

  for (const ip of resolved) {
    const parsed = toSocketAddress(ip, port);
    if (parsed !== undefined) {
      return parsed;
    }
  }

  throw new AddressResolutionError(`Host '${host}' in '${address}' did not resolve to any address`, address);
}

/**
 * Formats an address as `host:port`, bracketing IPv6 hosts.
 */
export function formatSocketAddress(address: SocketAddress): string {
  return address.family === 6
    ? `[${address.host}]:${String(address.port)}`
    : `${address.host}:${String(address.port)}`;
}
