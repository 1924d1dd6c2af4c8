import { describe, expect, it, vi } from 'vitest';
import {
  AddressResolutionError,
  formatSocketAddress,
  parseSocketAddress,
  resolveSocketAddress,
  splitHostPort,
  type HostResolver,
} from './address.js';

function stubResolver(results: Record<string, readonly string[]>): HostResolver {
  return {
    resolve: vi.fn((hostname: string) => Promise.resolve(results[hostname] ?? [])),
  };
}

describe('Socket addresses', () => {
  describe('splitHostPort', () => {
    it('should split host and port', () => {
      expect(splitHostPort('mc.example.com:25565')).toEqual({ host: 'mc.example.com', port: 25565 });
    });

    it('should split bracketed IPv6 addresses', () => {
      expect(splitHostPort('[::1]:25565')).toEqual({ host: '::1', port: 25565 });
    });

    it('should reject a missing port', () => {
      expect(() => splitHostPort('127.0.0.1')).toThrow(
        "Invalid address '127.0.0.1': missing port"
      );
    });

    it('should reject an unbracketed IPv6 address', () => {
      expect(() => splitHostPort('::1:25565')).toThrow(
        "Invalid address '::1:25565': expected host:port"
      );
    });

    it('should reject a non-numeric port', () => {
      expect(() => splitHostPort('127.0.0.1:abc')).toThrow(
        "Invalid port in address '127.0.0.1:abc'"
      );
    });

    it('should reject an out of range port', () => {
      expect(() => splitHostPort('127.0.0.1:65536')).toThrow(
        "Port out of range in address '127.0.0.1:65536'"
      );
    });

    it('should accept the port bounds', () => {
      expect(splitHostPort('127.0.0.1:0').port).toBe(0);
      expect(splitHostPort('127.0.0.1:65535').port).toBe(65535);
    });
  });

  describe('parseSocketAddress', () => {
    it('should parse an IPv4 address', () => {
      expect(parseSocketAddress('127.0.0.1:25566')).toEqual({
        host: '127.0.0.1',
        port: 25566,
        family: 4,
      });
    });

    it('should parse an IPv6 address', () => {
      expect(parseSocketAddress('[::1]:25565')).toEqual({ host: '::1', port: 25565, family: 6 });
    });

    it('should reject hostnames', () => {
      expect(() => parseSocketAddress('localhost:25565')).toThrow(
        "Host in 'localhost:25565' is not an IP address"
      );
    });

    it('should throw AddressResolutionError carrying the address', () => {
      try {
        parseSocketAddress('nope');
        expect.fail('expected an error');
      } catch (error) {
        expect(error).toBeInstanceOf(AddressResolutionError);
        if (error instanceof AddressResolutionError) {
          expect(error.address).toBe('nope');
        }
      }
    });
  });

  describe('resolveSocketAddress', () => {
    it('should not call the resolver for literal IPs', async () => {
      const resolver = stubResolver({});
      const address = await resolveSocketAddress('10.0.0.5:25565', resolver);

      expect(address).toEqual({ host: '10.0.0.5', port: 25565, family: 4 });
      expect(resolver.resolve).not.toHaveBeenCalled();
    });

    it('should use the first resolved address', async () => {
      const resolver = stubResolver({ 'mc.test': ['192.0.2.10', '192.0.2.11'] });

      const address = await resolveSocketAddress('mc.test:25566', resolver);

      expect(address).toEqual({ host: '192.0.2.10', port: 25566, family: 4 });
      expect(resolver.resolve).toHaveBeenCalledWith('mc.test');
    });

    it('should skip resolver results that are not IPs', async () => {
      const resolver = stubResolver({ 'mc.test': ['garbage', '2001:db8::1'] });

      const address = await resolveSocketAddress('mc.test:25566', resolver);

      expect(address).toEqual({ host: '2001:db8::1', port: 25566, family: 6 });
    });

    it('should fail when the hostname resolves to nothing', async () => {
      const resolver = stubResolver({});

      await expect(resolveSocketAddress('nowhere.test:25565', resolver)).rejects.toThrow(
        "Host 'nowhere.test' in 'nowhere.test:25565' did not resolve to any address"
      );
    });

    it('should wrap resolver failures', async () => {
      const resolver: HostResolver = {
        resolve: () => Promise.reject(new Error('getaddrinfo ENOTFOUND nowhere.test')),
      };

      const promise = resolveSocketAddress('nowhere.test:25565', resolver);

      await expect(promise).rejects.toBeInstanceOf(AddressResolutionError);
      await expect(promise).rejects.toThrow(
        "Failed to resolve host 'nowhere.test' in 'nowhere.test:25565': getaddrinfo ENOTFOUND nowhere.test"
      );
    });

    it('should reject malformed text before resolving', async () => {
      const resolver = stubResolver({});

      await expect(resolveSocketAddress('nowhere.test', resolver)).rejects.toThrow('missing port');
      expect(resolver.resolve).not.toHaveBeenCalled();
    });
  });

  describe('formatSocketAddress', () => {
    it('should format IPv4 addresses', () => {
      expect(formatSocketAddress({ host: '0.0.0.0', port: 25565, family: 4 })).toBe('0.0.0.0:25565');
    });

    it('should bracket IPv6 addresses', () => {
      expect(formatSocketAddress({ host: '::', port: 25565, family: 6 })).toBe('[::]:25565');
    });

    it('should format what it parses', () => {
      for (const text of ['127.0.0.1:25566', '[::1]:1', '0.0.0.0:0']) {
        expect(formatSocketAddress(parseSocketAddress(text))).toBe(text);
      }
    });
  });
});
