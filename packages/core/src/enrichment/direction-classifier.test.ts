/**
 * Direction classifier and local address set tests
 */
import { describe, it, expect } from 'vitest';
import { InvalidAddressError } from '@flowgauge/shared';
import { classify } from './direction-classifier.js';
import { LocalAddressSet } from './local-address-set.js';
import { parseAddress } from './address.js';
import type { FlowEndpoints } from './types.js';

function endpoints(src: string, dst: string): FlowEndpoints {
  return { ipSrc: parseAddress(src), ipDst: parseAddress(dst) };
}

describe('classify()', () => {
  const local = LocalAddressSet.fromStrings(['10.0.2.1', '2001:db8::10']);

  describe('direction', () => {
    it('should tag traffic to a local address as inbound', () => {
      expect(classify(endpoints('8.8.8.8', '10.0.2.1'), local).direction).toBe('in');
    });

    it('should tag traffic from a local address as outbound', () => {
      expect(classify(endpoints('10.0.2.1', '8.8.8.8'), local).direction).toBe('out');
    });

    it('should tag transit traffic as unknown', () => {
      expect(classify(endpoints('8.8.8.8', '1.1.1.1'), local).direction).toBe('unknown');
    });

    it('should prefer inbound when both endpoints are local', () => {
      const both = LocalAddressSet.fromStrings(['10.0.0.1', '10.0.0.2']);

      expect(classify(endpoints('10.0.0.1', '10.0.0.2'), both).direction).toBe('in');
      expect(classify(endpoints('10.0.0.2', '10.0.0.1'), both).direction).toBe('in');
    });

    it('should match IPv6 addresses in any textual form', () => {
      expect(classify(endpoints('2001:db8::99', '2001:0db8:0:0:0:0:0:10'), local).direction).toBe('in');
    });

    it('should match IPv4-mapped IPv6 endpoints against IPv4 local addresses', () => {
      expect(classify(endpoints('::ffff:10.0.2.1', '8.8.8.8'), local).direction).toBe('out');
    });

    it('should classify everything as unknown with an empty local set', () => {
      const none = new LocalAddressSet([]);

      expect(classify(endpoints('10.0.2.1', '8.8.8.8'), none).direction).toBe('unknown');
    });
  });

  describe('privacy', () => {
    it('should mark flows between RFC 1918 addresses as private', () => {
      expect(classify(endpoints('10.0.0.1', '10.0.0.2'), local).privacy).toBe('private');
      expect(classify(endpoints('192.168.1.10', '172.16.0.1'), local).privacy).toBe('private');
    });

    it('should mark flows with one public endpoint as public', () => {
      expect(classify(endpoints('8.8.8.8', '10.0.0.5'), local).privacy).toBe('public');
      expect(classify(endpoints('10.0.0.5', '8.8.8.8'), local).privacy).toBe('public');
    });

    it('should count loopback and link-local addresses as private', () => {
      expect(classify(endpoints('127.0.0.1', '169.254.10.20'), local).privacy).toBe('private');
      expect(classify(endpoints('::1', 'fe80::1'), local).privacy).toBe('private');
    });

    it('should count IPv6 unique-local addresses as private', () => {
      expect(classify(endpoints('fd12:3456:789a::1', '10.0.0.1'), local).privacy).toBe('private');
    });

    it('should not count addresses just outside 172.16.0.0/12 as private', () => {
      expect(classify(endpoints('172.32.0.1', '10.0.0.1'), local).privacy).toBe('public');
    });

    it('should not count carrier-grade NAT space as private', () => {
      expect(classify(endpoints('100.64.0.1', '10.0.0.1'), local).privacy).toBe('public');
    });
  });
});

describe('LocalAddressSet', () => {
  it('should deduplicate equivalent addresses', () => {
    const set = LocalAddressSet.fromStrings(['2001:db8::1', '2001:0db8::0001', '10.0.0.1']);

    expect(set.size).toBe(2);
  });

  it('should reject invalid entries', () => {
    expect(() => LocalAddressSet.fromStrings(['10.0.0.1', 'eth0'])).toThrow(InvalidAddressError);
  });

  it('should answer membership by address value', () => {
    const set = LocalAddressSet.fromStrings(['10.0.2.1']);

    expect(set.has(parseAddress('10.0.2.1'))).toBe(true);
    expect(set.has(parseAddress('10.0.2.2'))).toBe(false);
  });
});
