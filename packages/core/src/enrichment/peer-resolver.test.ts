/**
 * PeerResolver Tests
 */
import { describe, it, expect, vi } from 'vitest';
import { InvalidAddressError } from '@flowgauge/shared';
import type { LookupServices } from '@flowgauge/shared';
import { PeerResolver } from './peer-resolver.js';
import {
  createStaticLookups,
  GOOGLE_DNS_ASN,
  GOOGLE_DNS_CITY,
} from '../../../../tests/mocks/lookups.js';

describe('PeerResolver', () => {
  const lookups = createStaticLookups({
    cities: { '8.8.8.8': GOOGLE_DNS_CITY },
    asns: { '8.8.8.8': GOOGLE_DNS_ASN },
  });

  describe('resolve()', () => {
    it('should fill geolocation and ASN fields', () => {
      const resolver = new PeerResolver(lookups);

      const peer = resolver.resolve('8.8.8.8');

      expect(peer.ip.toString()).toBe('8.8.8.8');
      expect(peer).toMatchObject({
        country: 'United States',
        countryIso: 'US',
        city: 'Mountain View',
        latitude: 37.386,
        longitude: -122.0838,
        asn: '15169',
        asnOrg: 'GOOGLE',
      });
    });

    it('should leave fields empty on a lookup miss', () => {
      const resolver = new PeerResolver(lookups);

      const peer = resolver.resolve('10.0.1.1');

      expect(peer).toMatchObject({
        country: '',
        countryIso: '',
        city: '',
        latitude: 0,
        longitude: 0,
        asn: '',
        asnOrg: '',
      });
    });

    it('should apply each lookup independently', () => {
      const resolver = new PeerResolver(
        createStaticLookups({ asns: { '8.8.8.8': GOOGLE_DNS_ASN } })
      );

      const peer = resolver.resolve('8.8.8.8');

      expect(peer.country).toBe('');
      expect(peer.asn).toBe('15169');
      expect(peer.asnOrg).toBe('GOOGLE');
    });

    it('should treat a throwing lookup as a miss for that lookup only', () => {
      const failing: LookupServices = {
        city: {
          lookupCity: () => {
            throw new Error('corrupt search tree');
          },
        },
        asn: lookups.asn,
      };
      const resolver = new PeerResolver(failing);

      const peer = resolver.resolve('8.8.8.8');

      expect(peer.city).toBe('');
      expect(peer.asn).toBe('15169');
    });

    it('should pass the address string to both lookups', () => {
      const lookupCity = vi.fn().mockReturnValue(null);
      const lookupAsn = vi.fn().mockReturnValue(null);
      const resolver = new PeerResolver({ city: { lookupCity }, asn: { lookupAsn } });

      resolver.resolve('2001:db8::1');

      expect(lookupCity).toHaveBeenCalledWith('2001:db8::1');
      expect(lookupAsn).toHaveBeenCalledWith('2001:db8::1');
    });

    it('should accept IPv6 addresses', () => {
      const resolver = new PeerResolver(lookups);

      expect(resolver.resolve('2001:db8::1').ip.kind()).toBe('ipv6');
    });

    it('should unwrap IPv4-mapped IPv6 addresses', () => {
      const resolver = new PeerResolver(lookups);

      const peer = resolver.resolve('::ffff:10.0.0.1');

      expect(peer.ip.kind()).toBe('ipv4');
      expect(peer.ip.toString()).toBe('10.0.0.1');
    });

    it('should look up IPv4-mapped addresses by their IPv4 form', () => {
      const resolver = new PeerResolver(
        createStaticLookups({ cities: { '8.8.8.8': GOOGLE_DNS_CITY }, asns: { '8.8.8.8': GOOGLE_DNS_ASN } })
      );

      const peer = resolver.resolve('::ffff:8.8.8.8');

      expect(peer.ip.toString()).toBe('8.8.8.8');
      expect(peer.country).toBe('United States');
      expect(peer.asn).toBe('15169');
      expect(peer.asnOrg).toBe('GOOGLE');
    });

    it('should be deterministic for the same address', () => {
      const resolver = new PeerResolver(lookups);

      expect(resolver.resolve('8.8.8.8')).toEqual(resolver.resolve('8.8.8.8'));
    });

    it.each(['not-an-ip', '', '10.1', '256.1.1.1', '10.0.0.1:443', '2001:db8::g', ' 10.0.0.1', 'fe80::1%eth0'])(
      'should reject %j as an invalid address',
      (raw) => {
        const resolver = new PeerResolver(lookups);

        expect(() => resolver.resolve(raw)).toThrow(InvalidAddressError);
      }
    );

    it('should not query lookups for an invalid address', () => {
      const lookupCity = vi.fn().mockReturnValue(null);
      const lookupAsn = vi.fn().mockReturnValue(null);
      const resolver = new PeerResolver({ city: { lookupCity }, asn: { lookupAsn } });

      expect(() => resolver.resolve('not-an-ip')).toThrow(InvalidAddressError);
      expect(lookupCity).not.toHaveBeenCalled();
      expect(lookupAsn).not.toHaveBeenCalled();
    });
  });
});
