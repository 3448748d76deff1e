import { describe, it, expect } from 'vitest';
import {
  PROVIDERS,
  findProvider,
  getProviderAddresses,
  getProviderById,
  isProviderId,
  isValidAddress,
  normalizeAddress
} from '../../shared/utils/ProviderUtils';

describe('ProviderUtils', () => {
  it('registers five providers with unique ids and valid addresses', () => {
    expect(PROVIDERS.map(p => p.id)).toEqual(['google', 'cloudflare', 'quad9', 'adguard', 'cleanbrowsing']);
    for (const p of PROVIDERS) {
      expect(getProviderAddresses(p).every(isValidAddress)).toBe(true);
      expect(p.supportsDot ? Boolean(p.dotHostname) : true).toBe(true);
    }
  });

  it('finds providers by 1-based index or by id', () => {
    expect(findProvider('2')?.id).toBe('cloudflare');
    expect(findProvider(' Quad9 ')?.id).toBe('quad9');
    expect(findProvider('0')).toBeNull();
    expect(findProvider('6')).toBeNull();
    expect(findProvider('opendns')).toBeNull();
  });

  it('narrows provider ids', () => {
    expect(isProviderId('google')).toBe(true);
    expect(isProviderId('Google')).toBe(false);
  });

  it('lists IPv4 addresses before IPv6', () => {
    expect(getProviderAddresses(getProviderById('cloudflare'))).toEqual([
      '1.1.1.1',
      '1.0.0.1',
      '2606:4700:4700::1111',
      '2606:4700:4700::1001'
    ]);
  });

  it('normalizes resolver notation', () => {
    expect(normalizeAddress('1.1.1.1#cloudflare-dns.com')).toBe('1.1.1.1');
    expect(normalizeAddress('fe80::1%eth0')).toBe('fe80::1');
    expect(normalizeAddress(' 8.8.8.8 ')).toBe('8.8.8.8');
    expect(normalizeAddress('dns.google')).toBeNull();
    expect(normalizeAddress('999.1.1.1')).toBeNull();
  });
});
