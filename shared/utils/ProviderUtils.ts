import net from 'net';
import { Provider, ProviderId } from '../types';

/**
 * Registered providers, in menu order (selection index = position + 1).
 */
export const PROVIDERS: readonly Provider[] = Object.freeze([
    {
        id: 'google',
        displayName: 'Google',
        primaryAddress: '8.8.8.8',
        secondaryAddress: '8.8.4.4',
        ipv6Addresses: ['2001:4860:4860::8888', '2001:4860:4860::8844'],
        supportsDot: true,
        dotHostname: 'dns.google'
    },
    {
        id: 'cloudflare',
        displayName: 'Cloudflare',
        primaryAddress: '1.1.1.1',
        secondaryAddress: '1.0.0.1',
        ipv6Addresses: ['2606:4700:4700::1111', '2606:4700:4700::1001'],
        supportsDot: true,
        dotHostname: 'cloudflare-dns.com'
    },
    {
        id: 'quad9',
        displayName: 'Quad9 (Security)',
        primaryAddress: '9.9.9.9',
        secondaryAddress: '149.112.112.112',
        ipv6Addresses: ['2620:fe::fe', '2620:fe::9'],
        supportsDot: true,
        dotHostname: 'dns.quad9.net'
    },
    {
        id: 'adguard',
        displayName: 'AdGuard (No Ads)',
        primaryAddress: '94.140.14.14',
        secondaryAddress: '94.140.15.15',
        ipv6Addresses: ['2a10:50c0::ad1:ff', '2a10:50c0::ad2:ff'],
        supportsDot: true,
        dotHostname: 'dns.adguard-dns.com'
    },
    {
        id: 'cleanbrowsing',
        displayName: 'CleanBrowsing (Family)',
        primaryAddress: '185.228.168.9',
        secondaryAddress: '185.228.169.9',
        ipv6Addresses: ['2a0d:2a00:1::', '2a0d:2a00:2::'],
        supportsDot: true,
        dotHostname: 'family-filter-dns.cleanbrowsing.org'
    }
]);

export const isProviderId = (value: string): value is ProviderId =>
    PROVIDERS.some(p => p.id === value);

export const getProviderById = (id: ProviderId): Provider => {
    const provider = PROVIDERS.find(p => p.id === id);
    if (!provider) {
        throw new Error(`Provider registry is missing '${id}'`);
    }
    return provider;
};

/**
 * Resolves a user selection: a 1-based menu index ("2") or a provider id ("cloudflare").
 */
export const findProvider = (selection: string): Provider | null => {
    const key = selection.trim().toLowerCase();
    if (/^\d+$/.test(key)) {
        return PROVIDERS[parseInt(key, 10) - 1] ?? null;
    }
    return PROVIDERS.find(p => p.id === key) ?? null;
};

/** IPv4 addresses first (primary, secondary), then IPv6. */
export const getProviderAddresses = (provider: Provider): string[] => {
    const addresses = [provider.primaryAddress];
    if (provider.secondaryAddress) addresses.push(provider.secondaryAddress);
    return [...addresses, ...provider.ipv6Addresses];
};

export const isValidAddress = (value: string): boolean => net.isIP(value.trim()) !== 0;

/**
 * Normalizes resolver output like "1.1.1.1#cloudflare-dns.com" or "fe80::1%eth0".
 * Returns null when what remains is not an IP address.
 */
export const normalizeAddress = (value: string): string | null => {
    const bare = value.trim().split('#')[0].split('%')[0];
    return isValidAddress(bare) ? bare : null;
};
