import { Provider } from '../../../../shared/types';
import { getProviderById, normalizeAddress } from '../../../../shared/utils/ProviderUtils';
import { RESOLVED_STUB_ADDRESS } from '../../constants';

const HEADER = '# Generated by dnsswitch';
const MAX_NAMESERVERS = 3; // glibc MAXNS

export interface RenderedConfig {
    live: string;
    transport: string;
}

export const DEFAULT_LIVE_CONFIG = [
    `${HEADER} - system default (DHCP)`,
    '# NetworkManager regenerates this file.',
    ''
].join('\n');

export const DEFAULT_TRANSPORT = [
    '# systemd-resolved.conf (reset by dnsswitch)',
    '[Resolve]',
    '#DNS=',
    '#FallbackDNS=',
    '#DNSOverTLS=no',
    ''
].join('\n');

const fallbackFor = (provider: Provider): Provider =>
    getProviderById(provider.id === 'cloudflare' ? 'google' : 'cloudflare');

const withHostname = (address: string, hostname?: string) => hostname ? `${address}#${hostname}` : address;

export const expectedNameservers = (provider: Provider | null, dot: boolean): string[] => {
    if (!provider) return [];
    if (dot) return [RESOLVED_STUB_ADDRESS];

    const servers = [provider.primaryAddress];
    if (provider.secondaryAddress) servers.push(provider.secondaryAddress);
    return [...servers, ...provider.ipv6Addresses].slice(0, MAX_NAMESERVERS);
};

/**
 * Deterministic rendering: the same provider and DoT flag always produce the same bytes.
 * No timestamps, so an unchanged target can be detected by comparison.
 */
export const renderConfig = (provider: Provider | null, dot: boolean): RenderedConfig => {
    if (!provider) {
        return { live: DEFAULT_LIVE_CONFIG, transport: DEFAULT_TRANSPORT };
    }

    if (!dot) {
        const lines = [`${HEADER} - ${provider.displayName}`];
        for (const ns of expectedNameservers(provider, false)) {
            lines.push(`nameserver ${ns}`);
        }
        return { live: lines.join('\n') + '\n', transport: DEFAULT_TRANSPORT };
    }

    const title = `${HEADER} - ${provider.displayName} (DNS-over-TLS)`;
    const upstreams = [provider.primaryAddress, provider.secondaryAddress, ...provider.ipv6Addresses]
        .filter((a): a is string => Boolean(a))
        .map(a => withHostname(a, provider.dotHostname));
    const fallback = fallbackFor(provider);

    const transport = [
        title,
        '[Resolve]',
        `DNS=${upstreams.join(' ')}`,
        `FallbackDNS=${withHostname(fallback.primaryAddress, fallback.dotHostname)}`,
        'Domains=~.',
        'DNSOverTLS=yes',
        'DNSSEC=allow-downgrade',
        ''
    ].join('\n');

    const live = [
        title,
        `nameserver ${RESOLVED_STUB_ADDRESS}`,
        'options edns0 trust-ad',
        ''
    ].join('\n');

    return { live, transport };
};

/**
 * Extracts `nameserver` entries from resolv.conf content, skipping invalid addresses.
 */
export const readNameservers = (content: string): string[] => {
    const servers: string[] = [];
    for (const line of content.split(/\r?\n/)) {
        const parts = line.trim().split(/\s+/);
        if (parts[0] !== 'nameserver' || parts.length < 2) continue;
        const address = normalizeAddress(parts[1]);
        if (address) servers.push(address);
    }
    return servers;
};

export const isDotTransport = (content: string): boolean => /^DNSOverTLS=yes\s*$/m.test(content);
