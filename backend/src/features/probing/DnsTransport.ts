import { promises as dnsPromises } from 'dns';
import { NetUtils } from '../../utils/NetUtils';

/**
 * Sends one A-record query to one specific server. No retries.
 */
export interface DnsTransport {
    resolve(server: string, domain: string, timeoutMs: number): Promise<string[]>;
}

export class NodeDnsTransport implements DnsTransport {

    async resolve(server: string, domain: string, timeoutMs: number): Promise<string[]> {
        const resolver = new dnsPromises.Resolver({ timeout: timeoutMs, tries: 1 });
        resolver.setServers([server]);
        return NetUtils.withTimeout(resolver.resolve4(domain), timeoutMs, () => resolver.cancel());
    }
}
