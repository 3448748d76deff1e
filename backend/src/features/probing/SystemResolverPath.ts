import { promises as dnsPromises } from 'dns';
import { ResolverObservation } from '../../../../shared/types';
import { normalizeAddress } from '../../../../shared/utils/ProviderUtils';
import { RESOLV_CONF, RESOLVED_STUB_ADDRESS } from '../../constants';
import { errorMessage } from '../../utils/AppError';
import { FileUtils } from '../../utils/FileUtils';
import { logger } from '../../utils/logger';
import { NetUtils } from '../../utils/NetUtils';
import { runCommand } from '../../utils/ShellUtils';
import { readNameservers } from '../dns/ConfigRenderer';

/**
 * Resolution through whatever the OS is actually using, plus the identity of the upstream that answered.
 */
export interface SystemResolverPath {
    observe(domain: string, timeoutMs: number): Promise<ResolverObservation>;
}

/**
 * First `Current DNS Server:` entry of `resolvectl status` output (the global section prints first).
 */
export const parseCurrentDnsServer = (output: string): string | null => {
    for (const line of output.split(/\r?\n/)) {
        const match = line.match(/^\s*Current DNS Server:\s*(\S+)/);
        if (match) {
            const address = normalizeAddress(match[1]);
            if (address) return address;
        }
    }
    return null;
};

export interface ResolverPathHooks {
    /** IPv4 address the host resolver returns for the name. */
    lookup(domain: string): Promise<string>;
    /** Raw `resolvectl status` output. */
    resolverStatus(): Promise<string>;
}

const DEFAULT_HOOKS: ResolverPathHooks = {
    lookup: async domain => (await dnsPromises.lookup(domain, { family: 4 })).address,
    resolverStatus: () => runCommand('resolvectl status', 5000)
};

export class OsResolverPath implements SystemResolverPath {
    private readonly hooks: ResolverPathHooks;

    constructor(private readonly livePath: string = RESOLV_CONF, hooks: Partial<ResolverPathHooks> = {}) {
        this.hooks = { ...DEFAULT_HOOKS, ...hooks };
    }

    async observe(domain: string, timeoutMs: number): Promise<ResolverObservation> {
        const start = process.hrtime.bigint();
        let resolvedAddress: string | null = null;
        let latency: number | 'timeout';

        try {
            // getaddrinfo: the same path every other program on the host takes
            resolvedAddress = await NetUtils.withTimeout(this.hooks.lookup(domain), timeoutMs);
            latency = NetUtils.elapsedMs(start);
        } catch (e) {
            const failure = NetUtils.classifyDnsError(e);
            logger.debug(`[SystemResolverPath] ${domain}: ${failure} (${errorMessage(e)})`);
            return {
                domain,
                resolvedAddress: null,
                respondingServer: null,
                latency: failure === 'timeout' ? 'timeout' : NetUtils.elapsedMs(start),
                success: false
            };
        }

        return {
            domain,
            resolvedAddress,
            respondingServer: await this.respondingServer(),
            latency,
            success: true
        };
    }

    /**
     * The live file names the upstream directly unless it points at the
     * systemd-resolved stub; only then is resolvectl asked which server answers.
     */
    private async respondingServer(): Promise<string | null> {
        const nameservers = readNameservers((await FileUtils.readOrEmpty(this.livePath)).toString('utf8'));
        if (!nameservers.includes(RESOLVED_STUB_ADDRESS)) {
            return nameservers[0] ?? null;
        }

        try {
            const current = parseCurrentDnsServer(await this.hooks.resolverStatus());
            if (current) return current;
        } catch (e) {
            logger.debug(`[SystemResolverPath] resolvectl unavailable: ${errorMessage(e)}`);
        }
        return nameservers.find(ns => ns !== RESOLVED_STUB_ADDRESS) ?? null;
    }
}
