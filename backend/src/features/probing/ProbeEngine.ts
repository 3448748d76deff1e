import { ProbeOptions, ProbeResult, Provider } from '../../../../shared/types';
import { NetUtils } from '../../utils/NetUtils';
import { logger } from '../../utils/logger';
import { runBounded } from '../../utils/WorkerPool';
import { DnsTransport, NodeDnsTransport } from './DnsTransport';

export const DEFAULT_PROBE_OPTIONS: ProbeOptions = {
    timeoutMs: 2000,
    samples: 1,
    concurrency: 8,
    includeSecondary: true
};

interface ProbeTask {
    provider: Provider;
    server: string;
    domain: string;
}

/**
 * Concurrent resolution probes against provider addresses.
 * Network failures come back as ProbeResults, never as rejections.
 */
export class ProbeEngine {

    constructor(private readonly transport: DnsTransport = new NodeDnsTransport()) {}

    /**
     * One probe per domain against the provider's primary address (and secondary when enabled).
     */
    async probe(provider: Provider, domains: string[], timeoutMs: number): Promise<ProbeResult[]> {
        return this.probeAll([provider], domains, { timeoutMs });
    }

    /**
     * Fans out provider x address x domain x sample with at most `concurrency` probes in flight.
     * Results keep submission order, so each provider's results stay contiguous.
     */
    async probeAll(providers: Provider[], domains: string[], options: Partial<ProbeOptions> = {}): Promise<ProbeResult[]> {
        const opts: ProbeOptions = { ...DEFAULT_PROBE_OPTIONS, ...options };
        const tasks: ProbeTask[] = [];

        for (const provider of providers) {
            const servers = [provider.primaryAddress];
            if (opts.includeSecondary && provider.secondaryAddress) servers.push(provider.secondaryAddress);

            for (const server of servers) {
                for (const domain of domains) {
                    for (let i = 0; i < opts.samples; i++) {
                        tasks.push({ provider, server, domain });
                    }
                }
            }
        }

        logger.debug(`[ProbeEngine] ${tasks.length} probes, concurrency ${opts.concurrency}, timeout ${opts.timeoutMs}ms`);
        return runBounded(tasks.map(task => () => this.runProbe(task, opts.timeoutMs)), opts.concurrency);
    }

    private async runProbe(task: ProbeTask, timeoutMs: number): Promise<ProbeResult> {
        const base = {
            providerId: task.provider.id,
            serverAddress: task.server,
            targetDomain: task.domain
        };
        const start = process.hrtime.bigint();

        try {
            const addresses = await this.transport.resolve(task.server, task.domain, timeoutMs);
            return {
                ...base,
                latency: NetUtils.elapsedMs(start),
                resolvedAddress: addresses[0] ?? null,
                success: addresses.length > 0,
                ...(addresses.length === 0 ? { failure: 'not_found' as const } : {})
            };
        } catch (e) {
            const failure = NetUtils.classifyDnsError(e);
            return {
                ...base,
                latency: failure === 'timeout' ? 'timeout' : NetUtils.elapsedMs(start),
                resolvedAddress: null,
                success: false,
                failure
            };
        }
    }
}
