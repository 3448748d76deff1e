import { ConnectivityStatus, LeakReport, Provider, ResolverObservation } from '../../../../shared/types';
import { getProviderAddresses } from '../../../../shared/utils/ProviderUtils';
import { logger } from '../../utils/logger';
import { runBounded } from '../../utils/WorkerPool';
import { SystemResolverPath } from './SystemResolverPath';

export interface LeakCheckOptions {
    domains: string[];
    timeoutMs: number;
    concurrency: number;
}

const DEFAULT_OPTIONS: LeakCheckOptions = {
    domains: ['google.com', 'cloudflare.com', 'github.com'],
    timeoutMs: 5000,
    concurrency: 4
};

export const connectivityOf = (observations: ResolverObservation[]): ConnectivityStatus => {
    const ok = observations.filter(o => o.success).length;
    if (observations.length > 0 && ok === observations.length) return 'EXCELLENT';
    return ok > 0 ? 'UNSTABLE' : 'DISCONNECTED';
};

/**
 * Resolves test domains through the system path (not directly against the provider)
 * and compares the answering upstream with the provider that should be active.
 */
export class LeakDetector {
    private readonly options: LeakCheckOptions;

    constructor(private readonly resolverPath: SystemResolverPath, options: Partial<LeakCheckOptions> = {}) {
        this.options = { ...DEFAULT_OPTIONS, ...options };
    }

    async check(expected: Provider | null): Promise<LeakReport> {
        const { domains, timeoutMs, concurrency } = this.options;
        logger.info(`[LeakDetector] Checking ${domains.length} domains through the system resolver...`);

        const observations = await runBounded(
            domains.map(domain => () => this.resolverPath.observe(domain, timeoutMs)),
            concurrency
        );

        const observedServers: string[] = [];
        for (const o of observations) {
            if (o.success && o.respondingServer) observedServers.push(o.respondingServer);
        }

        const allowed = expected ? getProviderAddresses(expected) : [];
        const foreign = expected ? observedServers.find(s => !allowed.includes(s)) : undefined;

        const report: LeakReport = {
            leaked: foreign !== undefined,
            observedAddress: foreign ?? observedServers[0] ?? null,
            expectedAddress: expected?.primaryAddress ?? null,
            connectivity: connectivityOf(observations),
            observations,
            checkedAt: new Date().toISOString()
        };

        if (report.leaked) {
            logger.warn(`[LeakDetector] LEAK: expected ${report.expectedAddress}, resolver answered from ${report.observedAddress}`);
        } else if (report.connectivity === 'DISCONNECTED') {
            logger.error('[LeakDetector] No test domain resolved. DNS error or no connectivity.');
        } else {
            logger.success(`[LeakDetector] No leak detected (${report.connectivity}).`);
        }

        logger.event('LEAK_CHECK', {
            expected: report.expectedAddress,
            observed: report.observedAddress,
            leaked: report.leaked,
            connectivity: report.connectivity,
            resolved: observations.filter(o => o.success).length,
            total: observations.length
        });

        return report;
    }
}
