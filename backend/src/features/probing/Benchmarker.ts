import { BenchmarkEntry, BenchmarkReport, ProbeOptions, ProbeResult, Provider } from '../../../../shared/types';
import { logger } from '../../utils/logger';
import { ProbeEngine } from './ProbeEngine';

export interface BenchmarkOptions extends Omit<ProbeOptions, 'samples'> {
    reliabilityThreshold: number;
}

const DEFAULT_OPTIONS: BenchmarkOptions = {
    timeoutMs: 2000,
    concurrency: 8,
    includeSecondary: true,
    reliabilityThreshold: 0.5
};

export const median = (values: number[]): number | null => {
    if (values.length === 0) return null;
    const sorted = [...values].sort((a, b) => a - b);
    const mid = Math.floor(sorted.length / 2);
    return sorted.length % 2 === 0 ? (sorted[mid - 1] + sorted[mid]) / 2 : sorted[mid];
};

const compareIds = (a: string, b: string) => (a < b ? -1 : a > b ? 1 : 0);

/**
 * Reliable providers first, then by median latency (no successes sorts last), then by id.
 */
const compareEntries = (a: BenchmarkEntry, b: BenchmarkEntry): number => {
    if (a.unreliable !== b.unreliable) return a.unreliable ? 1 : -1;
    if (a.score !== b.score) {
        if (a.score === null) return 1;
        if (b.score === null) return -1;
        return a.score - b.score;
    }
    return compareIds(a.provider.id, b.provider.id);
};

export class Benchmarker {
    private readonly options: BenchmarkOptions;

    constructor(private readonly engine: ProbeEngine, options: Partial<BenchmarkOptions> = {}) {
        this.options = { ...DEFAULT_OPTIONS, ...options };
    }

    async run(providers: Provider[], domains: string[], samplesPerDomain: number): Promise<BenchmarkReport> {
        const startedAt = new Date();
        logger.info(`[Benchmarker] Benchmarking ${providers.length} providers over ${domains.length} domains (${samplesPerDomain} samples each)...`);

        const results = await this.engine.probeAll(providers, domains, {
            timeoutMs: this.options.timeoutMs,
            concurrency: this.options.concurrency,
            includeSecondary: this.options.includeSecondary,
            samples: samplesPerDomain
        });

        const ranking = Benchmarker.rank(providers, results, this.options.reliabilityThreshold);
        const winner = ranking.find(e => !e.unreliable && e.score !== null) ?? null;
        const durationMs = Date.now() - startedAt.getTime();

        if (winner) {
            logger.success(`[Benchmarker] Fastest: ${winner.provider.displayName} (${winner.score?.toFixed(1)}ms median)`);
        } else {
            logger.warn('[Benchmarker] No provider answered reliably. Check your connection.');
        }

        logger.event('BENCHMARK', {
            winner: winner?.provider.id ?? null,
            ranking: ranking.map(e => ({ id: e.provider.id, score: e.score, successRate: e.successRate, unreliable: e.unreliable })),
            durationMs
        });

        return { ranking, winner, startedAt: startedAt.toISOString(), durationMs };
    }

    /**
     * Pure ranking over a fixed set of results: the same input always yields the same order.
     */
    static rank(providers: Provider[], results: ProbeResult[], reliabilityThreshold: number): BenchmarkEntry[] {
        const entries = providers.map((provider): BenchmarkEntry => {
            const own = results.filter(r => r.providerId === provider.id);
            const latencies: number[] = [];
            for (const r of own) {
                if (r.success && typeof r.latency === 'number') latencies.push(r.latency);
            }
            const successRate = own.length === 0 ? 0 : latencies.length / own.length;

            return {
                provider,
                score: median(latencies),
                successRate,
                samples: own.length,
                unreliable: successRate < reliabilityThreshold
            };
        });

        return entries.sort(compareEntries);
    }
}
