import type { Provider, ProviderId } from './index';

export type ProbeFailure = 'timeout' | 'unreachable' | 'refused' | 'not_found';

export interface ProbeResult {
    providerId: ProviderId;
    serverAddress: string;
    targetDomain: string;
    latency: number | 'timeout'; // ms
    resolvedAddress: string | null;
    success: boolean;
    failure?: ProbeFailure;
}

export interface ProbeOptions {
    timeoutMs: number;
    samples: number;
    concurrency: number;
    includeSecondary: boolean;
}

export interface BenchmarkEntry {
    provider: Provider;
    score: number | null; // median latency (ms) of successful probes, null when none succeeded
    successRate: number; // 0.0 to 1.0
    samples: number;
    unreliable: boolean;
}

export interface BenchmarkReport {
    ranking: BenchmarkEntry[];
    winner: BenchmarkEntry | null;
    startedAt: string;
    durationMs: number;
}

export type ConnectivityStatus = 'EXCELLENT' | 'UNSTABLE' | 'DISCONNECTED';

export interface ResolverObservation {
    domain: string;
    resolvedAddress: string | null;
    respondingServer: string | null;
    latency: number | 'timeout';
    success: boolean;
}

export interface LeakReport {
    leaked: boolean;
    observedAddress: string | null;
    expectedAddress: string | null;
    connectivity: ConnectivityStatus;
    observations: ResolverObservation[];
    checkedAt: string;
}
