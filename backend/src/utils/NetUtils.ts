import { ProbeFailure } from '../../../shared/types';
import { errnoCode } from './AppError';

export class ProbeTimeoutError extends Error {
    constructor(ms: number) {
        super(`Timed out after ${ms}ms`);
        this.name = 'ProbeTimeoutError';
    }
}

export class NetUtils {

    /**
     * Maps a resolver error to a probe failure class.
     * c-ares reports timeouts as ETIMEOUT, getaddrinfo as EAI_AGAIN.
     */
    static classifyDnsError(err: unknown): ProbeFailure {
        if (err instanceof ProbeTimeoutError) return 'timeout';

        switch (errnoCode(err)) {
            case 'ETIMEOUT':
            case 'ETIMEDOUT':
            case 'EAI_AGAIN':
            case 'ECANCELLED':
                return 'timeout';
            case 'EREFUSED':
            case 'ECONNREFUSED':
                return 'refused';
            case 'ENOTFOUND':
            case 'ENODATA':
            case 'EAI_NONAME':
                return 'not_found';
            default:
                return 'unreachable';
        }
    }

    /**
     * Races `work` against a timer. The timer never keeps the process alive.
     * `onTimeout` runs once when the deadline passes, before the rejection.
     */
    static async withTimeout<T>(work: Promise<T>, ms: number, onTimeout?: () => void): Promise<T> {
        let timer: NodeJS.Timeout | null = null;
        const deadline = new Promise<never>((_, reject) => {
            timer = setTimeout(() => {
                onTimeout?.();
                reject(new ProbeTimeoutError(ms));
            }, ms);
            timer.unref();
        });

        try {
            return await Promise.race([work, deadline]);
        } finally {
            if (timer) clearTimeout(timer);
        }
    }

    static elapsedMs(start: bigint): number {
        return Number(process.hrtime.bigint() - start) / 1e6;
    }
}
