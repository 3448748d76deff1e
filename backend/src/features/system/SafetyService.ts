import { AppError } from '../../utils/AppError';
import { logger } from '../../utils/logger';

/**
 * Capabilities of the running process. Anything that touches the live resolver
 * file or the lock primitive is handed one of these rather than checking the uid itself.
 */
export interface ExecutionContext {
    readonly privileged: boolean;
    readonly platform: NodeJS.Platform;
}

export const detectExecutionContext = (): ExecutionContext => ({
    privileged: typeof process.geteuid === 'function' && process.geteuid() === 0,
    platform: process.platform
});

export class SafetyService {

    constructor(private readonly context: ExecutionContext = detectExecutionContext()) {}

    get privileged(): boolean {
        return this.context.privileged;
    }

    get platform(): NodeJS.Platform {
        return this.context.platform;
    }

    /**
     * Pre-flight check for privileged operations. Fails immediately, never retried.
     */
    assertPrivileged(operation: string): void {
        if (!this.context.privileged) {
            logger.warn(`[Safety] Refusing '${operation}': not running as root.`);
            throw AppError.from('E_PERMISSION_DENIED', `'${operation}' requires root privileges (run with sudo).`, { operation });
        }
    }
}
