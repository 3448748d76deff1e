import fs from 'fs-extra';
import path from 'path';
import { LOCK_FILE } from '../constants';
import { AppError, errnoCode, errorMessage } from './AppError';
import { logger } from './logger';

export interface ProcessLockOptions {
    waitMs: number; // how long a second caller waits before giving up
    pollMs: number;
}

const DEFAULT_OPTIONS: ProcessLockOptions = {
    waitMs: 30000,
    pollMs: 100
};

const sleep = (ms: number) => new Promise(resolve => setTimeout(resolve, ms));

const isAlive = (pid: number): boolean => {
    try {
        process.kill(pid, 0);
        return true;
    } catch (e) {
        // EPERM: the process exists but belongs to someone else
        return errnoCode(e) === 'EPERM';
    }
};

/**
 * Host-wide exclusion between dnsswitch processes: a pid file created with O_EXCL.
 * A lock left behind by a dead process is removed and retaken.
 */
export class ProcessLock {
    private readonly options: ProcessLockOptions;

    constructor(private readonly lockPath: string = LOCK_FILE, options: Partial<ProcessLockOptions> = {}) {
        this.options = { ...DEFAULT_OPTIONS, ...options };
    }

    async runExclusive<T>(task: () => Promise<T>): Promise<T> {
        await this.acquire();
        try {
            return await task();
        } finally {
            await this.release();
        }
    }

    private async acquire(): Promise<void> {
        const deadline = Date.now() + this.options.waitMs;
        let announced = false;

        try {
            await fs.ensureDir(path.dirname(this.lockPath));
        } catch (e) {
            throw this.ioError(e);
        }

        for (;;) {
            try {
                await fs.writeFile(this.lockPath, `${process.pid}\n`, { flag: 'wx' });
                return;
            } catch (e) {
                if (errnoCode(e) !== 'EEXIST') throw this.ioError(e);
            }

            const owner = await this.readOwner();
            if (owner !== null && !isAlive(owner)) {
                logger.warn(`[ProcessLock] Removing stale lock left by pid ${owner}.`);
                await fs.remove(this.lockPath).catch(err => {
                    logger.warn(`[ProcessLock] Could not remove stale lock: ${errorMessage(err)}`);
                });
                continue;
            }

            if (Date.now() >= deadline) {
                throw AppError.from('E_BUSY', `Another dnsswitch operation is in progress (pid ${owner ?? 'unknown'}).`, {
                    path: this.lockPath,
                    owner
                });
            }
            if (!announced) {
                logger.info(`[ProcessLock] Waiting for pid ${owner ?? 'unknown'} to finish...`);
                announced = true;
            }
            await sleep(this.options.pollMs);
        }
    }

    private async release(): Promise<void> {
        try {
            await fs.unlink(this.lockPath);
        } catch (e) {
            logger.warn(`[ProcessLock] Failed to release ${this.lockPath}: ${errorMessage(e)}`);
        }
    }

    /** Pid recorded in the lock file; null while it is being written or when unreadable. */
    private async readOwner(): Promise<number | null> {
        try {
            const pid = parseInt((await fs.readFile(this.lockPath, 'utf8')).trim(), 10);
            return Number.isInteger(pid) && pid > 0 ? pid : null;
        } catch (e) {
            logger.debug(`[ProcessLock] Could not read ${this.lockPath}: ${errorMessage(e)}`);
            return null;
        }
    }

    private ioError(e: unknown): AppError {
        const code = errnoCode(e);
        if (code === 'EACCES' || code === 'EPERM') {
            return AppError.from('E_PERMISSION_DENIED', `Cannot create ${this.lockPath}`, { path: this.lockPath });
        }
        return AppError.from('E_IO_FAILURE', `Cannot create ${this.lockPath}: ${errorMessage(e)}`, { path: this.lockPath });
    }
}
