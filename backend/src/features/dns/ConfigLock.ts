import fs from 'fs-extra';
import { AppError, errnoCode, errorMessage } from '../../utils/AppError';
import { logger } from '../../utils/logger';
import { CommandRunner, runCommand } from '../../utils/ShellUtils';
import { SafetyService } from '../system/SafetyService';

/**
 * Exclusive "protect" state on the live configuration file.
 * acquire() on a locked file and release() on an unlocked one are both no-ops.
 */
export interface ConfigLock {
    readonly kind: string;
    acquire(): Promise<void>;
    release(): Promise<void>;
    /** Observed state of the primitive, not a cached flag. */
    isLocked(): Promise<boolean>;
}

const PERMISSION_PATTERN = /operation not permitted|permission denied/i;
const UNSUPPORTED_PATTERN = /inappropriate ioctl|operation not supported/i;

const commandDetail = (e: unknown): string => {
    const stderr = typeof e === 'object' && e !== null && 'stderr' in e ? String(e.stderr) : '';
    return stderr.trim() || errorMessage(e);
};

/**
 * Linux immutable attribute (chattr +i / -i), observed through lsattr.
 */
export class ChattrLock implements ConfigLock {
    public readonly kind = 'chattr';

    constructor(
        private readonly filePath: string,
        private readonly safety: SafetyService,
        private readonly run: CommandRunner = runCommand
    ) {}

    async acquire(): Promise<void> {
        this.safety.assertPrivileged('lock');
        if (await this.isLocked()) {
            logger.debug(`[ConfigLock] ${this.filePath} already immutable.`);
            return;
        }
        await this.chattr('+i');
        logger.info(`[ConfigLock] ${this.filePath} locked (immutable).`);
    }

    async release(): Promise<void> {
        this.safety.assertPrivileged('unlock');
        if (!(await this.isLocked())) {
            logger.debug(`[ConfigLock] NotLocked: ${this.filePath} was not immutable.`);
            return;
        }
        await this.chattr('-i');
        logger.info(`[ConfigLock] ${this.filePath} unlocked.`);
    }

    /**
     * Throws when lsattr fails, except on filesystems without attribute support,
     * where the file cannot be immutable.
     */
    async isLocked(): Promise<boolean> {
        if (!(await fs.pathExists(this.filePath))) return false;
        let stdout: string;
        try {
            stdout = await this.run(`lsattr -d ${JSON.stringify(this.filePath)}`, 5000);
        } catch (e) {
            const detail = commandDetail(e);
            if (UNSUPPORTED_PATTERN.test(detail)) {
                logger.debug(`[ConfigLock] ${this.filePath} has no attribute support: ${detail}`);
                return false;
            }
            if (PERMISSION_PATTERN.test(detail)) {
                throw AppError.from('E_PERMISSION_DENIED', `lsattr refused: ${detail}`, { path: this.filePath });
            }
            throw AppError.from('E_IO_FAILURE', `Cannot read attributes of ${this.filePath}: ${detail}`, { path: this.filePath });
        }
        const flags = stdout.trim().split(/\s+/)[0] ?? '';
        return flags.includes('i');
    }

    private async chattr(flag: '+i' | '-i'): Promise<void> {
        try {
            await this.run(`chattr ${flag} ${JSON.stringify(this.filePath)}`, 5000);
        } catch (e) {
            const detail = commandDetail(e);
            if (PERMISSION_PATTERN.test(detail)) {
                throw AppError.from('E_PERMISSION_DENIED', `chattr ${flag} refused: ${detail}`, { path: this.filePath });
            }
            throw AppError.from('E_IO_FAILURE', `chattr ${flag} failed (filesystem may not support it): ${detail}`, { path: this.filePath });
        }
    }
}

/**
 * Advisory lock: a marker file beside the live file. For platforms without an immutable attribute.
 */
export class LockFileLock implements ConfigLock {
    public readonly kind = 'lockfile';
    private readonly markerPath: string;

    constructor(filePath: string, private readonly safety: SafetyService) {
        this.markerPath = `${filePath}.dnsswitch.lock`;
    }

    async acquire(): Promise<void> {
        this.safety.assertPrivileged('lock');
        try {
            await fs.writeFile(this.markerPath, `${process.pid}\n`, { flag: 'wx' });
        } catch (e) {
            const code = errnoCode(e);
            if (code === 'EEXIST') return;
            if (code === 'EACCES' || code === 'EPERM') {
                throw AppError.from('E_PERMISSION_DENIED', `Cannot create ${this.markerPath}`, { path: this.markerPath });
            }
            throw AppError.from('E_IO_FAILURE', `Cannot create ${this.markerPath}: ${errorMessage(e)}`, { path: this.markerPath });
        }
    }

    async release(): Promise<void> {
        this.safety.assertPrivileged('unlock');
        try {
            await fs.unlink(this.markerPath);
        } catch (e) {
            const code = errnoCode(e);
            if (code === 'ENOENT') {
                logger.debug(`[ConfigLock] NotLocked: ${this.markerPath} absent.`);
                return;
            }
            if (code === 'EACCES' || code === 'EPERM') {
                throw AppError.from('E_PERMISSION_DENIED', `Cannot remove ${this.markerPath}`, { path: this.markerPath });
            }
            throw AppError.from('E_IO_FAILURE', `Cannot remove ${this.markerPath}: ${errorMessage(e)}`, { path: this.markerPath });
        }
    }

    async isLocked(): Promise<boolean> {
        return fs.pathExists(this.markerPath);
    }
}
