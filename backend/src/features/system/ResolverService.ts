import fs from 'fs-extra';
import path from 'path';
import { NETWORK_SERVICE, RESOLVED_CONF, RESOLVER_SERVICE } from '../../constants';
import { AppError, errorMessage } from '../../utils/AppError';
import { FileUtils } from '../../utils/FileUtils';
import { logger } from '../../utils/logger';
import { CommandRunner, runCommand } from '../../utils/ShellUtils';

const FLUSH_COMMANDS = ['resolvectl flush-caches', 'systemd-resolve --flush-caches', 'service nscd restart'];

/**
 * Narrow control surface over the OS resolver service.
 */
export interface ResolverService {
    /** Current transport descriptor content, empty string when absent. */
    readTransport(): Promise<string>;
    /** Writes the descriptor atomically and restarts the service. Returns false when nothing changed. */
    applyTransport(content: string): Promise<boolean>;
    flushCaches(): Promise<void>;
    /** Asks the network manager to regenerate the default live configuration. */
    regenerateDefault(): Promise<void>;
}

export class SystemdResolverService implements ResolverService {

    constructor(
        private readonly transportPath: string = RESOLVED_CONF,
        private readonly run: CommandRunner = runCommand
    ) {}

    async readTransport(): Promise<string> {
        return (await FileUtils.readOrEmpty(this.transportPath)).toString('utf8');
    }

    async applyTransport(content: string): Promise<boolean> {
        if ((await this.readTransport()) === content) {
            return false;
        }

        try {
            await fs.ensureDir(path.dirname(this.transportPath));
            await FileUtils.atomicWrite(this.transportPath, content);
        } catch (e) {
            throw AppError.from('E_IO_FAILURE', `Failed to write ${this.transportPath}: ${errorMessage(e)}`, { path: this.transportPath });
        }

        await this.safeRestart(RESOLVER_SERVICE);
        return true;
    }

    async flushCaches(): Promise<void> {
        for (const command of FLUSH_COMMANDS) {
            try {
                await this.run(command, 10000);
                logger.debug(`[ResolverService] Caches flushed via '${command}'`);
                logger.event('FLUSH', { command });
                return;
            } catch (e) {
                logger.debug(`[ResolverService] '${command}' failed: ${errorMessage(e)}`);
            }
        }
        logger.warn('[ResolverService] No cache flush command succeeded.');
    }

    async regenerateDefault(): Promise<void> {
        await this.safeRestart(NETWORK_SERVICE);
    }

    /**
     * Stop, short pause, start. A failed start is fatal for the caller.
     */
    private async safeRestart(service: string): Promise<void> {
        logger.info(`[ResolverService] Restarting ${service}...`);
        try {
            await this.run(`systemctl stop ${service}`, 10000);
        } catch (e) {
            logger.debug(`[ResolverService] stop ${service}: ${errorMessage(e)}`);
        }

        await new Promise(resolve => setTimeout(resolve, 1000));

        try {
            await this.run(`systemctl start ${service}`, 15000);
        } catch (e) {
            throw AppError.from('E_SERVICE_FAILURE', `Failed to start ${service}: ${errorMessage(e)}`, { service });
        }
    }
}
