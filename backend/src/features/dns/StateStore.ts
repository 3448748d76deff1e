import fs from 'fs-extra';
import path from 'path';
import { SystemState } from '../../../../shared/types';
import { isProviderId } from '../../../../shared/utils/ProviderUtils';
import { STATE_FILE } from '../../constants';
import { AppError, errorMessage } from '../../utils/AppError';
import { FileUtils } from '../../utils/FileUtils';
import { logger } from '../../utils/logger';

export const DEFAULT_STATE: SystemState = {
    activeProviderId: null,
    dotEnabled: false,
    locked: false,
    lastSwitchAt: null,
    lastBackupRef: null
};

const stringOrNull = (value: unknown): string | null => typeof value === 'string' ? value : null;

/**
 * The single persisted SystemState record. Anyone may read; only ConfigManager writes.
 */
export class StateStore {

    constructor(private readonly stateFile: string = STATE_FILE) {}

    async read(): Promise<SystemState> {
        if (!(await fs.pathExists(this.stateFile))) {
            return { ...DEFAULT_STATE };
        }

        let raw: unknown;
        try {
            raw = await fs.readJSON(this.stateFile);
        } catch (e) {
            logger.error(`[StateStore] Corrupt state file ${this.stateFile}: ${errorMessage(e)}. Using defaults.`);
            return { ...DEFAULT_STATE };
        }

        return StateStore.parse(raw);
    }

    /**
     * Same temp-write-then-rename discipline as the live file.
     */
    async write(state: SystemState): Promise<void> {
        try {
            await fs.ensureDir(path.dirname(this.stateFile));
            await FileUtils.atomicWrite(this.stateFile, JSON.stringify(state, null, 2) + '\n', 0o600);
        } catch (e) {
            throw AppError.from('E_IO_FAILURE', `Failed to persist state: ${errorMessage(e)}`, { path: this.stateFile });
        }
    }

    static parse(raw: unknown): SystemState {
        if (typeof raw !== 'object' || raw === null) return { ...DEFAULT_STATE };
        const loaded: Record<string, unknown> = { ...raw };

        const providerId = stringOrNull(loaded.activeProviderId);
        let activeProviderId: SystemState['activeProviderId'] = null;
        if (providerId !== null) {
            if (isProviderId(providerId)) {
                activeProviderId = providerId;
            } else {
                logger.warn(`[StateStore] Unknown provider '${providerId}' in state, treating as default.`);
            }
        }

        return {
            activeProviderId,
            dotEnabled: activeProviderId !== null && loaded.dotEnabled === true,
            locked: loaded.locked === true,
            lastSwitchAt: stringOrNull(loaded.lastSwitchAt),
            lastBackupRef: stringOrNull(loaded.lastBackupRef)
        };
    }
}
