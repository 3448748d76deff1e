import fs from 'fs-extra';
import path from 'path';
import { BackupReason, BackupRecord } from '../../../../shared/types';
import { BACKUPS_DIR } from '../../constants';
import { AppError, errorMessage } from '../../utils/AppError';
import { FileUtils } from '../../utils/FileUtils';
import { logger } from '../../utils/logger';

const MANIFEST = 'manifest.json';
const DAY_MS = 24 * 60 * 60 * 1000;
const REASONS: readonly BackupReason[] = ['pre-switch', 'pre-reset', 'pre-restore'];

export interface BackupStoreOptions {
    retention: number;
    maxAgeDays: number; // 0 disables age-based eviction
    now: () => Date;
}

const DEFAULT_OPTIONS: BackupStoreOptions = {
    retention: 10,
    maxAgeDays: 7,
    now: () => new Date()
};

const byCreatedAtAsc = (a: BackupRecord, b: BackupRecord) =>
    new Date(a.createdAt).getTime() - new Date(b.createdAt).getTime() || a.id.localeCompare(b.id);

const isBackupRecord = (value: unknown): value is BackupRecord => {
    if (typeof value !== 'object' || value === null) return false;
    const r: Record<string, unknown> = { ...value };
    return typeof r.id === 'string'
        && typeof r.createdAt === 'string'
        && typeof r.storagePath === 'string'
        && typeof r.contentDigest === 'string'
        && typeof r.size === 'number'
        && REASONS.some(reason => reason === r.reason);
};

/**
 * Timestamped snapshots of the live configuration, one file each, indexed by a manifest.
 */
export class BackupStore {
    private readonly options: BackupStoreOptions;

    constructor(private readonly backupsDir: string = BACKUPS_DIR, options: Partial<BackupStoreOptions> = {}) {
        this.options = { ...DEFAULT_OPTIONS, ...options };
    }

    /**
     * Persists `current` as a new record, then rotates. Write failures are fatal (IOFailure).
     */
    async snapshot(current: Buffer, reason: BackupReason): Promise<BackupRecord> {
        const createdAt = this.options.now();
        let record: BackupRecord;

        try {
            await fs.ensureDir(this.backupsDir);
            // Read the index before the new file exists, so discovery cannot adopt it as an orphan
            const backups = await this.list();
            const id = await this.allocateId(createdAt);
            const storagePath = path.join(this.backupsDir, `${id}.bak`);

            await FileUtils.atomicWrite(storagePath, current, 0o600);

            record = {
                id,
                createdAt: createdAt.toISOString(),
                storagePath,
                contentDigest: FileUtils.digest(current),
                reason,
                size: current.length
            };

            backups.push(record);
            await this.saveManifest(backups);
        } catch (e) {
            if (e instanceof AppError) throw e;
            throw AppError.from('E_IO_FAILURE', `Backup failed: ${errorMessage(e)}`, { dir: this.backupsDir, reason });
        }

        logger.info(`[BackupStore] Created ${record.id} (${reason}, ${record.size} bytes)`);
        logger.event('BACKUP', { id: record.id, reason, digest: record.contentDigest });

        // Rotation only ever runs here, after a successful snapshot
        await this.rotate(this.options.retention);
        return record;
    }

    /**
     * Evicts the oldest records beyond `cap`, plus anything older than the age limit
     * (the newest record is always kept). Deletion failures are logged, not thrown.
     */
    async rotate(cap: number = this.options.retention): Promise<BackupRecord[]> {
        let backups: BackupRecord[];
        try {
            backups = (await this.list()).sort(byCreatedAtAsc);
        } catch (e) {
            logger.warn(`[BackupStore] Rotation skipped: ${errorMessage(e)}`);
            return [];
        }

        const excess = Math.max(0, backups.length - Math.max(1, cap));
        const toEvict = backups.slice(0, excess);

        if (this.options.maxAgeDays > 0) {
            const cutoff = this.options.now().getTime() - this.options.maxAgeDays * DAY_MS;
            for (const backup of backups.slice(excess, -1)) {
                if (new Date(backup.createdAt).getTime() < cutoff) toEvict.push(backup);
            }
        }

        if (toEvict.length === 0) return [];

        const evicted: BackupRecord[] = [];
        for (const backup of toEvict) {
            try {
                await fs.remove(backup.storagePath);
                evicted.push(backup);
                logger.info(`[BackupStore] Auto-cleaning old backup: ${backup.id}`);
                logger.event('BACKUP_EVICT', { id: backup.id, createdAt: backup.createdAt });
            } catch (e) {
                logger.warn(`[BackupStore] Failed to delete ${backup.storagePath}: ${errorMessage(e)}`);
            }
        }

        const evictedIds = new Set(evicted.map(b => b.id));
        try {
            await this.saveManifest(backups.filter(b => !evictedIds.has(b.id)));
        } catch (e) {
            logger.warn(`[BackupStore] Failed to update manifest after rotation: ${errorMessage(e)}`);
        }
        return evicted;
    }

    /**
     * Reads a record's content back and verifies its digest.
     */
    async restore(record: BackupRecord): Promise<Buffer> {
        let content: Buffer;
        try {
            content = await fs.readFile(record.storagePath);
        } catch (e) {
            throw AppError.from('E_IO_FAILURE', `Cannot read backup ${record.id}: ${errorMessage(e)}`, { id: record.id });
        }

        const digest = FileUtils.digest(content);
        if (digest !== record.contentDigest) {
            throw AppError.from('E_CORRUPT_BACKUP', `Backup ${record.id} is corrupt (digest mismatch).`, {
                id: record.id,
                expected: record.contentDigest,
                actual: digest
            });
        }
        return content;
    }

    async find(id: string): Promise<BackupRecord> {
        const backup = (await this.list()).find(b => b.id === id);
        if (!backup) {
            throw AppError.from('E_BACKUP_NOT_FOUND', `Backup '${id}' not found.`, { id });
        }
        return backup;
    }

    /**
     * All records, newest first. Entries whose file vanished are dropped,
     * and orphaned .bak files are recovered into the manifest.
     */
    async list(): Promise<BackupRecord[]> {
        if (!(await fs.pathExists(this.backupsDir))) {
            return [];
        }

        const manifestPath = path.join(this.backupsDir, MANIFEST);
        let manifestBackups: BackupRecord[] = [];
        let changed = false;

        if (await fs.pathExists(manifestPath)) {
            try {
                const manifest: unknown = await fs.readJSON(manifestPath);
                const entries = typeof manifest === 'object' && manifest !== null && 'backups' in manifest
                    && Array.isArray(manifest.backups) ? manifest.backups : [];
                const seen = new Set<string>();
                manifestBackups = entries.filter(isBackupRecord).filter(b => {
                    if (seen.has(b.id)) return false;
                    seen.add(b.id);
                    return true;
                });
                if (manifestBackups.length !== entries.length) changed = true;
            } catch (e) {
                logger.error(`[BackupStore] Corrupt manifest: ${errorMessage(e)}`);
                // Proceed with discovery to recover
            }
        }

        const files = (await fs.readdir(this.backupsDir)).filter(f => f.endsWith('.bak'));
        const present = new Set(files.map(f => path.join(this.backupsDir, f)));

        const beforeCount = manifestBackups.length;
        manifestBackups = manifestBackups.filter(b => present.has(b.storagePath));
        if (manifestBackups.length !== beforeCount) changed = true;

        for (const filename of files) {
            const storagePath = path.join(this.backupsDir, filename);
            if (manifestBackups.some(b => b.storagePath === storagePath)) continue;

            try {
                const content = await fs.readFile(storagePath);
                const stats = await fs.stat(storagePath);
                const idMatch = filename.match(/^backup-(\d+)/);
                const timestamp = idMatch ? parseInt(idMatch[1], 10) : stats.mtimeMs;

                manifestBackups.push({
                    id: path.basename(filename, '.bak'),
                    createdAt: new Date(timestamp).toISOString(),
                    storagePath,
                    contentDigest: FileUtils.digest(content),
                    reason: 'pre-switch',
                    size: content.length
                });
                changed = true;
            } catch (e) {
                logger.error(`[BackupStore] Failed to recover backup metadata for ${filename}: ${errorMessage(e)}`);
            }
        }

        manifestBackups.sort((a, b) => byCreatedAtAsc(b, a));

        if (changed) {
            logger.info(`[BackupStore] Manifest synced. ${manifestBackups.length} snapshots discovered.`);
            await this.saveManifest(manifestBackups);
        }

        return manifestBackups;
    }

    private async allocateId(createdAt: Date): Promise<string> {
        const base = `backup-${createdAt.getTime()}`;
        let id = base;
        for (let n = 2; await fs.pathExists(path.join(this.backupsDir, `${id}.bak`)); n++) {
            id = `${base}-${n}`;
        }
        return id;
    }

    private async saveManifest(backups: BackupRecord[]): Promise<void> {
        const manifestPath = path.join(this.backupsDir, MANIFEST);
        await FileUtils.atomicWrite(manifestPath, JSON.stringify({ backups }, null, 2) + '\n', 0o600);
    }
}
