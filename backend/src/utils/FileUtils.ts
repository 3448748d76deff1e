import crypto from 'crypto';
import fs from 'fs-extra';
import path from 'path';
import { logger } from './logger';
import { errnoCode } from './AppError';

export class FileUtils {

    /**
     * Writes `content` next to `target` in a temp file, fsyncs it, then renames it over `target`.
     * Readers observe either the complete old file or the complete new one.
     * On failure the temp file is removed and the original error is rethrown.
     */
    static async atomicWrite(target: string, content: string | Buffer, mode = 0o644): Promise<void> {
        const dir = path.dirname(target);
        const tempPath = path.join(dir, `.${path.basename(target)}.${process.pid}.${Date.now()}.tmp`);

        try {
            const fd = await fs.open(tempPath, 'w', mode);
            try {
                await fs.writeFile(fd, content);
                await fs.fsync(fd);
            } finally {
                await fs.close(fd);
            }
            await fs.rename(tempPath, target);
        } catch (e) {
            if (await fs.pathExists(tempPath)) {
                await fs.remove(tempPath).catch(err => {
                    logger.warn(`[FileUtils] Failed to remove temp file ${tempPath}: ${err}`);
                });
            }
            throw e;
        }
    }

    /**
     * Reads a file as raw bytes. A missing file reads as empty content.
     */
    static async readOrEmpty(filePath: string): Promise<Buffer> {
        try {
            return await fs.readFile(filePath);
        } catch (e) {
            if (errnoCode(e) === 'ENOENT') return Buffer.alloc(0);
            throw e;
        }
    }

    static digest(content: Buffer | string): string {
        return crypto.createHash('sha256').update(content).digest('hex');
    }
}
