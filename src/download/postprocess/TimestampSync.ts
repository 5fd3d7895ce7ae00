import fs from 'fs/promises';
import { logger } from '../../utils/logger';

/**
 * Set access and modification time of every existing path to the given
 * unix timestamp (seconds). Missing paths are skipped, nothing is created.
 * Returns the paths that were updated.
 */
export async function syncFileTimes(paths: string[], timestamp: number): Promise<string[]> {
    const updated: string[] = [];

    for (const filePath of paths) {
        try {
            await fs.utimes(filePath, timestamp, timestamp);
            updated.push(filePath);
        } catch (error: unknown) {
            const err = error as NodeJS.ErrnoException;
            if (err.code === 'ENOENT') {
                logger.debug('File not found for time update', { path: filePath });
            } else {
                logger.warn('Failed to update file times', {
                    path: filePath,
                    error: err.message,
                });
            }
        }
    }

    return updated;
}
