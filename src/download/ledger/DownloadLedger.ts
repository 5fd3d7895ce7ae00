import fs from 'fs';
import { promises as fsPromises } from 'fs';
import path from 'path';
import { logger } from '../../utils/logger';

type LedgerData = Record<string, string>;

/**
 * DownloadLedger - persisted mapping of source URL to the last output path.
 * Loaded once at construction and rewritten after every successful download.
 * Only the batch worker touches it, so no locking is done here.
 */
export class DownloadLedger {
    private data: LedgerData = {};
    private readonly filePath: string;

    constructor(filePath: string = './downloaded_files.json') {
        this.filePath = filePath;
        this.load();
    }

    /**
     * Load the ledger from disk. A missing file is an empty ledger; a corrupt
     * one is logged and treated as empty.
     */
    private load(): void {
        if (!fs.existsSync(this.filePath)) {
            return;
        }

        try {
            const rawData: unknown = JSON.parse(fs.readFileSync(this.filePath, 'utf-8'));
            if (rawData === null || typeof rawData !== 'object' || Array.isArray(rawData)) {
                throw new Error('Ledger is not a JSON object');
            }

            for (const [url, outputPath] of Object.entries(rawData)) {
                if (typeof outputPath === 'string') {
                    this.data[url] = outputPath;
                }
            }

            logger.info('💾 Download ledger loaded', {
                path: this.filePath,
                entries: Object.keys(this.data).length,
            });
        } catch (error) {
            logger.warn('Failed to load download ledger, starting empty', {
                path: this.filePath,
                error: (error as Error).message,
            });
            this.data = {};
        }
    }

    has(url: string): boolean {
        return Object.prototype.hasOwnProperty.call(this.data, url);
    }

    get(url: string): string | undefined {
        return this.has(url) ? this.data[url] : undefined;
    }

    size(): number {
        return Object.keys(this.data).length;
    }

    /**
     * Record a finished download and persist the whole document
     */
    async record(url: string, outputPath: string): Promise<void> {
        this.data[url] = outputPath;
        await this.save();
        logger.debug('Ledger updated', { url, outputPath });
    }

    private async save(): Promise<void> {
        const tempPath = `${this.filePath}.tmp`;
        await fsPromises.mkdir(path.dirname(this.filePath), { recursive: true });
        await fsPromises.writeFile(tempPath, JSON.stringify(this.data, null, 4), 'utf-8');
        await fsPromises.rename(tempPath, this.filePath);
    }
}
