/**
 * DownloadExecutor - Downloads a single resolved video URL
 * Fetches full metadata, previews it, picks the destination, skips known
 * downloads, drives the engine and hands the finished file to post-processing
 */

import path from 'path';
import { logError, logger } from '../../utils/logger';
import { FileManager } from '../../utils/FileManager';
import { DownloadLedger } from '../ledger/DownloadLedger';
import { MAX_FILENAME_LENGTH, sanitizeFilename, truncateToBytes } from '../security/FileSanitizer';
import { outputExtension } from '../engine/YtDlpEngine';
import { classifyEngineError, createFailure } from './failures';
import {
    DownloadSettings,
    ExecutionOutcome,
    ExtractionEngine,
    FailureReason,
    MediaInfo,
    PostProcessingPipeline,
    ProgressReporter,
    ProgressSnapshot,
    WorkItem,
} from './types';

// Bytes kept free for suffixes added to the stem (.f137.webm.part, .description, .tmp.webm)
const STEM_SUFFIX_RESERVE = 32;
export const MAX_STEM_BYTES = MAX_FILENAME_LENGTH - STEM_SUFFIX_RESERVE;

export type ImageFetcher = (url: string) => Promise<Buffer>;

export interface DownloadExecutorDeps {
    engine: ExtractionEngine;
    postProcessor: PostProcessingPipeline;
    ledger: DownloadLedger;
    fileManager?: FileManager;
    fetchImage?: ImageFetcher;
    thumbnailTimeout?: number;
    cookiesFile?: string;
}

/**
 * Fetch an image with a hard timeout
 */
export function createImageFetcher(timeout: number): ImageFetcher {
    return async (url: string) => {
        const response = await fetch(url, { signal: AbortSignal.timeout(timeout) });
        if (!response.ok) {
            throw new Error(`HTTP ${response.status}: ${response.statusText}`);
        }
        return Buffer.from(await response.arrayBuffer());
    };
}

/**
 * Percentage from a progress snapshot, 0 when no total is known
 */
export function progressPercent(progress: ProgressSnapshot): number {
    const total = progress.totalBytes ?? progress.totalBytesEstimate;
    if (!total || total <= 0 || progress.downloadedBytes === undefined) {
        return 0;
    }
    const percent = Math.floor((progress.downloadedBytes / total) * 100);
    return Math.min(100, Math.max(0, percent));
}

/**
 * Destination folder, partitioned by upload year when enabled and the date is usable
 */
export function resolveDestinationDir(base: string, info: MediaInfo, useYearSubfolders: boolean): string {
    if (useYearSubfolders && info.uploadDate && /^\d{8}$/.test(info.uploadDate)) {
        return path.join(base, info.uploadDate.slice(0, 4));
    }
    return base;
}

export class DownloadExecutor {
    private readonly engine: ExtractionEngine;
    private readonly postProcessor: PostProcessingPipeline;
    private readonly ledger: DownloadLedger;
    private readonly fileManager: FileManager;
    private readonly fetchImage: ImageFetcher;
    private readonly cookiesFile?: string;

    constructor(deps: DownloadExecutorDeps) {
        this.engine = deps.engine;
        this.postProcessor = deps.postProcessor;
        this.ledger = deps.ledger;
        this.fileManager = deps.fileManager ?? new FileManager();
        this.fetchImage = deps.fetchImage ?? createImageFetcher(deps.thumbnailTimeout ?? 10000);
        this.cookiesFile = deps.cookiesFile;
    }

    async execute(
        videoUrl: string,
        destinationBase: string,
        settings: DownloadSettings,
        reporter: ProgressReporter,
        isCancelled: () => boolean,
    ): Promise<ExecutionOutcome> {
        if (isCancelled()) {
            return { kind: 'cancelled' };
        }

        const cookiesFile = settings.cookiesFile ?? this.cookiesFile;

        let info: MediaInfo | null;
        try {
            info = await this.engine.extractInfo(videoUrl, { flat: false, cookiesFile });
        } catch (error) {
            const failure = classifyEngineError(videoUrl, (error as Error).message);
            logger.error('Failed to fetch video metadata', { url: videoUrl, reason: failure.reason });
            return { kind: 'failed', failure };
        }
        if (!info) {
            logger.warn('No metadata for video, likely private or removed', { url: videoUrl });
            return { kind: 'failed', failure: createFailure(videoUrl, FailureReason.PRIVATE_OR_INACCESSIBLE) };
        }

        const item: WorkItem = {
            sourceUrl: videoUrl,
            title: info.title ?? '',
            uploadTimestamp: info.timestamp,
            thumbnailUrl: info.thumbnail,
            description: info.description ?? '',
        };

        reporter.currentItem(item.title);
        reporter.description(item.description);
        await this.previewThumbnail(item, reporter);

        const folder = resolveDestinationDir(destinationBase, info, settings.useYearSubfolders);
        try {
            await this.fileManager.ensureDir(folder);
        } catch (error) {
            return {
                kind: 'failed',
                failure: createFailure(videoUrl, FailureReason.DOWNLOAD_ERROR, (error as Error).message),
            };
        }
        item.destinationDir = folder;

        const stem = truncateToBytes(sanitizeFilename(item.title || info.id || ''), MAX_STEM_BYTES);
        const outputTemplate = path.join(folder, `${stem}.%(ext)s`);
        const finalPath = path.join(folder, `${stem}.${outputExtension(settings)}`);

        const known = this.ledger.get(videoUrl);
        if (known !== undefined) {
            logger.info('⏭️ Already downloaded, skipping', { url: videoUrl, path: known });
            return { kind: 'skipped', filePath: known };
        }
        let exists: boolean;
        try {
            exists = await this.fileManager.fileExists(finalPath);
        } catch (error) {
            return {
                kind: 'failed',
                failure: createFailure(videoUrl, FailureReason.DOWNLOAD_ERROR, (error as Error).message),
            };
        }
        if (exists) {
            logger.info('⏭️ File already exists, skipping', { url: videoUrl, path: finalPath });
            return { kind: 'skipped', filePath: finalPath };
        }

        logger.info('⬇️ Starting download', { url: videoUrl, title: item.title, folder });
        const mediaInfo = info;
        const outcome = await this.engine.download({
            url: videoUrl,
            outputTemplate,
            settings: { ...settings, cookiesFile },
            isCancelled,
            onProgress: (progress) => reporter.itemProgress(progressPercent(progress)),
            onFinalized: async (filePath) => {
                const report = await this.postProcessor.process(filePath, mediaInfo, {
                    sourceUrl: videoUrl,
                    settings,
                });
                if (report.warnings.length > 0) {
                    logger.warn('Post-processing finished with warnings', {
                        filePath,
                        warnings: report.warnings,
                    });
                }
            },
        });

        switch (outcome.status) {
            case 'cancelled':
                return { kind: 'cancelled' };
            case 'failed': {
                const failure = classifyEngineError(videoUrl, outcome.error);
                logger.error('Download failed', { url: videoUrl, reason: failure.reason, error: outcome.error });
                return { kind: 'failed', failure };
            }
            case 'completed':
                await this.recordDownload(videoUrl, outcome.filePath);
                logger.info('✅ Download finished', { url: videoUrl, path: outcome.filePath });
                return { kind: 'downloaded', item, filePath: outcome.filePath };
        }
    }

    /**
     * The file is already in place, so a ledger write failure only costs the
     * skip on the next run
     */
    private async recordDownload(videoUrl: string, filePath: string): Promise<void> {
        try {
            await this.ledger.record(videoUrl, filePath);
        } catch (error) {
            logError(error as Error, { operation: 'recordDownload', url: videoUrl, filePath });
        }
    }

    private async previewThumbnail(item: WorkItem, reporter: ProgressReporter): Promise<void> {
        if (!item.thumbnailUrl) {
            return;
        }
        try {
            reporter.thumbnail(await this.fetchImage(item.thumbnailUrl));
        } catch (error) {
            logger.warn('Failed to fetch thumbnail preview', {
                url: item.thumbnailUrl,
                error: (error as Error).message,
            });
        }
    }
}
