/**
 * BatchOrchestrator - Main coordinator for a batch of downloads
 * Owns the batch state machine, resolves the input, runs the executor for
 * every item in order and reports everything through events
 */

import { EventEmitter } from 'events';
import { logger, logError } from '../../utils/logger';
import { FileManager } from '../../utils/FileManager';
import { BatchPreconditionError, createFailure } from './failures';
import { DownloadExecutor } from './DownloadExecutor';
import { UrlResolver } from './UrlResolver';
import {
    BatchEventMap,
    BatchEvents,
    BatchPhase,
    BatchState,
    BatchSummary,
    DownloadSettings,
    ExecutionOutcome,
    FailureReason,
    MuxTool,
    ProgressReporter,
    ResolutionResult,
} from './types';

export const STATUS_CANCELLED = 'Download stopped by user.';
export const STATUS_COMPLETE = 'Download complete';

export interface BatchOrchestratorDeps {
    resolver: Pick<UrlResolver, 'resolve'>;
    executor: Pick<DownloadExecutor, 'execute'>;
    mux: MuxTool;
    fileManager?: FileManager;
    coolOffEvery?: number;
    coolOffMaxMs?: number;
    random?: () => number;
}

function createState(): BatchState {
    return {
        queue: [],
        completedCount: 0,
        totalCount: 0,
        failures: [],
        cancelRequested: false,
        downloadCounter: 0,
        phase: BatchPhase.IDLE,
    };
}

export class BatchOrchestrator extends EventEmitter {
    private readonly resolver: Pick<UrlResolver, 'resolve'>;
    private readonly executor: Pick<DownloadExecutor, 'execute'>;
    private readonly mux: MuxTool;
    private readonly fileManager: FileManager;
    private readonly coolOffEvery: number;
    private readonly coolOffMaxMs: number;
    private readonly random: () => number;

    private state: BatchState = createState();
    private running = false;
    private sleepAbort?: AbortController;

    constructor(deps: BatchOrchestratorDeps) {
        super();
        this.resolver = deps.resolver;
        this.executor = deps.executor;
        this.mux = deps.mux;
        this.fileManager = deps.fileManager ?? new FileManager();
        this.coolOffEvery = deps.coolOffEvery ?? 10;
        this.coolOffMaxMs = deps.coolOffMaxMs ?? 2000;
        this.random = deps.random ?? Math.random;
    }

    /**
     * Typed emit over the batch event map
     */
    private emitEvent<K extends keyof BatchEventMap>(event: K, ...args: BatchEventMap[K]): void {
        this.emit(event, ...args);
    }

    getPhase(): BatchPhase {
        return this.state.phase;
    }

    /**
     * Read-only snapshot of the current batch
     */
    getState(): Readonly<BatchState> {
        return {
            ...this.state,
            queue: this.state.queue.map((item) => ({ ...item })),
            failures: [...this.state.failures],
        };
    }

    isRunning(): boolean {
        return this.running;
    }

    /**
     * Request cancellation. Takes effect at the next check: before an item,
     * inside the progress hook, or during the cool-off sleep.
     */
    stop(): void {
        if (!this.running || this.state.cancelRequested) {
            return;
        }
        this.state.cancelRequested = true;
        logger.info('🛑 Cancellation requested', { phase: this.state.phase });
        if (this.state.phase !== BatchPhase.COMPLETED) {
            this.transition(BatchPhase.CANCELLING);
        }
        this.sleepAbort?.abort();
    }

    /**
     * Run a batch to completion. Resolves with the summary also carried by
     * the `completed` event.
     */
    async start(rawUrls: string[], destinationDir: string, settings: DownloadSettings): Promise<BatchSummary> {
        if (this.running) {
            throw new BatchPreconditionError('A batch is already running');
        }
        if (rawUrls.every((url) => url.trim().length === 0)) {
            throw new BatchPreconditionError('No URLs to download');
        }

        this.running = true;
        this.state = createState();
        const counters = { downloaded: 0, skipped: 0 };

        try {
            const fatalError = await this.checkPreconditions(destinationDir);
            if (fatalError) {
                this.emitEvent(BatchEvents.STATUS, fatalError);
                this.transition(BatchPhase.COMPLETED);
                const summary = this.summarize(counters, fatalError);
                this.emitEvent(BatchEvents.COMPLETED, summary);
                return summary;
            }

            if (!this.state.cancelRequested) {
                this.transition(BatchPhase.RESOLVING);
                this.emitEvent(BatchEvents.STATUS, 'Resolving URLs...');
                const resolution = await this.resolve(rawUrls, settings);

                if (!this.state.cancelRequested) {
                    await this.runDownloads(resolution.urls, destinationDir, settings, counters);
                }
            }

            return this.finish(counters);
        } finally {
            this.running = false;
            this.sleepAbort = undefined;
        }
    }

    private async checkPreconditions(destinationDir: string): Promise<string | undefined> {
        if (!(await this.mux.isAvailable())) {
            logger.error('Mux tool not available', { tool: this.mux.name });
            return `${this.mux.name} is not installed or not on PATH. Please install it to continue.`;
        }
        if (!(await this.fileManager.isWritableDir(destinationDir))) {
            logger.error('Destination directory is not writable', { destinationDir });
            return `Cannot write to destination directory: ${destinationDir}`;
        }
        return undefined;
    }

    private async resolve(rawUrls: string[], settings: DownloadSettings): Promise<ResolutionResult> {
        const resolution = await this.resolver.resolve(rawUrls, () => this.state.cancelRequested, {
            cookiesFile: settings.cookiesFile,
        });
        this.state.failures.push(...resolution.failures);
        this.state.totalCount = resolution.urls.length;
        this.state.queue = resolution.urls.map((url) => ({ sourceUrl: url, title: '', description: '' }));

        logger.info('📋 Batch resolved', {
            videos: resolution.urls.length,
            failures: resolution.failures.length,
        });
        return resolution;
    }

    private async runDownloads(
        urls: string[],
        destinationDir: string,
        settings: DownloadSettings,
        counters: { downloaded: number; skipped: number },
    ): Promise<void> {
        this.transition(BatchPhase.DOWNLOADING);
        this.emitEvent(BatchEvents.OVERALL_PROGRESS, 0);

        const reporter: ProgressReporter = {
            itemProgress: (percent) => this.emitEvent(BatchEvents.ITEM_PROGRESS, percent),
            currentItem: (title) => this.emitEvent(BatchEvents.CURRENT_ITEM, title),
            description: (text) => this.emitEvent(BatchEvents.DESCRIPTION, text),
            thumbnail: (image) => this.emitEvent(BatchEvents.THUMBNAIL, image),
        };

        for (const [index, url] of urls.entries()) {
            if (this.state.cancelRequested) {
                break;
            }

            this.emitEvent(BatchEvents.STATUS, `Downloading ${index + 1} of ${urls.length}`);
            const outcome = await this.runItem(url, destinationDir, settings, reporter);

            if (outcome.kind === 'cancelled') {
                this.state.failures.push(createFailure(url, FailureReason.CANCELLED));
                break;
            }

            if (outcome.kind === 'downloaded') {
                counters.downloaded++;
                const queued = this.state.queue[index];
                if (queued) {
                    Object.assign(queued, outcome.item);
                }
            } else if (outcome.kind === 'skipped') {
                counters.skipped++;
            } else {
                this.state.failures.push(outcome.failure);
            }

            this.state.completedCount++;
            this.emitEvent(
                BatchEvents.OVERALL_PROGRESS,
                Math.floor((this.state.completedCount / this.state.totalCount) * 100),
            );
            this.emitEvent(BatchEvents.ITEM_PROGRESS, 0);

            this.state.downloadCounter++;
            if (
                this.coolOffEvery > 0 &&
                this.state.downloadCounter % this.coolOffEvery === 0 &&
                !this.state.cancelRequested
            ) {
                await this.coolOff();
            }
        }
    }

    /**
     * Run the executor for one item; an unexpected error only fails that item
     */
    private async runItem(
        url: string,
        destinationDir: string,
        settings: DownloadSettings,
        reporter: ProgressReporter,
    ): Promise<ExecutionOutcome> {
        try {
            return await this.executor.execute(url, destinationDir, settings, reporter, () => this.state.cancelRequested);
        } catch (error) {
            logError(error as Error, { operation: 'executeDownload', url });
            return {
                kind: 'failed',
                failure: createFailure(url, FailureReason.DOWNLOAD_ERROR, (error as Error).message),
            };
        }
    }

    /**
     * Random pause between groups of downloads; only cancellation cuts it short
     */
    private coolOff(): Promise<void> {
        const delay = this.random() * this.coolOffMaxMs;
        logger.debug('Cooling off between downloads', { delay: Math.round(delay) });

        const controller = new AbortController();
        this.sleepAbort = controller;

        return new Promise((resolve) => {
            const timer = setTimeout(done, delay);
            function done(): void {
                clearTimeout(timer);
                controller.signal.removeEventListener('abort', done);
                resolve();
            }
            controller.signal.addEventListener('abort', done);
        });
    }

    private finish(counters: { downloaded: number; skipped: number }): BatchSummary {
        this.transition(BatchPhase.COMPLETED);

        this.emitEvent(BatchEvents.FAILURES, [...this.state.failures]);
        this.emitEvent(BatchEvents.STATUS, this.state.cancelRequested ? STATUS_CANCELLED : STATUS_COMPLETE);

        const summary = this.summarize(counters);
        logger.info('🏁 Batch finished', {
            total: summary.totalCount,
            completed: summary.completedCount,
            downloaded: summary.downloaded,
            skipped: summary.skipped,
            failures: summary.failures.length,
            cancelled: summary.cancelled,
        });
        this.emitEvent(BatchEvents.COMPLETED, summary);
        return summary;
    }

    private summarize(counters: { downloaded: number; skipped: number }, fatalError?: string): BatchSummary {
        const summary: BatchSummary = {
            totalCount: this.state.totalCount,
            completedCount: this.state.completedCount,
            downloaded: counters.downloaded,
            skipped: counters.skipped,
            failures: [...this.state.failures],
            cancelled: this.state.cancelRequested,
        };
        if (fatalError) {
            summary.fatalError = fatalError;
        }
        return summary;
    }

    private transition(phase: BatchPhase): void {
        if (this.state.phase === phase) {
            return;
        }
        logger.info('Batch phase changed', { from: this.state.phase, to: phase });
        this.state.phase = phase;
        this.emitEvent(BatchEvents.PHASE, phase);
    }
}
