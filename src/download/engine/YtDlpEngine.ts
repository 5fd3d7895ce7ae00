/**
 * YtDlpEngine - Extraction/download engine backed by the yt-dlp executable
 * Metadata comes from --dump-single-json, downloads report progress through
 * a progress template on stdout and print the final path after the move
 */

import { spawn, ChildProcess } from 'child_process';
import { z } from 'zod';
import { logger } from '../../utils/logger';
import { EngineConfig } from '../../types/config';
import { parseMediaInfoJson } from './mediaInfo';
import { InvalidUrlError } from '../core/failures';
import {
    DownloadSettings,
    EngineDownloadOutcome,
    EngineDownloadRequest,
    ExtractOptions,
    ExtractionEngine,
    MediaInfo,
    ProgressSnapshot,
} from '../core/types';

// Refuse anything that is not a URL before it reaches the command line
const UrlSchema = z
    .string()
    .url()
    .refine((url) => !url.startsWith('-'), { message: 'Invalid URL format' });

const PROGRESS_PREFIX = '[progress]';
const FILEPATH_PREFIX = '[filepath]';
const PROGRESS_TEMPLATE =
    `download:${PROGRESS_PREFIX} %(progress.status)s %(progress.downloaded_bytes)s ` +
    '%(progress.total_bytes)s %(progress.total_bytes_estimate)s';
const CANCEL_POLL_INTERVAL = 500;

interface ProcessResult {
    code: number | null;
    stdout: string;
    stderr: string;
}

function optionalNumber(value: string | undefined): number | undefined {
    if (value === undefined || value === 'NA') {
        return undefined;
    }
    const parsed = Number(value);
    return Number.isFinite(parsed) ? parsed : undefined;
}

export function outputExtension(settings: DownloadSettings): string {
    return settings.outputFormat;
}

/**
 * Parse one line printed through the progress template
 */
export function parseProgressLine(line: string): ProgressSnapshot | null {
    if (!line.startsWith(PROGRESS_PREFIX)) {
        return null;
    }
    const [status, downloaded, total, estimate] = line.slice(PROGRESS_PREFIX.length).trim().split(/\s+/);
    if (status !== 'downloading' && status !== 'finished' && status !== 'error' && status !== 'started') {
        return null;
    }
    return {
        status,
        downloadedBytes: optionalNumber(downloaded),
        totalBytes: optionalNumber(total),
        totalBytesEstimate: optionalNumber(estimate),
    };
}

/**
 * Pick the most useful line out of yt-dlp's stderr
 */
export function extractErrorMessage(stderr: string, code: number | null): string {
    const lines = stderr.split('\n').map((line) => line.trim()).filter(Boolean);
    const errorLine = [...lines].reverse().find((line) => line.startsWith('ERROR:'));
    if (errorLine) {
        return errorLine.replace(/^ERROR:\s*/, '');
    }
    return lines[lines.length - 1] ?? `yt-dlp exited with code ${code}`;
}

export class YtDlpEngine implements ExtractionEngine {
    readonly name = 'yt-dlp';

    private readonly config: EngineConfig;
    private readonly infoTimeout: number;
    private activeProcesses = new Set<ChildProcess>();

    constructor(config: EngineConfig, options: { infoTimeout?: number } = {}) {
        this.config = config;
        this.infoTimeout = options.infoTimeout ?? 120000;
    }

    /**
     * Get metadata without downloading. Flat mode lists playlist entries
     * without visiting each of them.
     */
    async extractInfo(url: string, options: ExtractOptions): Promise<MediaInfo | null> {
        const parsedUrl = UrlSchema.safeParse(url);
        if (!parsedUrl.success) {
            throw new InvalidUrlError(url);
        }
        const validUrl = parsedUrl.data;
        const args = [
            '--dump-single-json',
            '--no-warnings',
            '--ignore-errors',
            '--socket-timeout', String(this.config.socketTimeout),
            ...(options.flat ? ['--flat-playlist'] : ['--no-playlist']),
        ];

        if (options.cookiesFile) {
            args.push('--cookies', options.cookiesFile);
        }
        args.push(validUrl);

        const result = await this.executeYtDlp(args, { timeout: this.infoTimeout });

        // With --ignore-errors a playlist can exit non-zero and still print its JSON
        if (result.stdout.trim().length > 0) {
            return parseMediaInfoJson(result.stdout);
        }
        if (result.code !== 0) {
            throw new Error(extractErrorMessage(result.stderr, result.code));
        }
        return null;
    }

    /**
     * Download one video. Cancellation is reported as an outcome, never thrown.
     */
    async download(request: EngineDownloadRequest): Promise<EngineDownloadOutcome> {
        const parsedUrl = UrlSchema.safeParse(request.url);
        if (!parsedUrl.success) {
            return { status: 'failed', error: `Invalid URL: ${request.url}` };
        }
        if (request.isCancelled()) {
            return { status: 'cancelled' };
        }

        const args = this.buildDownloadArgs(parsedUrl.data, request.outputTemplate, request.settings);
        logger.debug(`[${this.name}] Executing download`, { args: args.join(' ') });

        // Written from the process callbacks
        const seen: { filePath?: string; cancelled: boolean } = { cancelled: false };

        let result: ProcessResult;
        try {
            result = await this.executeYtDlp(args, {
                onLine: (line, proc) => {
                    if (line.startsWith(FILEPATH_PREFIX)) {
                        seen.filePath = line.slice(FILEPATH_PREFIX.length).trim();
                        return;
                    }
                    const progress = parseProgressLine(line);
                    if (!progress) {
                        return;
                    }
                    if (request.isCancelled()) {
                        seen.cancelled = true;
                        proc.kill('SIGKILL');
                        return;
                    }
                    request.onProgress(progress);
                },
                shouldKill: () => {
                    if (request.isCancelled()) {
                        seen.cancelled = true;
                        return true;
                    }
                    return false;
                },
            });
        } catch (error) {
            return { status: 'failed', error: (error as Error).message };
        }

        if (seen.cancelled || request.isCancelled()) {
            logger.info(`[${this.name}] Download cancelled`, { url: request.url });
            return { status: 'cancelled' };
        }
        if (result.code !== 0) {
            return { status: 'failed', error: extractErrorMessage(result.stderr, result.code) };
        }

        const finalPath = seen.filePath ?? request.outputTemplate.replace('%(ext)s', outputExtension(request.settings));
        if (request.onFinalized) {
            await request.onFinalized(finalPath);
        }
        return { status: 'completed', filePath: finalPath };
    }

    /**
     * Kill all running yt-dlp processes (shutdown path)
     */
    killAll(): void {
        for (const proc of this.activeProcesses) {
            proc.kill('SIGKILL');
        }
        this.activeProcesses.clear();
    }

    /**
     * Build download arguments from the user's settings
     */
    buildDownloadArgs(url: string, outputTemplate: string, settings: DownloadSettings): string[] {
        const args: string[] = [];

        if (settings.outputFormat === 'mp3') {
            args.push(
                '-f', `${settings.quality}/bestaudio/best`,
                '-x', '--audio-format', 'mp3', '--audio-quality', '192K',
            );
        } else {
            args.push(
                '-f', `${settings.quality}+bestaudio/best`,
                '--merge-output-format', settings.outputFormat,
            );
        }

        args.push(
            '-o', outputTemplate,
            '--no-playlist',
            '--newline',
            '--progress',
            '--progress-template', PROGRESS_TEMPLATE,
            '--print', `after_move:${FILEPATH_PREFIX} %(filepath)s`,
            '--no-simulate',
            '--no-warnings',
            '--write-thumbnail',
            '--write-description',
            '--write-info-json',
            '--continue',
            '--retries', String(this.config.retries),
            '--fragment-retries', String(this.config.fragmentRetries),
            '--concurrent-fragments', String(this.config.concurrentFragments),
            '--socket-timeout', String(this.config.socketTimeout),
        );

        if (settings.downloadSubtitles) {
            args.push('--write-subs', '--write-auto-subs');
        }
        if (settings.cookiesFile) {
            args.push('--cookies', settings.cookiesFile);
        }

        args.push(url);
        return args;
    }

    /**
     * Execute yt-dlp and collect its output line by line
     */
    private executeYtDlp(
        args: string[],
        hooks: {
            timeout?: number;
            onLine?: (line: string, proc: ChildProcess) => void;
            shouldKill?: () => boolean;
        } = {},
    ): Promise<ProcessResult> {
        return new Promise((resolve, reject) => {
            let stdout = '';
            let stderr = '';
            let pending = '';

            const proc = spawn(this.config.ytDlpPath, args, {
                stdio: ['ignore', 'pipe', 'pipe'],
            });
            this.activeProcesses.add(proc);

            const { onLine, shouldKill, timeout } = hooks;
            let poller: NodeJS.Timeout | undefined;
            let deadline: NodeJS.Timeout | undefined;

            proc.stdout?.on('data', (data: Buffer) => {
                const chunk = data.toString();
                stdout += chunk;
                if (!onLine) {
                    return;
                }
                pending += chunk;
                const lines = pending.split('\n');
                pending = lines.pop() ?? '';
                for (const line of lines) {
                    onLine(line.trim(), proc);
                }
            });

            proc.stderr?.on('data', (data: Buffer) => {
                const text = data.toString();
                stderr += text;
                if (text.includes('ERROR')) {
                    logger.warn('yt-dlp stderr', { text: text.trim() });
                }
            });

            // Progress lines stop during merging, so cancellation is also polled
            if (shouldKill) {
                poller = setInterval(() => {
                    if (shouldKill()) {
                        proc.kill('SIGKILL');
                    }
                }, CANCEL_POLL_INTERVAL);
            }

            if (timeout) {
                deadline = setTimeout(() => {
                    proc.kill('SIGKILL');
                    reject(new Error(`yt-dlp timed out after ${timeout}ms`));
                }, timeout);
            }

            const cleanup = () => {
                clearInterval(poller);
                clearTimeout(deadline);
                this.activeProcesses.delete(proc);
            };

            proc.on('close', (code: number | null) => {
                cleanup();
                if (onLine && pending.trim().length > 0) {
                    onLine(pending.trim(), proc);
                }
                resolve({ code, stdout, stderr });
            });

            proc.on('error', (error: Error) => {
                cleanup();
                reject(error);
            });
        });
    }
}
