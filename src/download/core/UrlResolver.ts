/**
 * UrlResolver - Flattens raw user input (videos, playlists, playlists of
 * playlists) into an ordered list of concrete video URLs.
 *
 * Per-URL problems become FailureRecords; resolution of the remaining input
 * always continues.
 */

import { logger } from '../../utils/logger';
import { retryWithBackoff } from '../../utils/retryHelper';
import {
    InvalidUrlError,
    classifyExtractionError,
    createFailure,
    isInaccessibleMessage,
} from './failures';
import {
    ExtractionEngine,
    FailureReason,
    FailureRecord,
    MediaInfo,
    ResolutionResult,
} from './types';

export interface UrlResolverOptions {
    cookiesFile?: string;
    retries?: number;
    retryDelay?: number;
    maxDepth?: number;
    watchUrlTemplate?: string;
}

/** Per-run options; each falls back to the resolver's own setting */
export interface ResolveOptions {
    cookiesFile?: string;
}

type Lookup = { info: MediaInfo } | { failure: FailureRecord };

interface ResolveContext {
    urls: string[];
    failures: FailureRecord[];
    expanding: Set<string>;
    isCancelled: () => boolean;
    cookiesFile?: string;
}

const PLAYLIST_TYPES = new Set(['playlist', 'multi_video']);
const REFERENCE_TYPES = new Set(['url', 'url_transparent']);
// Titles the site substitutes for entries the current session cannot see
const INACCESSIBLE_TITLES = new Set(['[Private video]', '[Deleted video]']);

export const DEFAULT_WATCH_URL_TEMPLATE = 'https://www.youtube.com/watch?v={id}';

export function isAbsoluteUrl(value: string): boolean {
    return /^[a-z][a-z0-9+.-]*:\/\//i.test(value);
}

/**
 * Qualify a bare id or relative value against the canonical watch URL form
 */
export function qualifyUrl(value: string, template: string = DEFAULT_WATCH_URL_TEMPLATE): string {
    return isAbsoluteUrl(value) ? value : template.replace('{id}', encodeURIComponent(value));
}

/**
 * An entry's URL: canonical webpage URL first, then the raw url, then the id
 */
export function entryUrl(entry: MediaInfo, template: string = DEFAULT_WATCH_URL_TEMPLATE): string | undefined {
    const candidate = entry.webpageUrl ?? entry.url ?? entry.id;
    return candidate ? qualifyUrl(candidate, template) : undefined;
}

/**
 * Whether a flat entry points at another playlist rather than a video
 */
export function isPlaylistReference(entry: MediaInfo, url: string): boolean {
    if (!REFERENCE_TYPES.has(entry.type ?? '')) {
        return false;
    }
    if (entry.ieKey && /(Tab|Playlist)$/.test(entry.ieKey)) {
        return true;
    }
    try {
        const params = new URL(url).searchParams;
        return params.has('list') && !params.has('v');
    } catch {
        return false;
    }
}

export class UrlResolver {
    private readonly engine: ExtractionEngine;
    private readonly cookiesFile?: string;
    private readonly retries: number;
    private readonly retryDelay: number;
    private readonly maxDepth: number;
    private readonly watchUrlTemplate: string;

    constructor(engine: ExtractionEngine, options: UrlResolverOptions = {}) {
        this.engine = engine;
        this.cookiesFile = options.cookiesFile;
        this.retries = options.retries ?? 2;
        this.retryDelay = options.retryDelay ?? 1000;
        this.maxDepth = options.maxDepth ?? 5;
        this.watchUrlTemplate = options.watchUrlTemplate ?? DEFAULT_WATCH_URL_TEMPLATE;
    }

    /**
     * Resolve raw URLs in input order. Cancellation stops before the next raw
     * URL; whatever was resolved so far is kept.
     */
    async resolve(
        rawUrls: string[],
        isCancelled: () => boolean = () => false,
        options: ResolveOptions = {},
    ): Promise<ResolutionResult> {
        const cookiesFile = options.cookiesFile ?? this.cookiesFile;
        const urls: string[] = [];
        const failures: FailureRecord[] = [];

        for (const [index, rawUrl] of rawUrls.entries()) {
            if (isCancelled()) {
                logger.info('Resolution stopped by cancellation', {
                    resolved: urls.length,
                    remaining: rawUrls.length - index,
                });
                break;
            }

            const url = rawUrl.trim();
            if (url.length === 0) {
                continue;
            }

            const context: ResolveContext = { urls, failures, expanding: new Set([url]), isCancelled, cookiesFile };
            const before = urls.length;
            const lookup = await this.lookup(url, cookiesFile);

            if ('failure' in lookup) {
                failures.push(lookup.failure);
            } else {
                await this.classify(lookup.info, url, 0, context);
            }

            logger.info('🔍 URL resolved', { url, videos: urls.length - before });
        }

        return { urls, failures };
    }

    /**
     * Flat extraction with retries. Invalid URLs and private-video errors are
     * not retried.
     */
    private async lookup(url: string, cookiesFile: string | undefined): Promise<Lookup> {
        try {
            const info = await retryWithBackoff(
                () => this.engine.extractInfo(url, { flat: true, cookiesFile }),
                {
                    maxRetries: this.retries,
                    baseDelay: this.retryDelay,
                    operationName: `Flat extraction of ${url}`,
                    shouldRetry: (error) =>
                        !(error instanceof InvalidUrlError) && !isInaccessibleMessage(error.message),
                },
            );
            if (!info) {
                logger.error('No metadata found for URL', { url });
                return { failure: createFailure(url, FailureReason.NO_METADATA) };
            }
            return { info };
        } catch (error) {
            return { failure: classifyExtractionError(url, (error as Error).message) };
        }
    }

    private async classify(info: MediaInfo, sourceUrl: string, depth: number, context: ResolveContext): Promise<void> {
        const type = info.type ?? 'video';

        if (type === 'video') {
            context.urls.push(info.webpageUrl ? qualifyUrl(info.webpageUrl, this.watchUrlTemplate) : sourceUrl);
            return;
        }

        if (PLAYLIST_TYPES.has(type)) {
            await this.expandPlaylist(info, sourceUrl, depth, context);
            return;
        }

        logger.warn('Unhandled type for URL', { url: sourceUrl, type });
        context.failures.push(createFailure(sourceUrl, FailureReason.UNHANDLED_TYPE, type));
    }

    private async expandPlaylist(
        playlist: MediaInfo,
        playlistUrl: string,
        depth: number,
        context: ResolveContext,
    ): Promise<void> {
        for (const entry of playlist.entries) {
            if (entry === null) {
                logger.warn('Skipping a playlist entry with no data', { playlist: playlistUrl });
                context.failures.push(createFailure(playlistUrl, FailureReason.PRIVATE_OR_INACCESSIBLE));
                continue;
            }

            const url = entryUrl(entry, this.watchUrlTemplate);

            if (entry.title && INACCESSIBLE_TITLES.has(entry.title)) {
                context.failures.push(
                    createFailure(url ?? playlistUrl, FailureReason.PRIVATE_OR_INACCESSIBLE, entry.title),
                );
                continue;
            }

            if (PLAYLIST_TYPES.has(entry.type ?? '')) {
                if (this.tooDeep(depth, url ?? playlistUrl, context)) {
                    continue;
                }
                await this.expandPlaylist(entry, url ?? playlistUrl, depth + 1, context);
                continue;
            }

            if (!url) {
                context.failures.push(createFailure(playlistUrl, FailureReason.PRIVATE_OR_INACCESSIBLE));
                continue;
            }

            if (isPlaylistReference(entry, url)) {
                await this.expandReference(url, depth, context);
                continue;
            }

            context.urls.push(url);
        }
    }

    /**
     * Fetch a nested playlist by URL and expand it under the same rules
     */
    private async expandReference(url: string, depth: number, context: ResolveContext): Promise<void> {
        if (this.tooDeep(depth, url, context)) {
            return;
        }
        if (context.expanding.has(url)) {
            logger.warn('Playlist already being expanded, skipping', { url });
            return;
        }
        if (context.isCancelled()) {
            return;
        }

        context.expanding.add(url);
        const lookup = await this.lookup(url, context.cookiesFile);
        if ('failure' in lookup) {
            context.failures.push(lookup.failure);
        } else {
            await this.classify(lookup.info, url, depth + 1, context);
        }
        context.expanding.delete(url);
    }

    private tooDeep(depth: number, url: string, context: ResolveContext): boolean {
        if (depth + 1 <= this.maxDepth) {
            return false;
        }
        logger.warn('Playlist nesting too deep, skipping', { url, depth });
        context.failures.push(createFailure(url, FailureReason.UNHANDLED_TYPE, 'playlist nested too deeply'));
        return true;
    }
}
