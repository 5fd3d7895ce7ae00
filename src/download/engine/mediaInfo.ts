/**
 * Boundary between the engine's loosely structured JSON "info dict" and the
 * typed MediaInfo record the rest of the system works with.
 */

import { z } from 'zod';
import { MediaInfo } from '../core/types';

interface RawThumbnail {
    url?: string | null;
}

interface RawInfo {
    _type?: string | null;
    id?: string | number | null;
    title?: string | null;
    uploader?: string | null;
    channel?: string | null;
    upload_date?: string | null;
    timestamp?: number | null;
    duration?: number | null;
    view_count?: number | null;
    like_count?: number | null;
    description?: string | null;
    tags?: string[] | null;
    categories?: string[] | null;
    license?: string | null;
    age_limit?: number | null;
    format?: string | null;
    format_id?: string | null;
    resolution?: string | null;
    fps?: number | null;
    vcodec?: string | null;
    acodec?: string | null;
    webpage_url?: string | null;
    original_url?: string | null;
    url?: string | null;
    thumbnail?: string | null;
    thumbnails?: RawThumbnail[] | null;
    ie_key?: string | null;
    extractor_key?: string | null;
    entries?: Array<RawInfo | null> | null;
}

// A field of the wrong shape is dropped instead of failing the whole record
const text = z.string().nullish().catch(undefined);
const num = z.number().nullish().catch(undefined);
const textList = z.array(z.string()).nullish().catch(undefined);

const RawInfoSchema: z.ZodType<RawInfo, z.ZodTypeDef, unknown> = z.lazy(() =>
    z.object({
        _type: text,
        id: z.union([z.string(), z.number()]).nullish().catch(undefined),
        title: text,
        uploader: text,
        channel: text,
        upload_date: text,
        timestamp: num,
        duration: num,
        view_count: num,
        like_count: num,
        description: text,
        tags: textList,
        categories: textList,
        license: text,
        age_limit: num,
        format: text,
        format_id: text,
        resolution: text,
        fps: num,
        vcodec: text,
        acodec: text,
        webpage_url: text,
        original_url: text,
        url: text,
        thumbnail: text,
        thumbnails: z.array(z.object({ url: text })).nullish().catch(undefined),
        ie_key: text,
        extractor_key: text,
        entries: z.array(RawInfoSchema.nullable().catch(null)).nullish().catch(undefined),
    }),
);

function orUndefined<T>(value: T | null | undefined): T | undefined {
    return value === null ? undefined : value;
}

function pickThumbnail(raw: RawInfo): string | undefined {
    if (raw.thumbnail) {
        return raw.thumbnail;
    }
    const candidates = (raw.thumbnails ?? []).filter((t) => typeof t.url === 'string' && t.url.length > 0);
    // yt-dlp orders thumbnails by preference, best last
    const best = candidates[candidates.length - 1];
    return orUndefined(best?.url);
}

function toMediaInfo(raw: RawInfo): MediaInfo {
    return {
        id: raw.id === null || raw.id === undefined ? undefined : String(raw.id),
        type: orUndefined(raw._type),
        title: orUndefined(raw.title),
        uploader: orUndefined(raw.uploader),
        channel: orUndefined(raw.channel),
        uploadDate: orUndefined(raw.upload_date),
        timestamp: orUndefined(raw.timestamp),
        duration: orUndefined(raw.duration),
        viewCount: orUndefined(raw.view_count),
        likeCount: orUndefined(raw.like_count),
        description: orUndefined(raw.description),
        tags: raw.tags ?? [],
        categories: raw.categories ?? [],
        license: orUndefined(raw.license),
        ageLimit: orUndefined(raw.age_limit),
        format: orUndefined(raw.format),
        formatId: orUndefined(raw.format_id),
        resolution: orUndefined(raw.resolution),
        fps: orUndefined(raw.fps),
        vcodec: orUndefined(raw.vcodec),
        acodec: orUndefined(raw.acodec),
        webpageUrl: orUndefined(raw.webpage_url),
        originalUrl: orUndefined(raw.original_url),
        url: orUndefined(raw.url),
        thumbnail: pickThumbnail(raw),
        ieKey: orUndefined(raw.ie_key ?? raw.extractor_key),
        entries: (raw.entries ?? []).map((entry) => (entry ? toMediaInfo(entry) : null)),
    };
}

/**
 * Normalize an already-decoded info dict. Returns null for anything that is
 * not an object.
 */
export function parseMediaInfo(data: unknown): MediaInfo | null {
    if (data === null || typeof data !== 'object' || Array.isArray(data)) {
        return null;
    }
    const result = RawInfoSchema.safeParse(data);
    return result.success ? toMediaInfo(result.data) : null;
}

/**
 * Decode the engine's JSON output. Empty output or the literal `null` (what
 * yt-dlp prints when it ignored an error) yields null.
 */
export function parseMediaInfoJson(output: string): MediaInfo | null {
    const trimmed = output.trim();
    if (trimmed.length === 0) {
        return null;
    }
    const lastLine = trimmed.split('\n').pop() ?? trimmed;
    return parseMediaInfo(JSON.parse(lastLine));
}

/**
 * Build a blank record, handy for callers that fill in a few fields
 */
export function emptyMediaInfo(overrides: Partial<MediaInfo> = {}): MediaInfo {
    return { tags: [], categories: [], entries: [], ...overrides };
}
