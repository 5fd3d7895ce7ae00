/**
 * Core Types for the Batch Download System
 * Shared by the resolver, executor, post-processing pipeline and orchestrator
 */

// ============================================================================
// Enums
// ============================================================================

export enum BatchPhase {
    IDLE = 'idle',
    RESOLVING = 'resolving',
    DOWNLOADING = 'downloading',
    CANCELLING = 'cancelling',
    COMPLETED = 'completed',
}

export enum FailureReason {
    NO_METADATA = 'no-metadata',
    PRIVATE_OR_INACCESSIBLE = 'private-or-inaccessible',
    UNHANDLED_TYPE = 'unhandled-type',
    DOWNLOAD_ERROR = 'download-error',
    CANCELLED = 'cancelled',
}

export enum BatchEvents {
    STATUS = 'status',
    ITEM_PROGRESS = 'itemProgress',
    OVERALL_PROGRESS = 'overallProgress',
    CURRENT_ITEM = 'currentItem',
    THUMBNAIL = 'thumbnail',
    DESCRIPTION = 'description',
    FAILURES = 'failures',
    COMPLETED = 'completed',
    PHASE = 'phase',
}

// ============================================================================
// Settings
// ============================================================================

export type OutputFormat = 'mp4' | 'mkv' | 'mp3';

export interface EmbedFlags {
    title: boolean;
    uploader: boolean;
    description: boolean;
    tags: boolean;
    license: boolean;
}

export interface DownloadSettings {
    outputFormat: OutputFormat;
    quality: string;
    downloadSubtitles: boolean;
    embed: EmbedFlags;
    useYearSubfolders: boolean;
    cookiesFile?: string;
}

// ============================================================================
// Media metadata
// ============================================================================

export interface MediaInfo {
    id?: string;
    type?: string;
    title?: string;
    uploader?: string;
    channel?: string;
    uploadDate?: string; // YYYYMMDD
    timestamp?: number;  // unix seconds
    duration?: number;
    viewCount?: number;
    likeCount?: number;
    description?: string;
    tags: string[];
    categories: string[];
    license?: string;
    ageLimit?: number;
    format?: string;
    formatId?: string;
    resolution?: string;
    fps?: number;
    vcodec?: string;
    acodec?: string;
    webpageUrl?: string;
    originalUrl?: string;
    url?: string;
    thumbnail?: string;
    ieKey?: string;
    entries: Array<MediaInfo | null>;
}

// ============================================================================
// Work items & failures
// ============================================================================

export interface WorkItem {
    sourceUrl: string;
    title: string;
    uploadTimestamp?: number;
    thumbnailUrl?: string;
    description: string;
    destinationDir?: string;
}

export interface FailureRecord {
    readonly url: string;
    readonly reason: FailureReason;
    readonly detail?: string;
}

export interface BatchState {
    queue: WorkItem[];
    completedCount: number;
    totalCount: number;
    failures: FailureRecord[];
    cancelRequested: boolean;
    downloadCounter: number;
    phase: BatchPhase;
}

export interface BatchSummary {
    totalCount: number;
    completedCount: number;
    downloaded: number;
    skipped: number;
    failures: FailureRecord[];
    cancelled: boolean;
    fatalError?: string;
}

export interface ResolutionResult {
    urls: string[];
    failures: FailureRecord[];
}

// ============================================================================
// Engine contract
// ============================================================================

export interface ExtractOptions {
    flat: boolean;
    cookiesFile?: string;
}

export interface ProgressSnapshot {
    status: 'downloading' | 'finished' | 'error' | 'started';
    downloadedBytes?: number;
    totalBytes?: number;
    totalBytesEstimate?: number;
}

export interface EngineDownloadRequest {
    url: string;
    outputTemplate: string;
    settings: DownloadSettings;
    onProgress: (progress: ProgressSnapshot) => void;
    isCancelled: () => boolean;
    /** Called once the engine has moved the finished container into place */
    onFinalized?: (filePath: string) => Promise<void>;
}

export type EngineDownloadOutcome =
    | { status: 'completed'; filePath: string }
    | { status: 'cancelled' }
    | { status: 'failed'; error: string };

export interface ExtractionEngine {
    readonly name: string;

    /**
     * Fetch metadata without downloading. Resolves null when the engine
     * produced no result for the URL.
     */
    extractInfo(url: string, options: ExtractOptions): Promise<MediaInfo | null>;

    download(request: EngineDownloadRequest): Promise<EngineDownloadOutcome>;
}

export interface MuxTool {
    readonly name: string;
    isAvailable(): Promise<boolean>;
    run(args: string[]): Promise<void>;
}

// ============================================================================
// Executor
// ============================================================================

export type ExecutionOutcome =
    | { kind: 'downloaded'; item: WorkItem; filePath: string }
    | { kind: 'skipped'; filePath: string }
    | { kind: 'failed'; failure: FailureRecord }
    | { kind: 'cancelled' };

/**
 * One-way sink the executor reports through. The orchestrator turns every
 * call into an event; nothing flows back.
 */
export interface ProgressReporter {
    itemProgress(percent: number): void;
    currentItem(title: string): void;
    description(text: string): void;
    thumbnail(image: Buffer): void;
}

export interface PostProcessReport {
    filePath: string;
    completedSteps: string[];
    warnings: string[];
}

export interface PostProcessOptions {
    sourceUrl: string;
    settings: DownloadSettings;
}

export interface PostProcessingPipeline {
    process(filePath: string, info: MediaInfo, options: PostProcessOptions): Promise<PostProcessReport>;
}

// ============================================================================
// Event payloads
// ============================================================================

export interface BatchEventMap {
    [BatchEvents.STATUS]: [text: string];
    [BatchEvents.ITEM_PROGRESS]: [percent: number];
    [BatchEvents.OVERALL_PROGRESS]: [percent: number];
    [BatchEvents.CURRENT_ITEM]: [title: string];
    [BatchEvents.THUMBNAIL]: [image: Buffer];
    [BatchEvents.DESCRIPTION]: [text: string];
    [BatchEvents.FAILURES]: [failures: FailureRecord[]];
    [BatchEvents.COMPLETED]: [summary: BatchSummary];
    [BatchEvents.PHASE]: [phase: BatchPhase];
}
