/**
 * PostProcessor - best-effort steps applied to a finished media file:
 * thumbnail conversion, description/metadata embedding, cover art,
 * sidecar files and timestamp synchronization.
 *
 * A failing step is logged and recorded as a warning; the downloaded media
 * file is never deleted or rolled back.
 */

import fs from 'fs/promises';
import path from 'path';
import { logger } from '../../utils/logger';
import { FileManager } from '../../utils/FileManager';
import { formatMetadata } from './MetadataFormatter';
import { syncFileTimes } from './TimestampSync';
import {
    EmbedFlags,
    MediaInfo,
    MuxTool,
    PostProcessingPipeline,
    PostProcessOptions,
    PostProcessReport,
} from '../core/types';

const THUMBNAIL_EXTENSIONS = ['.png', '.jpg', '.jpeg', '.webp'];

export const SIDECAR_SUFFIXES = {
    text: '.txt',
    infoJson: '.info.json',
    description: '.description',
    thumbnail: '.png',
} as const;

/**
 * Build `-metadata key=value` pairs honouring the per-field embed flags
 */
export function buildMetadataArgs(info: MediaInfo, description: string, embed: EmbedFlags): string[] {
    const pairs: Array<[string, string | undefined]> = [];

    if (embed.title) {
        pairs.push(['title', info.title]);
    }
    if (embed.uploader) {
        pairs.push(['artist', info.uploader]);
    }
    if (embed.description && description.length > 0) {
        pairs.push(['comment', description], ['description', description]);
    }
    if (embed.tags && info.tags.length > 0) {
        pairs.push(['genre', info.tags.join(', ')]);
    }
    if (embed.license) {
        pairs.push(['copyright', info.license]);
    }

    return pairs
        .filter((pair): pair is [string, string] => typeof pair[1] === 'string' && pair[1].length > 0)
        .flatMap(([key, value]) => ['-metadata', `${key}=${value}`]);
}

/**
 * ffmpeg arguments that attach a PNG as cover art for the given container
 */
export function buildCoverArgs(mediaPath: string, coverPath: string, outputPath: string): string[] {
    const extension = path.extname(mediaPath).toLowerCase();

    if (extension === '.mp3') {
        return [
            '-y', '-i', mediaPath, '-i', coverPath,
            '-map', '0:a', '-map', '1', '-c', 'copy',
            '-id3v2_version', '3',
            '-metadata:s:v', 'title=Album cover',
            '-metadata:s:v', 'comment=Cover (front)',
            outputPath,
        ];
    }
    if (extension === '.mkv') {
        return [
            '-y', '-i', mediaPath,
            '-map', '0', '-c', 'copy',
            '-attach', coverPath, '-metadata:s:t', 'mimetype=image/png',
            outputPath,
        ];
    }
    return [
        '-y', '-i', mediaPath, '-i', coverPath,
        '-map', '0', '-map', '1', '-c', 'copy',
        '-disposition:v:1', 'attached_pic',
        outputPath,
    ];
}

export class PostProcessor implements PostProcessingPipeline {
    private readonly mux: MuxTool;
    private readonly fileManager: FileManager;

    constructor(mux: MuxTool, fileManager: FileManager = new FileManager()) {
        this.mux = mux;
        this.fileManager = fileManager;
    }

    async process(filePath: string, info: MediaInfo, options: PostProcessOptions): Promise<PostProcessReport> {
        const report: PostProcessReport = { filePath, completedSteps: [], warnings: [] };
        const sibling = (suffix: string) => this.fileManager.siblingPath(filePath, suffix);

        const runStep = async (name: string, step: () => Promise<boolean>): Promise<void> => {
            try {
                if (await step()) {
                    report.completedSteps.push(name);
                }
            } catch (error) {
                const message = (error as Error).message;
                report.warnings.push(`${name}: ${message}`);
                logger.warn('Post-processing step failed', { step: name, filePath, error: message });
            }
        };

        let coverPath: string | undefined;
        await runStep('thumbnail', async () => {
            coverPath = await this.preparePngThumbnail(filePath);
            return coverPath !== undefined;
        });

        await runStep('description', () => this.embedDescription(filePath, info, options));

        await runStep('cover', async () => {
            const cover = coverPath;
            if (!cover) {
                logger.debug('No thumbnail to embed', { filePath });
                return false;
            }
            await this.rewriteInPlace(filePath, (tempPath) => buildCoverArgs(filePath, cover, tempPath));
            return true;
        });

        await runStep('sidecars', async () => {
            await fs.writeFile(sibling(SIDECAR_SUFFIXES.text), formatMetadata(info, options.sourceUrl), 'utf-8');
            const infoJsonPath = sibling(SIDECAR_SUFFIXES.infoJson);
            if (!(await this.fileManager.fileExists(infoJsonPath))) {
                await fs.writeFile(infoJsonPath, JSON.stringify(info, null, 2), 'utf-8');
            }
            return true;
        });

        await runStep('timestamps', async () => {
            if (info.timestamp === undefined) {
                logger.info('Upload timestamp not available; file times not updated', { filePath });
                return false;
            }
            await syncFileTimes([
                filePath,
                coverPath ?? sibling(SIDECAR_SUFFIXES.thumbnail),
                sibling(SIDECAR_SUFFIXES.text),
                sibling(SIDECAR_SUFFIXES.infoJson),
                sibling(SIDECAR_SUFFIXES.description),
            ], info.timestamp);
            return true;
        });

        logger.info('Post-processing finished', {
            filePath,
            steps: report.completedSteps,
            warnings: report.warnings.length,
        });
        return report;
    }

    /**
     * Find the thumbnail sidecar and make sure a PNG version exists
     */
    private async preparePngThumbnail(filePath: string): Promise<string | undefined> {
        const candidates = THUMBNAIL_EXTENSIONS.map((ext) => this.fileManager.siblingPath(filePath, ext));
        const thumbnail = await this.fileManager.findFirstExisting(candidates);
        if (!thumbnail) {
            return undefined;
        }
        if (path.extname(thumbnail).toLowerCase() === '.png') {
            return thumbnail;
        }

        const pngPath = this.fileManager.siblingPath(filePath, SIDECAR_SUFFIXES.thumbnail);
        await this.mux.run(['-y', '-i', thumbnail, pngPath]);
        logger.debug('Thumbnail converted to PNG', { from: thumbnail, to: pngPath });
        return pngPath;
    }

    private async embedDescription(filePath: string, info: MediaInfo, options: PostProcessOptions): Promise<boolean> {
        const descriptionPath = this.fileManager.siblingPath(filePath, SIDECAR_SUFFIXES.description);
        const hasSidecar = await this.fileManager.fileExists(descriptionPath);
        const description = hasSidecar
            ? await fs.readFile(descriptionPath, 'utf-8')
            : info.description ?? '';

        if (!hasSidecar && description.length === 0) {
            return false;
        }

        const metadataArgs = buildMetadataArgs(info, description.trim(), options.settings.embed);
        if (metadataArgs.length === 0) {
            return false;
        }

        await this.rewriteInPlace(filePath, (tempPath) => [
            '-y', '-i', filePath, '-map', '0', '-c', 'copy', ...metadataArgs, tempPath,
        ]);
        return true;
    }

    /**
     * Let the mux tool write a temp file next to the media, then swap it in.
     * On failure the temp file is removed and the original stays untouched.
     */
    private async rewriteInPlace(filePath: string, buildArgs: (tempPath: string) => string[]): Promise<void> {
        const parsed = path.parse(filePath);
        const tempPath = path.join(parsed.dir, `${parsed.name}.tmp${parsed.ext}`);

        try {
            await this.mux.run(buildArgs(tempPath));
        } catch (error) {
            await this.fileManager.deleteFile(tempPath);
            throw error;
        }

        if (!(await this.fileManager.fileExists(tempPath))) {
            throw new Error(`${this.mux.name} did not produce ${tempPath}`);
        }
        await this.fileManager.replaceFile(tempPath, filePath);
    }
}
