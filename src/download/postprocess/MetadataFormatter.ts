import { MediaInfo } from '../core/types';

type Section = [heading: string, fields: Array<[key: string, value: string | number | undefined]>];

function renderSection([heading, fields]: Section): string {
    const lines = fields.map(([key, value]) => `${key}: ${value ?? ''}`);
    return `${heading}:\n${lines.join('\n')}`;
}

/**
 * Render the human-readable metadata sidecar. Every key is always present so
 * the file can be grepped, missing values render as empty strings.
 */
export function formatMetadata(info: MediaInfo, originalUrl: string): string {
    const sections: Section[] = [
        ['Basic Info', [
            ['Title', info.title],
            ['Uploader', info.uploader],
            ['Upload date', info.uploadDate],
            ['Duration', info.duration],
            ['View count', info.viewCount],
            ['Like count', info.likeCount],
            ['Description', info.description],
            ['Tags', info.tags.join(', ')],
        ]],
        ['Technical Info', [
            ['Format', info.format],
            ['Format ID', info.formatId],
            ['Resolution', info.resolution],
            ['FPS', info.fps],
            ['Video Codec', info.vcodec],
            ['Audio Codec', info.acodec],
        ]],
        ['Other Info', [
            ['Categories', info.categories.join(', ')],
            ['License', info.license],
            ['Age Limit', info.ageLimit],
            ['Webpage URL', info.webpageUrl],
            ['Original URL', originalUrl],
        ]],
    ];

    return sections.map(renderSection).join('\n\n');
}
