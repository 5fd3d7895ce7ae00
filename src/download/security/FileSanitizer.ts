/**
 * FileSanitizer - Turns arbitrary media titles into names every common
 * filesystem accepts
 */

// Control characters plus the characters Windows, macOS and Linux reject between them
const INVALID_CHARS = /[<>:"/\\|?*\x00-\x1F\x7F]/g;
const RESERVED_NAMES = /^(con|prn|aux|nul|com[1-9]|lpt[1-9])$/i;
const TRAILING_JUNK = /[\s.]+$/;

export const MAX_FILENAME_LENGTH = 255;
export const FALLBACK_FILENAME = 'unknown_file';

// Longest suffix (dot included) still treated as an extension worth keeping
const MAX_EXTENSION_LENGTH = 17;

/**
 * Check whether the part before the first dot is a reserved device name
 */
export function isReservedName(name: string): boolean {
    const stem = name.split('.')[0] ?? name;
    return RESERVED_NAMES.test(stem);
}

function dropDanglingSurrogate(value: string): string {
    const last = value.charCodeAt(value.length - 1);
    return last >= 0xd800 && last <= 0xdbff ? value.slice(0, -1) : value;
}

function cut(value: string, length: number): string {
    return dropDanglingSurrogate(value.slice(0, length)).replace(TRAILING_JUNK, '');
}

function truncate(name: string): string {
    if (name.length <= MAX_FILENAME_LENGTH) {
        return name;
    }

    const dot = name.lastIndexOf('.');
    const extension = dot > 0 ? name.slice(dot) : '';
    if (extension.length > 1 && extension.length <= MAX_EXTENSION_LENGTH && !/\s/.test(extension)) {
        const stem = cut(name.slice(0, dot), MAX_FILENAME_LENGTH - extension.length);
        if (stem.length > 0) {
            return stem + extension;
        }
    }

    return cut(name, MAX_FILENAME_LENGTH);
}

/**
 * Shorten a name to at most `maxBytes` UTF-8 bytes without splitting a
 * code point. Filesystems limit name length in bytes, not characters.
 */
export function truncateToBytes(name: string, maxBytes: number): string {
    if (Buffer.byteLength(name, 'utf8') <= maxBytes) {
        return name;
    }

    let result = '';
    let used = 0;
    for (const char of name) {
        const size = Buffer.byteLength(char, 'utf8');
        if (used + size > maxBytes) {
            break;
        }
        result += char;
        used += size;
    }

    result = result.replace(TRAILING_JUNK, '');
    return result.length > 0 ? result : FALLBACK_FILENAME;
}

/**
 * Sanitize a title for use as a file name.
 * Deterministic and free of I/O.
 */
export function sanitizeFilename(rawName: string): string {
    const meaningful = rawName.replace(INVALID_CHARS, '').replace(/[\s.]/g, '');
    if (meaningful.length === 0) {
        return FALLBACK_FILENAME;
    }

    let name = rawName
        .replace(INVALID_CHARS, '_')
        .replace(/^\s+/, '')
        .replace(TRAILING_JUNK, '');

    name = truncate(name);

    if (isReservedName(name)) {
        name = `_${name}`;
        if (name.length > MAX_FILENAME_LENGTH) {
            name = cut(name, MAX_FILENAME_LENGTH);
        }
    }

    return name.length > 0 ? name : FALLBACK_FILENAME;
}
