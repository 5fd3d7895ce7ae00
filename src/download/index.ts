/**
 * Download System - Main Entry Point
 * Exports all components of the batch download system
 */

// Core components
export * from './core';

// Engine adapters
export { YtDlpEngine } from './engine/YtDlpEngine';
export { FfmpegRunner } from './engine/FfmpegRunner';
export { parseMediaInfo, parseMediaInfoJson } from './engine/mediaInfo';

// Post-processing
export { PostProcessor } from './postprocess/PostProcessor';
export { formatMetadata } from './postprocess/MetadataFormatter';
export { syncFileTimes } from './postprocess/TimestampSync';

// Persistence
export { DownloadLedger } from './ledger/DownloadLedger';

// Security
export { sanitizeFilename } from './security/FileSanitizer';
