/**
 * Core index - exports all core components
 */

export * from './types';
export * from './failures';
export { UrlResolver, entryUrl, isPlaylistReference, qualifyUrl } from './UrlResolver';
export type { ResolveOptions, UrlResolverOptions } from './UrlResolver';
export { DownloadExecutor, createImageFetcher, progressPercent, resolveDestinationDir } from './DownloadExecutor';
export type { DownloadExecutorDeps, ImageFetcher } from './DownloadExecutor';
export { BatchOrchestrator, STATUS_CANCELLED, STATUS_COMPLETE } from './BatchOrchestrator';
export type { BatchOrchestratorDeps } from './BatchOrchestrator';
