/**
 * Core index - exports all core components
 */

export * from './types';
export { CompletionLatch } from './CompletionLatch';
export { selectBest, DURATION_TOLERANCE_SECONDS } from './MatchSelector';
export { MediaFetchEngine, runWithFallback, isFallbackWorthy } from './MediaFetchEngine';
export { DownloadOrchestrator, DEFAULT_FILENAME_PATTERN } from './DownloadOrchestrator';
export type { OrchestratorDeps, OrchestratorOptions, RunOptions } from './DownloadOrchestrator';
