/**
 * Core Types for Download System
 * Defines the interfaces shared by the engine, its providers and the orchestrator
 */

import { SearchCandidate } from '../../types';

// ============================================================================
// Enums
// ============================================================================

export enum FetchState {
    INITIALIZING = 'initializing',
    SEARCHING = 'searching',
    DOWNLOADING = 'downloading',
    VERIFYING = 'verifying',
    COMPLETED = 'completed',
    FAILED = 'failed',
}

export enum JobStatus {
    DOWNLOADING = 'Downloading...',
    SUSPENDED = 'Suspended',
    LIMIT_REACHED = 'Limit Reached',
    STORAGE_UNAVAILABLE = 'Storage Unavailable',
    CANCELLED = 'Cancelled',
    COMPLETED = 'Completed',
}

// ============================================================================
// Fetch Types
// ============================================================================

export type AudioFormat = 'mp3' | 'm4a' | 'opus';

/**
 * Fraction in [0, 1]
 */
export type ProgressCallback = (fraction: number) => void;

export interface FetchRequest {
    locator: string;
    outputPath: string;
    audioFormat: AudioFormat;
}

export interface FetchOptions {
    audioFormat?: AudioFormat;
    onProgress?: ProgressCallback;
    onStateChange?: (state: FetchState) => void;
    signal?: AbortSignal;
}

export interface SearchOptions {
    limit?: number;
    onStateChange?: (state: FetchState) => void;
    signal?: AbortSignal;
}

export interface FileValidation {
    isValid: boolean;
    mimeType?: string;
    actualSize?: number;
    warnings: string[];
}

// ============================================================================
// Provider Types
// ============================================================================

export type ProviderErrorKind = 'init' | 'invocation' | 'aborted';

export class ProviderError extends Error {
    readonly kind: ProviderErrorKind;
    readonly provider: string;

    constructor(provider: string, kind: ProviderErrorKind, message: string) {
        super(`[${provider}] ${message}`);
        this.name = 'ProviderError';
        this.provider = provider;
        this.kind = kind;
    }
}

export interface FetchProvider {
    readonly name: string;

    /**
     * Whether this runtime can use the provider at all
     */
    isAvailable(): Promise<boolean>;

    /**
     * Write the audio for `request.locator` to `request.outputPath`.
     * Resolves on success, rejects with a ProviderError otherwise.
     */
    download(
        request: FetchRequest,
        onProgress: ProgressCallback,
        signal?: AbortSignal,
    ): Promise<void>;

    search(query: string, limit: number, signal?: AbortSignal): Promise<SearchCandidate[]>;
}

// ============================================================================
// Orchestrator Event Types
// ============================================================================

export interface JobProgressEvent {
    type: 'progress';
    completed: number;
    total: number;
    fraction: number;
    status: JobStatus;
    detail: string;
    remainingQuota?: number;
}

export interface JobClearedEvent {
    type: 'cleared';
}

export type JobEvent = JobProgressEvent | JobClearedEvent;

export type JobEventHandler = (event: JobEvent) => void;

export interface JobSummary {
    total: number;
    completed: number;
    downloaded: number;
    skipped: number;
    failed: number;
    status: JobStatus;
    remainingQuota: number;
}
