/**
 * DownloadOrchestrator - Batch controller for download jobs
 * Drives a job track by track with quota gating, enrichment and progress events
 */

import path from 'path';
import { EventEmitter } from 'events';
import { logger, logError, errorMessage } from '../../utils/logger';
import { sleep } from '../../utils/asyncHelpers';
import { FileManager } from '../../utils/FileManager';
import { generateFilename } from '../../utils/logicHelpers';
import { isPlayableLocator } from '../../utils/UrlValidator';
import { QuotaGate } from '../../quota/QuotaGate';
import { MetadataProvider, mergeMissing, needsEnrichment } from '../../metadata/MetadataProvider';
import { TaggingSink } from '../../tagging/TaggingSink';
import { Job, SearchCandidate, TrackDescriptor } from '../../types';
import { MediaFetchEngine } from './MediaFetchEngine';
import { selectBest } from './MatchSelector';
import {
    AudioFormat,
    FetchState,
    JobEvent,
    JobEventHandler,
    JobStatus,
    JobSummary,
} from './types';

export const DEFAULT_FILENAME_PATTERN = '{playlist_index} - {artist} - {title}';

export interface OrchestratorDeps {
    quotaGate: QuotaGate;
    engine: MediaFetchEngine;
    metadata: MetadataProvider;
    tagger: TaggingSink;
    fileManager: FileManager;
    filenamePattern?: string;
    audioFormat?: AudioFormat;
}

export interface OrchestratorOptions {
    settleDelayMs?: number; // file-handle release before tagging
    clearDelayMs?: number;
}

export interface RunOptions {
    signal?: AbortSignal;
    onEvent?: JobEventHandler;
}

type TrackOutcome = 'downloaded' | 'skipped' | 'failed';

interface JobRun {
    job: Job;
    directory: string;
    completed: number;
    downloaded: number;
    skipped: number;
    failed: number;
    emit: (event: JobEvent) => void;
    signal?: AbortSignal;
}

export class DownloadOrchestrator extends EventEmitter {
    private readonly deps: OrchestratorDeps;
    private readonly filenamePattern: string;
    private readonly audioFormat: AudioFormat;
    private readonly settleDelayMs: number;
    private readonly clearDelayMs: number;
    private running = false;

    constructor(deps: OrchestratorDeps, options: OrchestratorOptions = {}) {
        super();
        this.deps = deps;
        this.filenamePattern = deps.filenamePattern ?? DEFAULT_FILENAME_PATTERN;
        this.audioFormat = deps.audioFormat ?? 'mp3';
        this.settleDelayMs = options.settleDelayMs ?? 500;
        this.clearDelayMs = options.clearDelayMs ?? 3000;
    }

    get isRunning(): boolean {
        return this.running;
    }

    /**
     * Run a job to completion. Resolves null, without side effects,
     * when another job is already running.
     */
    async run(job: Job, options: RunOptions = {}): Promise<JobSummary | null> {
        if (this.running) {
            logger.warn('⚠️ A download job is already in progress, ignoring request', {
                folderName: job.folderName,
            });
            return null;
        }

        this.running = true;
        try {
            return await this.execute(job, options);
        } finally {
            this.running = false;
        }
    }

    private async execute(job: Job, options: RunOptions): Promise<JobSummary> {
        const total = job.tracks.length;
        const emit = (event: JobEvent): void => {
            this.emit(event.type, event);
            options.onEvent?.(event);
        };

        logger.info('📥 Job started', { folderName: job.folderName, total });

        let directory: string;
        try {
            directory = await this.deps.fileManager.createDestinationDir(job.folderName);
        } catch (error) {
            logError(error, { folderName: job.folderName });
            return this.finish(
                { job, directory: '', completed: 0, downloaded: 0, skipped: 0, failed: 0, emit },
                JobStatus.STORAGE_UNAVAILABLE,
                'Could not create the destination folder',
            );
        }

        const state: JobRun = {
            job,
            directory,
            completed: 0,
            downloaded: 0,
            skipped: 0,
            failed: 0,
            emit,
            signal: options.signal,
        };

        for (const [index, track] of job.tracks.entries()) {
            if (options.signal?.aborted) {
                return this.finish(state, JobStatus.CANCELLED, 'Job cancelled');
            }

            if (await this.deps.quotaGate.isBanned()) {
                logger.warn('⛔ Account suspended, stopping job', { folderName: job.folderName });
                return this.finish(state, JobStatus.SUSPENDED, 'Account suspended');
            }

            if ((await this.deps.quotaGate.remainingQuota()) <= 0) {
                logger.warn('⛔ Daily download limit reached, stopping job', {
                    folderName: job.folderName,
                });
                const { limit } = this.deps.quotaGate.getSnapshot();
                return this.finish(state, JobStatus.LIMIT_REACHED, `Daily limit of ${limit} downloads reached`);
            }

            let outcome: TrackOutcome;
            try {
                outcome = await this.processTrack(state, track, index);
            } catch (error) {
                logError(error, { title: track.title, artist: track.artist });
                outcome = 'failed';
            }

            state.completed++;
            state[outcome]++;
            this.emitProgress(
                state,
                JobStatus.DOWNLOADING,
                `${state.completed} of ${total}: ${track.artist} - ${track.title}`,
                await this.deps.quotaGate.remainingQuota(),
            );
        }

        return this.finish(state, JobStatus.COMPLETED, `${state.downloaded} of ${total} downloaded`);
    }

    private async processTrack(state: JobRun, original: TrackDescriptor, index: number): Promise<TrackOutcome> {
        const { job, signal } = state;
        const enriched = await this.enrich(original, signal);
        const track: TrackDescriptor = {
            ...enriched,
            artworkUrl: job.artworkUrl || enriched.artworkUrl,
            trackNumber: enriched.trackNumber ?? index + 1,
            discNumber: enriched.discNumber ?? 1,
        };

        const filename = generateFilename(track, this.filenamePattern, index + 1);
        const outputPath = path.join(state.directory, `${filename}.${this.audioFormat}`);

        if (await this.deps.fileManager.fileExists(outputPath)) {
            logger.info('⏭️ Already downloaded, skipping', { outputPath });
            return 'skipped';
        }

        const locator = await this.resolveSource(track, signal);
        if (!locator) {
            logger.warn('⚠️ No source found', { title: track.title, artist: track.artist });
            return 'failed';
        }

        const result = await this.deps.engine.fetch(locator, outputPath, {
            audioFormat: this.audioFormat,
            signal,
            onStateChange: (fetchState) => {
                logger.debug('Fetch state', { title: track.title, state: fetchState });
            },
        });

        if (!result.success) {
            logger.warn('❌ Download failed', {
                title: track.title,
                artist: track.artist,
                error: result.error,
            });
            return 'failed';
        }

        await sleep(this.settleDelayMs);
        try {
            await this.deps.tagger.apply(outputPath, track);
        } catch (error) {
            logger.warn('Tagging failed', { outputPath, error: errorMessage(error) });
        }
        await this.deps.quotaGate.recordUsage('download');
        return 'downloaded';
    }

    /**
     * Fill missing year / track number from the metadata provider
     */
    private async enrich(track: TrackDescriptor, signal?: AbortSignal): Promise<TrackDescriptor> {
        if (!needsEnrichment(track)) return track;

        try {
            const match = await this.deps.metadata.bestMatch(track.title, track.artist, signal);
            return match ? mergeMissing(track, match) : track;
        } catch (error) {
            logger.warn('Metadata enrichment failed', {
                title: track.title,
                error: errorMessage(error),
            });
            return track;
        }
    }

    /**
     * A playable locator is used as-is; otherwise search by ISRC, then by
     * artist and title, and pick by duration
     */
    private async resolveSource(track: TrackDescriptor, signal?: AbortSignal): Promise<string | null> {
        if (isPlayableLocator(track.sourceLocator)) {
            return track.sourceLocator;
        }

        let candidates: SearchCandidate[] = [];
        if (track.isrc) {
            candidates = await this.search(`"${track.isrc}"`, track, signal);
        }
        if (candidates.length === 0) {
            candidates = await this.search(`${track.artist} ${track.title}`, track, signal);
        }
        return selectBest(candidates, track.durationSeconds)?.locator ?? null;
    }

    private search(query: string, track: TrackDescriptor, signal?: AbortSignal): Promise<SearchCandidate[]> {
        return this.deps.engine.search(query, {
            signal,
            onStateChange: (fetchState) => {
                if (fetchState === FetchState.FAILED) {
                    logger.debug('Search failed', { title: track.title, query });
                }
            },
        });
    }

    private emitProgress(state: JobRun, status: JobStatus, detail: string, remainingQuota?: number): void {
        const total = state.job.tracks.length;
        state.emit({
            type: 'progress',
            completed: state.completed,
            total,
            fraction: total > 0 ? state.completed / total : 0,
            status,
            detail,
            remainingQuota,
        });
    }

    private async finish(state: JobRun, status: JobStatus, detail: string): Promise<JobSummary> {
        const remainingQuota = await this.deps.quotaGate.remainingQuota();
        this.emitProgress(state, status, detail, remainingQuota);

        logger.info(status === JobStatus.COMPLETED ? '✅ Job finished' : '🛑 Job stopped', {
            folderName: state.job.folderName,
            status,
            downloaded: state.downloaded,
            skipped: state.skipped,
            failed: state.failed,
            remainingQuota,
        });

        await sleep(this.clearDelayMs);
        state.emit({ type: 'cleared' });

        return {
            total: state.job.tracks.length,
            completed: state.completed,
            downloaded: state.downloaded,
            skipped: state.skipped,
            failed: state.failed,
            status,
            remainingQuota,
        };
    }
}
