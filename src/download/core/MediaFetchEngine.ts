/**
 * MediaFetchEngine - Turns a source locator into a verified audio file
 * Dispatches to the available providers with a single primary → fallback transition
 */

import { logger, errorMessage } from '../../utils/logger';
import { withTimeout } from '../../utils/asyncHelpers';
import { FileManager } from '../../utils/FileManager';
import { FileSanitizer } from '../security/FileSanitizer';
import { DownloadResult, SearchCandidate } from '../../types';
import {
    AudioFormat,
    FetchOptions,
    FetchProvider,
    FetchState,
    ProviderError,
    SearchOptions,
} from './types';

export const DEFAULT_SEARCH_LIMIT = 10;
export const SEARCH_TIMEOUT_MS = 25000;

export interface MediaFetchEngineOptions {
    searchTimeoutMs?: number;
    defaultAudioFormat?: AudioFormat;
    sanitizer?: FileSanitizer;
}

export interface FallbackOutcome<T> {
    value: T;
    provider: FetchProvider;
}

/**
 * Initialization and invocation failures are worth a second provider;
 * cancellation is not.
 */
export function isFallbackWorthy(error: unknown): boolean {
    return error instanceof ProviderError && error.kind !== 'aborted';
}

/**
 * Run `attempt` on the primary provider, and at most once more on the fallback
 */
export async function runWithFallback<T>(
    primary: FetchProvider,
    fallback: FetchProvider | undefined,
    attempt: (provider: FetchProvider) => Promise<T>,
): Promise<FallbackOutcome<T>> {
    try {
        return { value: await attempt(primary), provider: primary };
    } catch (error) {
        if (!fallback || !isFallbackWorthy(error)) {
            throw error;
        }

        logger.warn(`🔄 Provider ${primary.name} failed, falling back to ${fallback.name}`, {
            error: errorMessage(error),
        });
        return { value: await attempt(fallback), provider: fallback };
    }
}

export class MediaFetchEngine {
    private readonly providers: readonly FetchProvider[];
    private readonly fileManager: FileManager;
    private readonly sanitizer: FileSanitizer;
    private readonly searchTimeoutMs: number;
    private readonly defaultAudioFormat: AudioFormat;

    /**
     * @param providers in order of preference
     */
    constructor(
        providers: readonly FetchProvider[],
        fileManager: FileManager,
        options: MediaFetchEngineOptions = {},
    ) {
        this.providers = providers;
        this.fileManager = fileManager;
        this.sanitizer = options.sanitizer ?? new FileSanitizer();
        this.searchTimeoutMs = options.searchTimeoutMs ?? SEARCH_TIMEOUT_MS;
        this.defaultAudioFormat = options.defaultAudioFormat ?? 'mp3';
    }

    /**
     * Fetch `locator` into `outputPath`. Never throws; failures are reported
     * in the result and leave no file behind.
     */
    async fetch(
        locator: string,
        outputPath: string,
        options: FetchOptions = {},
    ): Promise<DownloadResult> {
        const setState = (state: FetchState): void => options.onStateChange?.(state);

        setState(FetchState.INITIALIZING);
        const [primary, fallback] = await this.availableProviders();
        if (!primary) {
            setState(FetchState.FAILED);
            return { success: false, error: 'No fetch provider available' };
        }

        const request = {
            locator,
            outputPath,
            audioFormat: options.audioFormat ?? this.defaultAudioFormat,
        };
        const onProgress = (fraction: number): void => {
            options.onProgress?.(Math.min(1, Math.max(0, fraction)));
        };

        setState(FetchState.DOWNLOADING);
        let providerName: string;
        try {
            const outcome = await runWithFallback(primary, fallback, async (provider) => {
                try {
                    await provider.download(request, onProgress, options.signal);
                } catch (error) {
                    await this.fileManager.deleteFile(outputPath);
                    throw error;
                }
            });
            providerName = outcome.provider.name;
        } catch (error) {
            await this.fileManager.deleteFile(outputPath);
            setState(FetchState.FAILED);
            logger.warn('Fetch failed', { locator, error: errorMessage(error) });
            return { success: false, error: errorMessage(error) };
        }

        setState(FetchState.VERIFYING);
        const validation = await this.sanitizer.validateDownload(outputPath);
        if (!validation.isValid) {
            await this.fileManager.deleteFile(outputPath);
            setState(FetchState.FAILED);
            const reason = validation.warnings.join('; ');
            logger.warn('Downloaded file rejected', { locator, provider: providerName, reason });
            return { success: false, provider: providerName, error: `Verification failed: ${reason}` };
        }

        setState(FetchState.COMPLETED);
        logger.info('✅ Fetch completed', {
            locator,
            provider: providerName,
            byteSize: validation.actualSize,
        });
        return {
            success: true,
            filePath: outputPath,
            byteSize: validation.actualSize,
            provider: providerName,
        };
    }

    /**
     * Search for candidates. A timeout or total failure yields an empty list.
     */
    async search(query: string, options: SearchOptions = {}): Promise<SearchCandidate[]> {
        const limit = options.limit ?? DEFAULT_SEARCH_LIMIT;
        const setState = (state: FetchState): void => options.onStateChange?.(state);

        setState(FetchState.SEARCHING);
        const [primary, fallback] = await this.availableProviders();
        if (!primary) {
            setState(FetchState.FAILED);
            logger.warn('Search skipped, no provider available', { query });
            return [];
        }

        try {
            const outcome = await withTimeout(
                (signal) => runWithFallback(primary, fallback, (provider) =>
                    provider.search(query, limit, signal)),
                this.searchTimeoutMs,
                'search',
                options.signal,
            );
            logger.debug('Search completed', {
                query,
                provider: outcome.provider.name,
                results: outcome.value.length,
            });
            setState(FetchState.COMPLETED);
            return outcome.value;
        } catch (error) {
            setState(FetchState.FAILED);
            logger.warn('Search failed', { query, error: errorMessage(error) });
            return [];
        }
    }

    private async availableProviders(): Promise<FetchProvider[]> {
        const available: FetchProvider[] = [];
        for (const provider of this.providers) {
            try {
                if (await provider.isAvailable()) {
                    available.push(provider);
                }
            } catch (error) {
                logger.warn(`Provider ${provider.name} availability check failed`, {
                    error: errorMessage(error),
                });
            }
        }
        return available;
    }
}
