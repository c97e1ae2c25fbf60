/**
 * BaseProvider - Abstract base class for all fetch providers
 * Implements common functionality like timing and error classification
 */

import { logger, errorMessage } from '../../utils/logger';
import {
    FetchProvider,
    FetchRequest,
    ProgressCallback,
    ProviderError,
    ProviderErrorKind,
} from '../core/types';
import { SearchCandidate } from '../../types';

export abstract class BaseProvider implements FetchProvider {
    abstract readonly name: string;

    abstract isAvailable(): Promise<boolean>;

    abstract download(
        request: FetchRequest,
        onProgress: ProgressCallback,
        signal?: AbortSignal,
    ): Promise<void>;

    abstract search(query: string, limit: number, signal?: AbortSignal): Promise<SearchCandidate[]>;

    /**
     * Build a ProviderError tagged with this provider's name
     */
    protected fail(kind: ProviderErrorKind, message: string): ProviderError {
        return new ProviderError(this.name, kind, message);
    }

    /**
     * Classify an unknown failure. An aborted signal always wins.
     */
    protected toProviderError(
        error: unknown,
        fallbackKind: ProviderErrorKind,
        signal?: AbortSignal,
    ): ProviderError {
        if (error instanceof ProviderError) return error;
        if (signal?.aborted) return this.fail('aborted', 'Operation cancelled');
        return this.fail(fallbackKind, errorMessage(error));
    }

    /**
     * Throw if the caller has already cancelled
     */
    protected throwIfAborted(signal?: AbortSignal): void {
        if (signal?.aborted) {
            throw this.fail('aborted', 'Operation cancelled');
        }
    }

    /**
     * Execute with timing and failure logging
     */
    protected async executeWithTracking<T>(
        operation: () => Promise<T>,
        operationName: string,
    ): Promise<T> {
        const startTime = Date.now();

        try {
            const result = await operation();
            logger.debug(`[${this.name}] ${operationName} succeeded`, {
                responseTime: Date.now() - startTime,
            });
            return result;
        } catch (error) {
            logger.warn(`[${this.name}] ${operationName} failed`, {
                error: errorMessage(error),
            });
            throw error;
        }
    }
}
