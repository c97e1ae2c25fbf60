/**
 * InnertubeProvider - Fetch provider built on the youtubei.js streaming client
 * Used where the helper process is unavailable or fails
 */

import fs, { FileHandle } from 'fs/promises';
import { Innertube } from 'youtubei.js';
import { z } from 'zod';
import { BaseProvider } from './BaseProvider';
import { AudioFormat, FetchRequest, ProgressCallback } from '../core/types';
import { SearchCandidate } from '../../types';
import { extractVideoId, toWatchUrl } from '../../utils/UrlValidator';
import { logger, errorMessage } from '../../utils/logger';
import { withTimeout } from '../../utils/asyncHelpers';

// Large single requests get throttled; fetch in ranges
const CHUNK_SIZE = 10 * 1024 * 1024;

export interface AudioVariant {
    itag: number;
    mimeType: string;
    bitrate: number;
    contentLength: number;
}

// Search results are a union of renderer classes; read only what we need
const VideoNodeSchema = z.object({
    id: z.string().min(1),
    title: z.object({ text: z.string().optional() }),
    author: z.object({ name: z.string() }).optional(),
    duration: z.object({ seconds: z.number(), text: z.string().optional() }).optional(),
    thumbnails: z.array(z.object({ url: z.string() })).optional(),
});

/**
 * Container the requested format is best served from
 */
export function preferredContainer(format: AudioFormat): string {
    return format === 'opus' ? 'audio/webm' : 'audio/mp4';
}

/**
 * Preferred container first, then highest bitrate
 */
export function rankAudioVariants<T extends AudioVariant>(
    variants: readonly T[],
    preferredMimeType: string,
): T[] {
    const matches = (variant: T): boolean => variant.mimeType.startsWith(preferredMimeType);
    return [...variants].sort((a, b) => {
        const preference = Number(matches(b)) - Number(matches(a));
        return preference !== 0 ? preference : b.bitrate - a.bitrate;
    });
}

/**
 * Map raw search result nodes to candidates, dropping anything that is not a video
 */
export function toSearchCandidates(nodes: readonly unknown[], limit: number): SearchCandidate[] {
    const candidates: SearchCandidate[] = [];
    for (const node of nodes) {
        const parsed = VideoNodeSchema.safeParse(node);
        if (!parsed.success) continue;

        const video = parsed.data;
        candidates.push({
            title: video.title.text ?? '',
            artist: video.author?.name || 'Unknown',
            duration: video.duration?.seconds ?? video.duration?.text ?? 0,
            locator: toWatchUrl(video.id),
            thumbnailUrl: video.thumbnails?.[0]?.url ?? '',
        });
        if (candidates.length >= limit) break;
    }
    return candidates;
}

export class InnertubeProvider extends BaseProvider {
    readonly name = 'innertube';

    private readonly timeout: number;
    private client?: Promise<Innertube>;

    constructor(options: { timeout?: number } = {}) {
        super();
        this.timeout = options.timeout || 180000; // 3 minutes
    }

    async isAvailable(): Promise<boolean> {
        return true;
    }

    async download(
        request: FetchRequest,
        onProgress: ProgressCallback,
        signal?: AbortSignal,
    ): Promise<void> {
        this.throwIfAborted(signal);

        const videoId = extractVideoId(request.locator);
        if (!videoId) {
            throw this.fail('invocation', `Unsupported locator: ${request.locator}`);
        }

        const client = await this.getClient();

        await this.executeWithTracking(async () => {
            try {
                await withTimeout(async (attemptSignal) => {
                    const info = await client.getBasicInfo(videoId);
                    const variants = (info.streaming_data?.adaptive_formats ?? [])
                        .filter((format) => format.has_audio && !format.has_video)
                        .map((format) => ({
                            itag: format.itag,
                            mimeType: format.mime_type,
                            bitrate: format.bitrate,
                            contentLength: format.content_length ?? 0,
                            format,
                        }));

                    const [chosen] = rankAudioVariants(variants, preferredContainer(request.audioFormat));
                    if (!chosen) {
                        throw this.fail('invocation', 'No audio-only streams available');
                    }

                    logger.debug(`[${this.name}] Selected audio stream`, {
                        videoId,
                        itag: chosen.itag,
                        mimeType: chosen.mimeType,
                        bitrate: chosen.bitrate,
                    });

                    const url = await chosen.format.decipher(client.session.player);
                    await this.streamToFile(
                        url,
                        chosen.contentLength,
                        request.outputPath,
                        onProgress,
                        attemptSignal,
                    );
                }, this.timeout, `${this.name} download`, signal);
            } catch (error) {
                throw this.toProviderError(error, 'invocation', signal);
            }
        }, 'download');
    }

    async search(query: string, limit: number, signal?: AbortSignal): Promise<SearchCandidate[]> {
        this.throwIfAborted(signal);
        const client = await this.getClient();

        return this.executeWithTracking(async () => {
            try {
                const results = await client.search(query, { type: 'video' });
                this.throwIfAborted(signal);
                return toSearchCandidates(Array.from(results.videos), limit);
            } catch (error) {
                throw this.toProviderError(error, 'invocation', signal);
            }
        }, 'search');
    }

    /**
     * One session per provider; a failed session start is retried next call
     */
    private async getClient(): Promise<Innertube> {
        if (!this.client) {
            this.client = Innertube.create({ generate_session_locally: true });
        }
        try {
            return await this.client;
        } catch (error) {
            this.client = undefined;
            throw this.fail('init', `Could not start session: ${errorMessage(error)}`);
        }
    }

    /**
     * Stream the media URL to disk, reporting bytesReceived / totalBytes
     */
    private async streamToFile(
        url: string,
        totalBytes: number,
        outputPath: string,
        onProgress: ProgressCallback,
        signal?: AbortSignal,
    ): Promise<void> {
        let handle: FileHandle | undefined;
        let received = 0;

        try {
            handle = await fs.open(outputPath, 'w');

            do {
                const end = totalBytes > 0 ? Math.min(received + CHUNK_SIZE, totalBytes) - 1 : undefined;
                const response = await fetch(url, {
                    headers: end !== undefined ? { Range: `bytes=${received}-${end}` } : {},
                    signal,
                });

                if (!response.ok) {
                    throw this.fail('invocation', `HTTP ${response.status}: ${response.statusText}`);
                }

                const reader = response.body?.getReader();
                if (!reader) {
                    throw this.fail('invocation', 'No response body');
                }

                const before = received;
                try {
                    while (true) {
                        const { done, value } = await reader.read();
                        if (done) break;

                        await handle.write(value);
                        received += value.length;
                        if (totalBytes > 0) {
                            onProgress(Math.min(1, received / totalBytes));
                        }
                    }
                } finally {
                    await reader.cancel().catch((error: unknown) => {
                        logger.debug(`[${this.name}] Could not release response body`, {
                            error: errorMessage(error),
                        });
                    });
                }

                if (received === before) {
                    throw this.fail('invocation', 'Stream ended early');
                }
            } while (totalBytes > 0 && received < totalBytes);

            onProgress(1);
        } finally {
            await handle?.close();
        }
    }
}
