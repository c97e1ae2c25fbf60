/**
 * YtDlpProvider - Fetch provider that drives the yt-dlp helper process
 * Primary provider wherever the bundled binaries could be installed
 */

import { spawn, ChildProcessByStdio } from 'child_process';
import { Readable } from 'stream';
import fs from 'fs/promises';
import { z } from 'zod';
import { BaseProvider } from './BaseProvider';
import { BinaryManager, BinaryPaths } from './BinaryManager';
import { CompletionLatch } from '../core/CompletionLatch';
import { FetchRequest, ProgressCallback, ProviderError } from '../core/types';
import { SearchCandidate } from '../../types';
import { extractVideoId, toWatchUrl } from '../../utils/UrlValidator';
import { logger, errorMessage } from '../../utils/logger';

// URL validation schema
const UrlSchema = z
    .string()
    .url()
    .refine((url) => /^https?:\/\//i.test(url), { message: 'Invalid URL format' });

const SEARCH_PRINT_TEMPLATE = '%(title)s:::%(id)s:::%(uploader)s:::%(duration)s:::%(thumbnail)s';
const SEARCH_FIELD_SEPARATOR = ':::';
const PROGRESS_PATTERN = /\[download\]\s+(\d+\.?\d*)%/g;

interface RunOptions {
    signal?: AbortSignal;
    timeoutMs: number;
    onStdout?: (text: string) => void;
}

/**
 * Arguments for an audio-only download of `url` into `outputPath`
 */
export function buildDownloadArgs(
    request: FetchRequest,
    ffmpegLocation: string,
): string[] {
    return [
        '-x',
        '--no-playlist',
        '--extractor-args', 'youtube:player_client=default',
        '--audio-format', request.audioFormat,
        '--audio-quality', '0',
        '--force-overwrites',
        '--ffmpeg-location', ffmpegLocation,
        '--output', request.outputPath,
        '--no-part',
        request.locator,
    ];
}

export function buildSearchArgs(query: string, limit: number): string[] {
    return [
        '--print', SEARCH_PRINT_TEMPLATE,
        '--flat-playlist',
        '--no-warnings',
        `ytsearch${limit}:${query}`,
    ];
}

/**
 * Last `[download] NN.N%` token in a chunk of output, as a fraction
 */
export function parseProgress(text: string): number | null {
    let percentage: number | null = null;
    for (const match of text.matchAll(PROGRESS_PATTERN)) {
        percentage = parseFloat(match[1]);
    }
    if (percentage === null || Number.isNaN(percentage)) return null;
    return Math.min(1, Math.max(0, percentage / 100));
}

/**
 * Parse `--print` search output, one candidate per line.
 * yt-dlp prints "NA" for missing fields; titles may themselves contain the separator.
 */
export function parseSearchOutput(output: string): SearchCandidate[] {
    const candidates: SearchCandidate[] = [];

    for (const line of output.split(/\r?\n/)) {
        const parts = line.trim().split(SEARCH_FIELD_SEPARATOR);
        if (parts.length < 5) continue;

        const [id, uploader, duration, thumbnail] = parts.slice(-4);
        const title = parts.slice(0, -4).join(SEARCH_FIELD_SEPARATOR);
        if (!id || id === 'NA') continue;

        const seconds = Number(duration);
        candidates.push({
            title,
            artist: uploader && uploader !== 'NA' ? uploader : 'Unknown',
            duration: duration !== '' && Number.isFinite(seconds) ? Math.floor(seconds) : duration,
            locator: toWatchUrl(id),
            thumbnailUrl: thumbnail && thumbnail !== 'NA' ? thumbnail : '',
        });
    }

    return candidates;
}

export class YtDlpProvider extends BaseProvider {
    readonly name = 'yt-dlp';

    private readonly binaries: BinaryManager;
    private readonly timeout: number;

    constructor(binaries: BinaryManager, options: { timeout?: number } = {}) {
        super();
        this.binaries = binaries;
        this.timeout = options.timeout || 180000; // 3 minutes
    }

    async isAvailable(): Promise<boolean> {
        try {
            return await this.binaries.isPrepared();
        } catch (error) {
            logger.warn(`[${this.name}] Binary preparation failed`, { error: errorMessage(error) });
            return false;
        }
    }

    async download(
        request: FetchRequest,
        onProgress: ProgressCallback,
        signal?: AbortSignal,
    ): Promise<void> {
        this.throwIfAborted(signal);
        const paths = await this.requireBinaries();
        const args = buildDownloadArgs(
            { ...request, locator: this.toUrl(request.locator) },
            paths.binDirectory,
        );

        await this.executeWithTracking(async () => {
            await this.runProcess(paths.ytDlp, args, {
                signal,
                timeoutMs: this.timeout,
                onStdout: (text) => {
                    const fraction = parseProgress(text);
                    if (fraction !== null) onProgress(fraction);
                },
            });

            if (!(await fileExists(request.outputPath))) {
                throw this.fail('invocation', 'yt-dlp exited cleanly but produced no output file');
            }
        }, 'download');
    }

    async search(query: string, limit: number, signal?: AbortSignal): Promise<SearchCandidate[]> {
        this.throwIfAborted(signal);
        const paths = await this.requireBinaries();

        return this.executeWithTracking(async () => {
            const output = await this.runProcess(paths.ytDlp, buildSearchArgs(query, limit), {
                signal,
                timeoutMs: this.timeout,
            });
            return parseSearchOutput(output);
        }, 'search');
    }

    private async requireBinaries(): Promise<BinaryPaths> {
        let paths: BinaryPaths | null;
        try {
            paths = await this.binaries.prepare();
        } catch (error) {
            throw this.fail('init', `Binary preparation failed: ${errorMessage(error)}`);
        }
        if (!paths) {
            throw this.fail('init', 'yt-dlp binary is not available');
        }
        return paths;
    }

    /**
     * Bare video ids become watch URLs; anything else must be an http(s) URL
     */
    private toUrl(locator: string): string {
        const videoId = extractVideoId(locator);
        if (videoId) return toWatchUrl(videoId);

        const parsed = UrlSchema.safeParse(locator);
        if (!parsed.success) {
            throw this.fail('invocation', `Unsupported locator: ${locator}`);
        }
        return parsed.data;
    }

    /**
     * Execute yt-dlp; resolves with stdout on exit code 0
     */
    private runProcess(binary: string, args: string[], options: RunOptions): Promise<string> {
        return new Promise((resolve, reject) => {
            let output = '';
            let errorOutput = '';
            let timer: NodeJS.Timeout | undefined;
            let onAbort: (() => void) | undefined;

            const latch = new CompletionLatch<string | ProviderError>((outcome) => {
                clearTimeout(timer);
                if (onAbort) options.signal?.removeEventListener('abort', onAbort);
                if (outcome instanceof ProviderError) {
                    reject(outcome);
                } else {
                    resolve(outcome);
                }
            });

            let proc: ChildProcessByStdio<null, Readable, Readable>;
            try {
                proc = spawn(binary, args, {
                    stdio: ['ignore', 'pipe', 'pipe'],
                    windowsHide: true,
                });
            } catch (error) {
                latch.settle(this.fail('init', errorMessage(error)));
                return;
            }

            proc.stdout.on('data', (data: Buffer) => {
                const text = data.toString();
                output += text;
                options.onStdout?.(text);
            });

            proc.stderr.on('data', (data: Buffer) => {
                errorOutput += data.toString();
            });

            proc.on('error', (error: NodeJS.ErrnoException) => {
                const kind = error.code === 'ENOENT' || error.code === 'EACCES' ? 'init' : 'invocation';
                latch.settle(this.fail(kind, error.message));
            });

            proc.on('close', (code: number | null) => {
                if (code === 0) {
                    latch.settle(output);
                } else {
                    const reason = lastLine(errorOutput) || `yt-dlp exited with code ${code}`;
                    latch.settle(this.fail('invocation', reason));
                }
            });

            timer = setTimeout(() => {
                proc.kill('SIGKILL');
                latch.settle(this.fail('invocation', `Timed out after ${options.timeoutMs}ms`));
            }, options.timeoutMs);

            onAbort = () => {
                proc.kill('SIGKILL');
                latch.settle(this.fail('aborted', 'Operation cancelled'));
            };
            if (options.signal?.aborted) {
                onAbort();
            } else {
                options.signal?.addEventListener('abort', onAbort, { once: true });
            }
        });
    }
}

function lastLine(text: string): string {
    const lines = text.trim().split(/\r?\n/);
    return lines[lines.length - 1] ?? '';
}

async function fileExists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}
