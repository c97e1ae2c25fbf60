/**
 * FileSanitizer - Validates downloaded audio files and sanitizes file names
 */

import fs, { FileHandle } from 'fs/promises';
import { logger, errorMessage } from '../../utils/logger';
import { FileValidation } from '../core/types';

// Anything smaller is an error page or a truncated stream, not a song
export const MIN_AUDIO_BYTES = 10 * 1024;

// Magic bytes for the audio containers the providers produce
const MAGIC_BYTES: Record<string, Buffer[]> = {
    'audio/mpeg': [Buffer.from([0x49, 0x44, 0x33])], // ID3
    'audio/webm': [Buffer.from([0x1A, 0x45, 0xDF, 0xA3])],
    'audio/ogg': [Buffer.from([0x4F, 0x67, 0x67, 0x53])],
    'audio/wav': [Buffer.from([0x52, 0x49, 0x46, 0x46])],
    'audio/flac': [Buffer.from([0x66, 0x4C, 0x61, 0x43])],
};

/**
 * Replace characters that are illegal in file names on common file systems
 */
export function sanitizeFilename(filename: string): string {
    return filename
        // Remove path traversal attempts
        .replace(/\.\./g, '')
        .replace(/[<>:"/\\|?*\x00-\x1F]/g, '_')
        // Remove leading/trailing dots and spaces
        .replace(/^[\s.]+|[\s.]+$/g, '')
        .substring(0, 200)
        .replace(/_+/g, '_')
        || 'download';
}

export class FileSanitizer {
    private readonly minBytes: number;

    constructor(minBytes: number = MIN_AUDIO_BYTES) {
        this.minBytes = minBytes;
    }

    /**
     * Validate a freshly downloaded file: it must exist, be large enough
     * and must not be an HTML page saved in place of audio.
     */
    async validateDownload(filePath: string): Promise<FileValidation> {
        try {
            const stats = await fs.stat(filePath);
            if (!stats.isFile()) {
                return { isValid: false, warnings: ['Path is not a file'] };
            }

            const actualSize = stats.size;
            if (actualSize < this.minBytes) {
                return {
                    isValid: false,
                    actualSize,
                    warnings: [`File too small (${actualSize} bytes, minimum ${this.minBytes})`],
                };
            }

            const mimeType = await this.detectMimeType(filePath);
            if (mimeType === 'text/html') {
                return {
                    isValid: false,
                    mimeType,
                    actualSize,
                    warnings: ['File is an HTML page, not audio'],
                };
            }

            const warnings: string[] = [];
            if (!mimeType) {
                warnings.push('Could not determine file type from content');
            }

            logger.debug('File validation passed', { filePath, mimeType, actualSize });
            return { isValid: true, mimeType: mimeType ?? undefined, actualSize, warnings };
        } catch (error) {
            return {
                isValid: false,
                warnings: [`File missing or unreadable: ${errorMessage(error)}`],
            };
        }
    }

    /**
     * Detect MIME type from file content (magic bytes)
     */
    async detectMimeType(filePath: string): Promise<string | null> {
        let handle: FileHandle | undefined;
        try {
            handle = await fs.open(filePath, 'r');
            const buffer = Buffer.alloc(32);
            const { bytesRead } = await handle.read(buffer, 0, 32, 0);
            const head = buffer.subarray(0, bytesRead);

            for (const [mimeType, signatures] of Object.entries(MAGIC_BYTES)) {
                for (const signature of signatures) {
                    if (head.subarray(0, signature.length).equals(signature)) {
                        return mimeType;
                    }
                }
            }

            // MPEG audio frame sync without an ID3 header
            if (head.length >= 2 && head[0] === 0xFF && (head[1] & 0xE0) === 0xE0) {
                return 'audio/mpeg';
            }

            // MP4/M4A ftyp box
            const ftypIndex = head.indexOf('ftyp');
            if (ftypIndex !== -1 && ftypIndex < 12) {
                return 'audio/mp4';
            }

            const text = head.toString('utf8').trimStart().toLowerCase();
            if (text.startsWith('<!doctype html') || text.startsWith('<html')) {
                return 'text/html';
            }

            return null;
        } catch {
            return null;
        } finally {
            await handle?.close();
        }
    }
}
