/**
 * BinaryManager - Installs the bundled yt-dlp / ffmpeg / ffprobe executables
 * into the binary directory once and resolves their paths.
 */

import fs from 'fs/promises';
import { constants } from 'fs';
import path from 'path';
import { logger, errorMessage } from '../../utils/logger';

export interface BinaryPaths {
    binDirectory: string;
    ytDlp: string;
    ffmpeg: string;
    ffprobe: string;
}

const BINARIES = ['yt-dlp', 'ffmpeg', 'ffprobe'] as const;
type BinaryName = (typeof BINARIES)[number];

/**
 * Name of the bundled asset for the running platform
 */
export function assetName(binary: BinaryName, platform: NodeJS.Platform = process.platform): string {
    if (platform === 'win32') return `${binary}.exe`;
    if (platform === 'darwin') return `${binary}_macos`;
    return `${binary}_linux`;
}

export function executableName(binary: BinaryName, platform: NodeJS.Platform = process.platform): string {
    return platform === 'win32' ? `${binary}.exe` : binary;
}

export class BinaryManager {
    private readonly binDirectory: string;
    private readonly bundledDirectory: string;
    private readonly platform: NodeJS.Platform;
    private preparing?: Promise<BinaryPaths | null>;

    constructor(
        binDirectory: string,
        bundledDirectory: string,
        platform: NodeJS.Platform = process.platform,
    ) {
        this.binDirectory = binDirectory;
        this.bundledDirectory = bundledDirectory;
        this.platform = platform;
    }

    /**
     * Install the binaries on first call; later calls share the same result.
     * Resolves null when yt-dlp cannot be made available.
     */
    prepare(): Promise<BinaryPaths | null> {
        if (!this.preparing) {
            this.preparing = this.install();
        }
        return this.preparing;
    }

    async isPrepared(): Promise<boolean> {
        return (await this.prepare()) !== null;
    }

    private async install(): Promise<BinaryPaths | null> {
        try {
            await fs.mkdir(this.binDirectory, { recursive: true });
        } catch (error) {
            logger.warn('Binary directory is not writable', {
                binDirectory: this.binDirectory,
                error: errorMessage(error),
            });
            return null;
        }

        const installed = new Map<BinaryName, boolean>();
        for (const binary of BINARIES) {
            installed.set(binary, await this.installOne(binary));
        }

        if (!installed.get('yt-dlp')) {
            logger.warn('yt-dlp is not available, process strategy disabled', {
                binDirectory: this.binDirectory,
            });
            return null;
        }
        if (!installed.get('ffmpeg')) {
            logger.warn('ffmpeg is not available, audio conversion may fail');
        }

        return {
            binDirectory: this.binDirectory,
            ytDlp: this.resolve('yt-dlp'),
            ffmpeg: this.resolve('ffmpeg'),
            ffprobe: this.resolve('ffprobe'),
        };
    }

    private resolve(binary: BinaryName): string {
        return path.join(this.binDirectory, executableName(binary, this.platform));
    }

    /**
     * An existing executable is never rewritten
     */
    private async installOne(binary: BinaryName): Promise<boolean> {
        const target = this.resolve(binary);
        if (await exists(target)) {
            return true;
        }

        const source = path.join(this.bundledDirectory, assetName(binary, this.platform));
        try {
            await fs.copyFile(source, target, constants.COPYFILE_EXCL);
            if (this.platform !== 'win32') {
                await fs.chmod(target, 0o755);
            }
            logger.info(`📦 Installed ${binary}`, { target });
            return true;
        } catch (error) {
            logger.warn(`Could not install ${binary}`, { source, error: errorMessage(error) });
            return exists(target);
        }
    }
}

async function exists(filePath: string): Promise<boolean> {
    try {
        await fs.access(filePath);
        return true;
    } catch {
        return false;
    }
}
