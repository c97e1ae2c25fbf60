import * as NodeID3 from 'node-id3';
import { TrackDescriptor } from '../types';
import { FileSanitizer } from '../download/security/FileSanitizer';
import { withTimeout } from '../utils/asyncHelpers';
import { logger, errorMessage } from '../utils/logger';
import { TaggingSink } from './TaggingSink';

const ARTWORK_TIMEOUT_MS = 15000;

export function buildTags(track: TrackDescriptor, artwork?: { mime: string; data: Buffer }): NodeID3.Tags {
  const tags: NodeID3.Tags = {
    title: track.title,
    artist: track.artist,
    album: track.album || undefined,
    year: track.year,
    genre: track.genre,
    trackNumber: track.trackNumber !== undefined ? String(track.trackNumber) : undefined,
    partOfSet: track.discNumber !== undefined ? String(track.discNumber) : undefined,
    ISRC: track.isrc,
  };

  if (artwork) {
    tags.image = {
      mime: artwork.mime,
      type: { id: 3, name: 'front cover' },
      description: 'Cover',
      imageBuffer: artwork.data,
    };
  }

  return tags;
}

/**
 * ID3v2 tags for MPEG audio; other containers are left untouched
 */
export class Id3TaggingSink implements TaggingSink {
  private readonly sanitizer: FileSanitizer;
  private readonly artworkTimeoutMs: number;

  constructor(sanitizer: FileSanitizer = new FileSanitizer(), options: { artworkTimeoutMs?: number } = {}) {
    this.sanitizer = sanitizer;
    this.artworkTimeoutMs = options.artworkTimeoutMs ?? ARTWORK_TIMEOUT_MS;
  }

  async apply(filePath: string, track: TrackDescriptor): Promise<void> {
    try {
      const mimeType = await this.sanitizer.detectMimeType(filePath);
      if (mimeType !== 'audio/mpeg') {
        logger.debug('Skipping tags for non-MPEG file', { filePath, mimeType });
        return;
      }

      const artwork = track.artworkUrl ? await this.fetchArtwork(track.artworkUrl) : undefined;
      const result = NodeID3.update(buildTags(track, artwork), filePath);
      if (result !== true) {
        throw result;
      }
      logger.debug('🏷️ Tags written', { filePath, artwork: Boolean(artwork) });
    } catch (error) {
      logger.warn('Tagging failed', { filePath, error: errorMessage(error) });
    }
  }

  /**
   * Missing artwork is not an error
   */
  private async fetchArtwork(url: string): Promise<{ mime: string; data: Buffer } | undefined> {
    try {
      return await withTimeout(async (signal) => {
        const response = await fetch(url, { signal });
        if (!response.ok) {
          throw new Error(`HTTP ${response.status}`);
        }
        const mime = response.headers.get('content-type') ?? 'image/jpeg';
        return { mime, data: Buffer.from(await response.arrayBuffer()) };
      }, this.artworkTimeoutMs, 'artwork download');
    } catch (error) {
      logger.debug('Artwork unavailable', { url, error: errorMessage(error) });
      return undefined;
    }
  }
}
