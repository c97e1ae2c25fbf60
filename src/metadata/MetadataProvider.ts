import { TrackDescriptor } from '../types';

export interface MetadataMatch {
  title: string;
  artist: string;
  album?: string;
  durationSeconds?: number;
  year?: string;
  genre?: string;
  trackNumber?: number;
  discNumber?: number;
  isrc?: string;
  artworkUrl?: string;
}

export interface MetadataProvider {
  readonly name: string;

  /**
   * The single most likely match for a track, or null
   */
  bestMatch(title: string, artist: string, signal?: AbortSignal): Promise<MetadataMatch | null>;

  /**
   * Free-text search
   */
  searchText(query: string, signal?: AbortSignal): Promise<MetadataMatch[]>;
}

/**
 * Enrichment is needed when the release year or the track number is unknown
 */
export function needsEnrichment(track: TrackDescriptor): boolean {
  return !track.year || track.trackNumber === undefined;
}

/**
 * Copy of `track` with gaps filled from `match`. Present fields are never replaced.
 */
export function mergeMissing(track: TrackDescriptor, match: MetadataMatch): TrackDescriptor {
  return {
    ...track,
    album: track.album || match.album || '',
    durationSeconds: track.durationSeconds > 0 ? track.durationSeconds : match.durationSeconds ?? 0,
    year: track.year || match.year,
    genre: track.genre || match.genre,
    trackNumber: track.trackNumber ?? match.trackNumber,
    discNumber: track.discNumber ?? match.discNumber,
    isrc: track.isrc || match.isrc,
    artworkUrl: track.artworkUrl || match.artworkUrl,
  };
}
