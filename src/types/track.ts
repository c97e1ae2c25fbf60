/**
 * Track-level domain types shared by the download pipeline
 */

export interface TrackDescriptor {
  readonly title: string;
  readonly artist: string;
  readonly album: string;
  readonly durationSeconds: number;
  readonly sourceLocator?: string;
  readonly artworkUrl?: string;
  readonly isrc?: string; // industry code, e.g. USRC17607839
  readonly year?: string;
  readonly genre?: string;
  readonly trackNumber?: number;
  readonly discNumber?: number;
}

export interface SearchCandidate {
  title: string;
  artist: string;
  duration: number | string; // seconds, or "M:SS" / "H:MM:SS"
  locator: string;
  thumbnailUrl: string;
}

export interface Job {
  tracks: readonly TrackDescriptor[];
  folderName: string;
  artworkUrl?: string;
}

export interface DownloadResult {
  success: boolean;
  filePath?: string;
  byteSize?: number;
  provider?: string;
  error?: string;
}
