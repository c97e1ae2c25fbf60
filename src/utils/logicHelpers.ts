/**
 * Pure Logic Helpers for trackfetch
 * Extracted for testability
 */

import { TrackDescriptor } from '../types';
import { sanitizeFilename } from '../download/security/FileSanitizer';

/**
 * Parse a duration into whole seconds.
 * Accepts a number of seconds or "SS", "M:SS", "H:MM:SS"; anything else is 0.
 */
export function parseDurationSeconds(value: number | string): number {
    if (typeof value === 'number') {
        return Number.isFinite(value) && value > 0 ? Math.floor(value) : 0;
    }

    const text = value.trim();
    if (!/^\d+(:\d+){0,2}$/.test(text)) return 0;

    const parts = text.split(':').map((part) => parseInt(part, 10));
    if (parts.length === 3) return parts[0] * 3600 + parts[1] * 60 + parts[2];
    if (parts.length === 2) return parts[0] * 60 + parts[1];
    return parts[0];
}

/**
 * Format seconds as "M:SS", or "H:MM:SS" from one hour up
 */
export function formatDuration(totalSeconds: number): string {
    const seconds = Math.max(0, Math.floor(totalSeconds));
    const h = Math.floor(seconds / 3600);
    const m = Math.floor((seconds % 3600) / 60);
    const s = String(seconds % 60).padStart(2, '0');
    return h > 0 ? `${h}:${String(m).padStart(2, '0')}:${s}` : `${m}:${s}`;
}

/**
 * Build a filename (without extension) from a pattern.
 * Placeholders: {artist} {title} {album} {year} {track} {disc} {playlist_index}
 * @param playlistIndex 1-based position of the track in its job
 */
export function generateFilename(
    track: TrackDescriptor,
    pattern: string,
    playlistIndex: number = 0,
): string {
    const filename = pattern
        .replace(/\{artist\}/g, () => track.artist)
        .replace(/\{title\}/g, () => track.title)
        .replace(/\{album\}/g, () => track.album || 'Unknown Album')
        .replace(/\{year\}/g, () => track.year || '0000')
        .replace(/\{track\}/g, () => String(track.trackNumber ?? 0))
        .replace(/\{disc\}/g, () => String(track.discNumber ?? 1))
        .replace(/\{playlist_index\}/g, () => String(playlistIndex).padStart(2, '0'));

    return sanitizeFilename(filename);
}
