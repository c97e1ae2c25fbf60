import { z } from 'zod';
import { logger, errorMessage } from '../utils/logger';
import { withTimeout } from '../utils/asyncHelpers';
import { MetadataMatch, MetadataProvider } from './MetadataProvider';

const API_BASE = 'https://musicbrainz.org/ws/2';
const COVER_ART_BASE = 'https://coverartarchive.org/release';
const USER_AGENT = 'trackfetch/1.0.0';
const RESULT_LIMIT = 5;

const RecordingSchema = z.object({
  id: z.string(),
  title: z.string(),
  length: z.number().nullish(),
  'artist-credit': z.array(z.object({ name: z.string() })).optional(),
  isrcs: z.array(z.string()).optional(),
  tags: z.array(z.object({ name: z.string(), count: z.number().optional() })).optional(),
  releases: z
    .array(
      z.object({
        id: z.string(),
        title: z.string(),
        date: z.string().optional(),
        media: z
          .array(
            z.object({
              position: z.number().optional(),
              track: z.array(z.object({ number: z.string() })).optional(),
            }),
          )
          .optional(),
      }),
    )
    .optional(),
});

const SearchResponseSchema = z.object({
  recordings: z.array(RecordingSchema),
});

type Recording = z.infer<typeof RecordingSchema>;

/**
 * Lucene phrase for the recording search syntax
 */
function phrase(value: string): string {
  return `"${value.replace(/(["\\])/g, '\\$1')}"`;
}

export function mapRecording(recording: Recording): MetadataMatch {
  const release = recording.releases?.[0];
  const medium = release?.media?.[0];
  const trackNumber = parseInt(medium?.track?.[0]?.number ?? '', 10);
  const year = release?.date?.slice(0, 4);
  const topTag = [...(recording.tags ?? [])].sort((a, b) => (b.count ?? 0) - (a.count ?? 0))[0];

  return {
    title: recording.title,
    artist: (recording['artist-credit'] ?? []).map((credit) => credit.name).join(', '),
    album: release?.title,
    durationSeconds: recording.length ? Math.round(recording.length / 1000) : undefined,
    year: year && /^\d{4}$/.test(year) ? year : undefined,
    genre: topTag?.name,
    trackNumber: Number.isNaN(trackNumber) ? undefined : trackNumber,
    discNumber: medium?.position,
    isrc: recording.isrcs?.[0],
    artworkUrl: release ? `${COVER_ART_BASE}/${release.id}/front-500` : undefined,
  };
}

/**
 * Metadata from the MusicBrainz recording search
 */
export class MusicBrainzProvider implements MetadataProvider {
  readonly name = 'musicbrainz';
  private readonly timeoutMs: number;

  constructor(options: { timeoutMs?: number } = {}) {
    this.timeoutMs = options.timeoutMs ?? 20000;
  }

  async bestMatch(title: string, artist: string, signal?: AbortSignal): Promise<MetadataMatch | null> {
    const query = `recording:${phrase(title)} AND artist:${phrase(artist)}`;
    const [match] = await this.searchRecordings(query, signal);
    return match ?? null;
  }

  async searchText(query: string, signal?: AbortSignal): Promise<MetadataMatch[]> {
    return this.searchRecordings(query, signal);
  }

  private async searchRecordings(query: string, signal?: AbortSignal): Promise<MetadataMatch[]> {
    const url = `${API_BASE}/recording?query=${encodeURIComponent(query)}&fmt=json&limit=${RESULT_LIMIT}`;

    try {
      const body = await withTimeout(async (requestSignal) => {
        const response = await fetch(url, {
          headers: { 'User-Agent': USER_AGENT, Accept: 'application/json' },
          signal: requestSignal,
        });
        if (!response.ok) {
          throw new Error(`HTTP ${response.status}: ${response.statusText}`);
        }
        return response.json();
      }, this.timeoutMs, 'metadata lookup', signal);

      const parsed = SearchResponseSchema.safeParse(body);
      if (!parsed.success) {
        logger.warn('MusicBrainz: unexpected response shape', { query });
        return [];
      }
      return parsed.data.recordings.map(mapRecording);
    } catch (error) {
      logger.warn('MusicBrainz: lookup failed', { query, error: errorMessage(error) });
      return [];
    }
  }
}
