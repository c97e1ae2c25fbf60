import { logger } from './logger';

const VIDEO_ID_PATTERN = /^[A-Za-z0-9_-]{11}$/;

const YOUTUBE_HOSTS = [
  /(^|\.)youtube\.com$/,
  /(^|\.)youtu\.be$/,
  /(^|\.)youtube-nocookie\.com$/,
];

/**
 * Extract the 11-character video id from a YouTube URL or a bare id.
 * Accepts watch, music, shorts, embed and youtu.be forms.
 */
export function extractVideoId(locator: string): string | null {
  const trimmed = locator.trim();
  if (VIDEO_ID_PATTERN.test(trimmed)) {
    return trimmed;
  }

  let url: URL;
  try {
    url = new URL(trimmed);
  } catch {
    return null;
  }

  if (url.protocol !== 'https:' && url.protocol !== 'http:') {
    return null;
  }

  const hostname = url.hostname.toLowerCase();
  if (!YOUTUBE_HOSTS.some((pattern) => pattern.test(hostname))) {
    return null;
  }

  let candidate: string | null = null;
  if (/(^|\.)youtu\.be$/.test(hostname)) {
    candidate = url.pathname.split('/')[1] ?? null;
  } else if (url.pathname === '/watch') {
    candidate = url.searchParams.get('v');
  } else {
    const match = url.pathname.match(/^\/(?:shorts|embed|live|v)\/([^/?#]+)/);
    candidate = match?.[1] ?? null;
  }

  return candidate && VIDEO_ID_PATTERN.test(candidate) ? candidate : null;
}

/**
 * Whether a track's source locator can be handed straight to a provider.
 * Anything else (a streaming-service page link, an empty string) needs a search.
 */
export function isPlayableLocator(locator: string | undefined): locator is string {
  if (!locator) return false;
  const playable = extractVideoId(locator) !== null;
  if (!playable) {
    logger.debug('Locator is not directly playable', { locator });
  }
  return playable;
}

/**
 * Canonical watch URL for a video id
 */
export function toWatchUrl(videoId: string): string {
  return `https://www.youtube.com/watch?v=${videoId}`;
}
