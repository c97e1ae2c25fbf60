import fs from 'fs/promises';
import path from 'path';
import { Innertube } from 'youtubei.js';
import {
  InnertubeProvider,
  preferredContainer,
  rankAudioVariants,
  toSearchCandidates,
} from '../src/download/providers/InnertubeProvider';
import { ProviderError } from '../src/download/core/types';
import { makeTempDir, removeDir } from './helpers/tmp';

jest.mock('youtubei.js', () => ({
  Innertube: { create: jest.fn() },
}));

const createMock = Innertube.create as unknown as jest.Mock;

const ID = 'AbCdEfGhIj0';

function audioFormat(mimeType: string, bitrate: number, url: string, contentLength = 20000) {
  return {
    itag: bitrate,
    mime_type: mimeType,
    bitrate,
    content_length: contentLength,
    has_audio: true,
    has_video: false,
    decipher: jest.fn().mockResolvedValue(url),
  };
}

async function rejection(promise: Promise<unknown>): Promise<ProviderError> {
  try {
    await promise;
  } catch (error) {
    if (error instanceof ProviderError) return error;
    throw error;
  }
  throw new Error('Expected a rejection');
}

describe('InnertubeProvider helpers', () => {
  it('should prefer webm for opus and mp4 otherwise', () => {
    expect(preferredContainer('opus')).toBe('audio/webm');
    expect(preferredContainer('mp3')).toBe('audio/mp4');
    expect(preferredContainer('m4a')).toBe('audio/mp4');
  });

  it('should rank the preferred container first, then by bitrate', () => {
    const variants = [
      { itag: 1, mimeType: 'audio/webm; codecs="opus"', bitrate: 160000, contentLength: 1 },
      { itag: 2, mimeType: 'audio/mp4; codecs="mp4a.40.2"', bitrate: 48000, contentLength: 1 },
      { itag: 3, mimeType: 'audio/mp4; codecs="mp4a.40.2"', bitrate: 128000, contentLength: 1 },
    ];

    expect(rankAudioVariants(variants, 'audio/mp4').map((variant) => variant.itag)).toEqual([3, 2, 1]);
    expect(rankAudioVariants(variants, 'audio/webm').map((variant) => variant.itag)).toEqual([1, 3, 2]);
  });

  it('should map video nodes and drop everything else', () => {
    const nodes = [
      {
        id: ID,
        title: { text: 'Song' },
        author: { name: 'Artist' },
        duration: { seconds: 200, text: '3:20' },
        thumbnails: [{ url: 'https://img.example/a.jpg' }, { url: 'https://img.example/b.jpg' }],
      },
      { type: 'Channel', name: 'Someone' },
      { id: 'ZyXwVuTsRq9', title: {} },
    ];

    expect(toSearchCandidates(nodes, 10)).toEqual([
      {
        title: 'Song',
        artist: 'Artist',
        duration: 200,
        locator: `https://www.youtube.com/watch?v=${ID}`,
        thumbnailUrl: 'https://img.example/a.jpg',
      },
      {
        title: '',
        artist: 'Unknown',
        duration: 0,
        locator: 'https://www.youtube.com/watch?v=ZyXwVuTsRq9',
        thumbnailUrl: '',
      },
    ]);
    expect(toSearchCandidates(nodes, 1)).toHaveLength(1);
  });
});

describe('InnertubeProvider', () => {
  let dir: string;
  let fetchSpy: jest.SpyInstance;

  beforeEach(async () => {
    jest.clearAllMocks();
    dir = await makeTempDir();
    fetchSpy = jest.spyOn(global, 'fetch').mockImplementation(async () => new Response(new Uint8Array(20000)));
  });

  afterEach(async () => {
    fetchSpy.mockRestore();
    await removeDir(dir);
  });

  it('should stream the best audio-only format to disk', async () => {
    const webm = audioFormat('audio/webm; codecs="opus"', 160000, 'https://media.example/webm');
    const mp4 = audioFormat('audio/mp4; codecs="mp4a.40.2"', 128000, 'https://media.example/mp4');
    const player = { id: 'player' };
    const client = {
      session: { player },
      getBasicInfo: jest.fn().mockResolvedValue({
        streaming_data: {
          adaptive_formats: [
            { ...audioFormat('video/mp4', 900000, 'https://media.example/video'), has_video: true },
            webm,
            mp4,
          ],
        },
      }),
    };
    createMock.mockResolvedValue(client);
    const outputPath = path.join(dir, 'song.mp3');
    const progress: number[] = [];

    await new InnertubeProvider().download(
      { locator: ID, outputPath, audioFormat: 'mp3' },
      (fraction) => progress.push(fraction),
    );

    expect(client.getBasicInfo).toHaveBeenCalledWith(ID);
    expect(mp4.decipher).toHaveBeenCalledWith(player);
    expect(webm.decipher).not.toHaveBeenCalled();
    expect(fetchSpy).toHaveBeenCalledTimes(1);
    expect(fetchSpy).toHaveBeenCalledWith(
      'https://media.example/mp4',
      expect.objectContaining({ headers: { Range: 'bytes=0-19999' } }),
    );
    expect((await fs.stat(outputPath)).size).toBe(20000);
    expect(progress[progress.length - 1]).toBe(1);
  });

  describe('response body release', () => {
    let reader: { read: jest.Mock; cancel: jest.Mock };

    beforeEach(() => {
      reader = {
        read: jest.fn().mockResolvedValue({ done: false, value: new Uint8Array(100) }),
        cancel: jest.fn().mockResolvedValue(undefined),
      };
      fetchSpy.mockResolvedValue({
        ok: true,
        status: 206,
        statusText: 'Partial Content',
        body: { getReader: () => reader },
      } as unknown as Response);
      createMock.mockResolvedValue({
        session: { player: {} },
        getBasicInfo: jest.fn().mockResolvedValue({
          streaming_data: {
            adaptive_formats: [audioFormat('audio/mp4; codecs="mp4a.40.2"', 128000, 'https://media.example/mp4')],
          },
        }),
      });
    });

    it('should cancel the reader when the read loop throws', async () => {
      const error = await rejection(
        new InnertubeProvider().download(
          { locator: ID, outputPath: path.join(dir, 'song.mp3'), audioFormat: 'mp3' },
          () => {
            throw new Error('listener failed');
          },
        ),
      );

      expect(error.message).toBe('[innertube] listener failed');
      expect(reader.cancel).toHaveBeenCalledTimes(1);
    });

    it('should cancel the reader when the stream ends early', async () => {
      reader.read.mockResolvedValue({ done: true, value: undefined });

      const error = await rejection(
        new InnertubeProvider().download(
          { locator: ID, outputPath: path.join(dir, 'song.mp3'), audioFormat: 'mp3' },
          () => undefined,
        ),
      );

      expect(error.message).toBe('[innertube] Stream ended early');
      expect(reader.cancel).toHaveBeenCalledTimes(1);
    });
  });

  it('should fail when no audio-only stream exists', async () => {
    createMock.mockResolvedValue({
      session: { player: {} },
      getBasicInfo: jest.fn().mockResolvedValue({ streaming_data: { adaptive_formats: [] } }),
    });

    const error = await rejection(
      new InnertubeProvider().download(
        { locator: ID, outputPath: path.join(dir, 'song.mp3'), audioFormat: 'mp3' },
        () => undefined,
      ),
    );

    expect(error.kind).toBe('invocation');
    expect(error.message).toBe('[innertube] No audio-only streams available');
  });

  it('should reject locators without a video id', async () => {
    const error = await rejection(
      new InnertubeProvider().download(
        { locator: 'https://example.com/track', outputPath: path.join(dir, 'song.mp3'), audioFormat: 'mp3' },
        () => undefined,
      ),
    );

    expect(error.kind).toBe('invocation');
    expect(createMock).not.toHaveBeenCalled();
  });

  it('should report an init error and retry the session next time', async () => {
    createMock.mockRejectedValueOnce(new Error('offline'));
    createMock.mockResolvedValueOnce({
      search: jest.fn().mockResolvedValue({ videos: [] }),
    });
    const provider = new InnertubeProvider();

    const error = await rejection(provider.search('artist song', 5));

    expect(error.kind).toBe('init');
    expect(error.message).toBe('[innertube] Could not start session: offline');
    await expect(provider.search('artist song', 5)).resolves.toEqual([]);
    expect(createMock).toHaveBeenCalledTimes(2);
  });

  it('should search for videos', async () => {
    const search = jest.fn().mockResolvedValue({
      videos: [{ id: ID, title: { text: 'Song' }, author: { name: 'Artist' }, duration: { seconds: 200 } }],
    });
    createMock.mockResolvedValue({ search });

    const results = await new InnertubeProvider().search('artist song', 5);

    expect(search).toHaveBeenCalledWith('artist song', { type: 'video' });
    expect(results).toEqual([
      {
        title: 'Song',
        artist: 'Artist',
        duration: 200,
        locator: `https://www.youtube.com/watch?v=${ID}`,
        thumbnailUrl: '',
      },
    ]);
  });
});
