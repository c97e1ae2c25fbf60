import fs from 'fs/promises';
import path from 'path';
import * as NodeID3 from 'node-id3';
import { Id3TaggingSink, buildTags } from '../src/tagging/Id3TaggingSink';
import { TrackDescriptor } from '../src/types';
import { makeTempDir, mp3Bytes, removeDir } from './helpers/tmp';

jest.mock('node-id3', () => ({
  update: jest.fn(() => true),
}));

const updateMock = NodeID3.update as unknown as jest.Mock;

const track: TrackDescriptor = {
  title: 'Song',
  artist: 'Artist',
  album: 'Album',
  durationSeconds: 200,
  year: '1999',
  genre: 'pop',
  trackNumber: 7,
  discNumber: 1,
  isrc: 'XX0000000001',
};

describe('buildTags', () => {
  it('should map track fields to ID3 frames', () => {
    expect(buildTags(track)).toEqual({
      title: 'Song',
      artist: 'Artist',
      album: 'Album',
      year: '1999',
      genre: 'pop',
      trackNumber: '7',
      partOfSet: '1',
      ISRC: 'XX0000000001',
    });
  });

  it('should attach artwork as the front cover', () => {
    const data = Buffer.from([1, 2, 3]);

    expect(buildTags({ ...track, album: '' }, { mime: 'image/png', data })).toMatchObject({
      album: undefined,
      image: { mime: 'image/png', type: { id: 3, name: 'front cover' }, description: 'Cover', imageBuffer: data },
    });
  });
});

describe('Id3TaggingSink', () => {
  let dir: string;

  beforeEach(async () => {
    jest.clearAllMocks();
    updateMock.mockReturnValue(true);
    dir = await makeTempDir();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  it('should tag MPEG files', async () => {
    const file = path.join(dir, 'song.mp3');
    await fs.writeFile(file, mp3Bytes(1024));

    await new Id3TaggingSink().apply(file, track);

    expect(updateMock).toHaveBeenCalledWith(buildTags(track), file);
  });

  it('should leave other containers untouched', async () => {
    const file = path.join(dir, 'song.opus');
    await fs.writeFile(file, Buffer.from('OggS0000000000000000'));

    await new Id3TaggingSink().apply(file, track);

    expect(updateMock).not.toHaveBeenCalled();
  });

  it('should not throw when the tag write fails', async () => {
    const file = path.join(dir, 'song.mp3');
    await fs.writeFile(file, mp3Bytes(1024));
    updateMock.mockReturnValue(new Error('file is locked'));

    await expect(new Id3TaggingSink().apply(file, track)).resolves.toBeUndefined();
  });

  it('should embed downloaded artwork', async () => {
    const file = path.join(dir, 'song.mp3');
    await fs.writeFile(file, mp3Bytes(1024));
    const fetchSpy = jest
      .spyOn(global, 'fetch')
      .mockResolvedValueOnce(
        new Response(new Uint8Array([9, 8, 7]), { status: 200, headers: { 'Content-Type': 'image/png' } }),
      );

    await new Id3TaggingSink().apply(file, { ...track, artworkUrl: 'https://img.example/cover.png' });

    expect(updateMock).toHaveBeenCalledWith(
      expect.objectContaining({ image: expect.objectContaining({ mime: 'image/png', imageBuffer: Buffer.from([9, 8, 7]) }) }),
      file,
    );
    fetchSpy.mockRestore();
  });

  it('should tag without artwork when the download fails', async () => {
    const file = path.join(dir, 'song.mp3');
    await fs.writeFile(file, mp3Bytes(1024));
    const fetchSpy = jest.spyOn(global, 'fetch').mockRejectedValueOnce(new Error('offline'));

    await new Id3TaggingSink().apply(file, { ...track, artworkUrl: 'https://img.example/cover.png' });

    expect(updateMock).toHaveBeenCalledWith(buildTags({ ...track, artworkUrl: 'https://img.example/cover.png' }), file);
    fetchSpy.mockRestore();
  });
});
