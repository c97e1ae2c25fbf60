import fs from 'fs/promises';
import path from 'path';
import { FileSanitizer, sanitizeFilename } from '../src/download/security/FileSanitizer';
import { makeTempDir, mp3Bytes, removeDir } from './helpers/tmp';

describe('FileSanitizer', () => {
  describe('sanitizeFilename', () => {
    it('should replace reserved characters', () => {
      expect(sanitizeFilename('AC/DC: Live?')).toBe('AC_DC_ Live_');
      expect(sanitizeFilename('a<b>c"d|e*f')).toBe('a_b_c_d_e_f');
    });

    it('should strip traversal and collapse underscores', () => {
      expect(sanitizeFilename('../../etc/passwd')).toBe('_etc_passwd');
    });

    it('should trim dots and spaces and never return an empty name', () => {
      expect(sanitizeFilename('  name. ')).toBe('name');
      expect(sanitizeFilename('...')).toBe('download');
    });

    it('should cap the length at 200 characters', () => {
      expect(sanitizeFilename('x'.repeat(300))).toHaveLength(200);
    });
  });

  describe('validateDownload', () => {
    const sanitizer = new FileSanitizer();
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeDir(dir);
    });

    it('should reject files under the minimum size', async () => {
      const file = path.join(dir, 'small.mp3');
      await fs.writeFile(file, mp3Bytes(500));

      await expect(sanitizer.validateDownload(file)).resolves.toEqual({
        isValid: false,
        actualSize: 500,
        warnings: ['File too small (500 bytes, minimum 10240)'],
      });
    });

    it('should accept a large enough MPEG file', async () => {
      const file = path.join(dir, 'song.mp3');
      await fs.writeFile(file, mp3Bytes(20 * 1024));

      await expect(sanitizer.validateDownload(file)).resolves.toEqual({
        isValid: true,
        mimeType: 'audio/mpeg',
        actualSize: 20480,
        warnings: [],
      });
    });

    it('should reject an HTML page saved in place of audio', async () => {
      const file = path.join(dir, 'page.mp3');
      await fs.writeFile(file, `<!DOCTYPE html><html>${' '.repeat(20 * 1024)}</html>`);

      const result = await sanitizer.validateDownload(file);
      expect(result.isValid).toBe(false);
      expect(result.mimeType).toBe('text/html');
    });

    it('should accept unknown content with a warning', async () => {
      const file = path.join(dir, 'unknown.bin');
      await fs.writeFile(file, Buffer.alloc(20 * 1024));

      await expect(sanitizer.validateDownload(file)).resolves.toEqual({
        isValid: true,
        mimeType: undefined,
        actualSize: 20480,
        warnings: ['Could not determine file type from content'],
      });
    });

    it('should report a missing file as invalid', async () => {
      const result = await sanitizer.validateDownload(path.join(dir, 'missing.mp3'));
      expect(result.isValid).toBe(false);
      expect(result.warnings[0]).toMatch(/^File missing or unreadable: /);
    });

    it('should honour a custom minimum', async () => {
      const file = path.join(dir, 'tiny.mp3');
      await fs.writeFile(file, mp3Bytes(500));

      const result = await new FileSanitizer(100).validateDownload(file);
      expect(result.isValid).toBe(true);
    });
  });

  describe('detectMimeType', () => {
    const sanitizer = new FileSanitizer();
    let dir: string;

    beforeEach(async () => {
      dir = await makeTempDir();
    });

    afterEach(async () => {
      await removeDir(dir);
    });

    it('should detect MP4 from the ftyp box', async () => {
      const file = path.join(dir, 'a.m4a');
      await fs.writeFile(file, Buffer.from([0, 0, 0, 0x20, 0x66, 0x74, 0x79, 0x70, 0x4d, 0x34, 0x41, 0x20]));
      await expect(sanitizer.detectMimeType(file)).resolves.toBe('audio/mp4');
    });

    it('should detect MPEG frame sync without ID3', async () => {
      const file = path.join(dir, 'a.mp3');
      await fs.writeFile(file, Buffer.from([0xff, 0xfb, 0x90, 0x00]));
      await expect(sanitizer.detectMimeType(file)).resolves.toBe('audio/mpeg');
    });

    it('should detect WebM', async () => {
      const file = path.join(dir, 'a.webm');
      await fs.writeFile(file, Buffer.from([0x1a, 0x45, 0xdf, 0xa3, 0x01]));
      await expect(sanitizer.detectMimeType(file)).resolves.toBe('audio/webm');
    });

    it('should return null for a missing file', async () => {
      await expect(sanitizer.detectMimeType(path.join(dir, 'none'))).resolves.toBeNull();
    });
  });
});
