import fs from 'fs/promises';
import os from 'os';
import path from 'path';

export async function makeTempDir(): Promise<string> {
  return fs.mkdtemp(path.join(os.tmpdir(), 'trackfetch-test-'));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.rm(dir, { recursive: true, force: true });
}

/**
 * Bytes that look like an MP3 with an ID3 header
 */
export function mp3Bytes(size: number): Buffer {
  const buffer = Buffer.alloc(size);
  buffer.write('ID3', 0, 'latin1');
  return buffer;
}
