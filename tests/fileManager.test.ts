import fs from 'fs/promises';
import path from 'path';
import { FileManager } from '../src/utils/FileManager';
import { makeTempDir, removeDir } from './helpers/tmp';

describe('FileManager', () => {
  let root: string;
  let manager: FileManager;

  beforeEach(async () => {
    root = await makeTempDir();
    manager = new FileManager(root);
  });

  afterEach(async () => {
    await removeDir(root);
  });

  it('should create a sanitized destination folder idempotently', async () => {
    const first = await manager.createDestinationDir('Best of: 2024');
    const second = await manager.createDestinationDir('Best of: 2024');

    expect(first).toBe(path.join(root, 'Best of_ 2024'));
    expect(second).toBe(first);
    expect((await fs.stat(first)).isDirectory()).toBe(true);
  });

  it('should report existence', async () => {
    const file = path.join(root, 'a.mp3');
    await fs.writeFile(file, 'abcd');

    await expect(manager.fileExists(file)).resolves.toBe(true);
    await expect(manager.fileExists(path.join(root, 'missing'))).resolves.toBe(false);
  });

  it('should delete files and ignore missing ones', async () => {
    const file = path.join(root, 'a.mp3');
    await fs.writeFile(file, 'abcd');

    await manager.deleteFile(file);
    await manager.deleteFile(file);

    await expect(manager.fileExists(file)).resolves.toBe(false);
  });
});
