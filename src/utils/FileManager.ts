import fs from 'fs/promises';
import path from 'path';
import { logger } from './logger';
import { sanitizeFilename } from '../download/security/FileSanitizer';

/**
 * FileManager - Owns the download root and the per-job destination folders
 */
export class FileManager {
  private readonly downloadRoot: string;

  constructor(downloadRoot: string) {
    this.downloadRoot = downloadRoot;
  }

  /**
   * Create (idempotently) the destination folder for a job.
   * Another process creating it first is not an error.
   */
  async createDestinationDir(folderName: string): Promise<string> {
    const dir = path.join(this.downloadRoot, sanitizeFilename(folderName));
    try {
      await fs.mkdir(dir, { recursive: true });
      return dir;
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'EEXIST') {
        return dir;
      }
      logger.error('Failed to create destination directory', { dir, error });
      throw error;
    }
  }

  /**
   * Delete a file; a missing file is not an error
   */
  async deleteFile(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
      logger.debug('🗑️ File deleted', { path: filePath });
    } catch (error: unknown) {
      if (isErrnoException(error) && error.code === 'ENOENT') return;
      logger.error('Failed to delete file', {
        path: filePath,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }
}

function isErrnoException(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
