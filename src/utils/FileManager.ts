import fs from 'fs/promises';
import path from 'path';
import { logger } from './logger';

/**
 * FileManager - directory creation and file probing for the output tree
 */
export class FileManager {
  /**
   * Create a directory (and parents); succeeds when it already exists
   */
  async ensureDir(dirPath: string): Promise<string> {
    try {
      await fs.mkdir(dirPath, { recursive: true });
      return dirPath;
    } catch (error) {
      logger.error('Failed to create directory', {
        path: dirPath,
        error: (error as Error).message,
      });
      throw error;
    }
  }

  /**
   * Check that a directory can be created and written to
   */
  async isWritableDir(dirPath: string): Promise<boolean> {
    try {
      await this.ensureDir(dirPath);
      await fs.access(dirPath, fs.constants.W_OK);
      return true;
    } catch {
      return false;
    }
  }

  /**
   * Check if file exists. Only a missing path counts as absent; other
   * errors (ENAMETOOLONG, EACCES) are rethrown.
   */
  async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch (error: unknown) {
      const err = error as NodeJS.ErrnoException;
      if (err.code === 'ENOENT' || err.code === 'ENOTDIR') {
        return false;
      }
      throw error;
    }
  }

  /**
   * Return the first of the candidate paths that exists
   */
  async findFirstExisting(candidates: string[]): Promise<string | undefined> {
    for (const candidate of candidates) {
      if (await this.fileExists(candidate)) {
        return candidate;
      }
    }
    return undefined;
  }

  /**
   * Delete a file, ignoring files that are already gone
   */
  async deleteFile(filePath: string): Promise<void> {
    try {
      await fs.unlink(filePath);
    } catch (error: unknown) {
      const err = error as NodeJS.ErrnoException;
      if (err.code !== 'ENOENT') {
        logger.error('Failed to delete file', {
          path: filePath,
          error: err.message,
        });
      }
    }
  }

  /**
   * Replace a file with another one (same filesystem, atomic rename)
   */
  async replaceFile(sourcePath: string, targetPath: string): Promise<void> {
    await fs.rename(sourcePath, targetPath);
  }

  /**
   * Path of a sibling file sharing the stem of `filePath`
   */
  siblingPath(filePath: string, suffix: string): string {
    const parsed = path.parse(filePath);
    return path.join(parsed.dir, `${parsed.name}${suffix}`);
  }
}
