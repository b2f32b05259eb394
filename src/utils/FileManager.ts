import fs from 'fs/promises';
import path from 'path';
import { logger } from './logger';

/**
 * FileManager - Owns the local cache directory layout
 *
 *   <dataDir>/problems.json          problem payload
 *   <dataDir>/categories/INDEX       category index
 *   <dataDir>/categories/<name>.cat  one file per category
 *   <dataDir>/problems/<pnum>.html   problem statements
 *   <dataDir>/preferences.json       favourites and applied category versions
 */
export class FileManager {
  private readonly dataDir: string;

  constructor(dataDirectory: string = './data') {
    this.dataDir = dataDirectory;
  }

  /**
   * Initialize cache directories (create if they don't exist)
   */
  async initialize(): Promise<void> {
    try {
      await fs.mkdir(path.join(this.dataDir, 'categories'), { recursive: true });
      await fs.mkdir(path.join(this.dataDir, 'problems'), { recursive: true });
      logger.info('📁 Cache directory initialized', { path: this.dataDir });
    } catch (error) {
      logger.error('Failed to create cache directory', { error });
      throw error;
    }
  }

  getProblemInfoFile(): string {
    return path.join(this.dataDir, 'problems.json');
  }

  getCategoryIndexFile(): string {
    return path.join(this.dataDir, 'categories', 'INDEX');
  }

  getCategoryDataFile(name: string): string {
    return path.join(this.dataDir, 'categories', `${name}.cat`);
  }

  getProblemHtmlFile(pnum: number): string {
    return path.join(this.dataDir, 'problems', `${pnum}.html`);
  }

  getPreferencesFile(): string {
    return path.join(this.dataDir, 'preferences.json');
  }

  /**
   * Get file size in bytes, 0 when the file is missing
   */
  async getFileSize(filePath: string): Promise<number> {
    try {
      const stats = await fs.stat(filePath);
      return stats.size;
    } catch (error: unknown) {
      const err = error as NodeJS.ErrnoException;
      if (err.code !== 'ENOENT') {
        logger.error('Failed to get file size', { path: filePath, error: err.message });
      }
      return 0;
    }
  }

  /**
   * Get last-modified time in epoch millis, undefined when the file is missing
   */
  async getModifiedTime(filePath: string): Promise<number | undefined> {
    try {
      const stats = await fs.stat(filePath);
      return stats.mtimeMs;
    } catch {
      return undefined;
    }
  }

  /**
   * Check if file exists
   */
  async fileExists(filePath: string): Promise<boolean> {
    try {
      await fs.access(filePath);
      return true;
    } catch {
      return false;
    }
  }

  async readText(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf-8');
  }

  async writeText(filePath: string, content: string): Promise<void> {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(filePath, content, 'utf-8');
  }
}
