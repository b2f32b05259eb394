import { FileManager } from '../utils/FileManager';
import { logger, toError } from '../utils/logger';
import { Preferences, PreferencesSchema } from './schemas';

/**
 * External user state the cache loader reads from and writes back to
 */
export interface PreferenceStore {
  getFavoriteProblems(): readonly number[];
  getCategoryVersion(name: string): number | undefined;
  setCategoryVersion(name: string, version: number): void;
  save(): Promise<void>;
}

/**
 * JsonPreferenceStore - PreferenceStore persisted as a JSON file
 */
export class JsonPreferenceStore implements PreferenceStore {
  private data: Preferences = { favorites: [], categoryVersions: {} };
  private dirty = false;
  private readonly filePath: string;

  constructor(private readonly fileManager: FileManager) {
    this.filePath = fileManager.getPreferencesFile();
  }

  /**
   * Load preferences from disk. A missing or invalid file yields defaults.
   */
  async load(): Promise<void> {
    if (!(await this.fileManager.fileExists(this.filePath))) {
      logger.debug('No preferences file, using defaults', { path: this.filePath });
      return;
    }
    try {
      const content = await this.fileManager.readText(this.filePath);
      this.data = PreferencesSchema.parse(JSON.parse(content));
      this.dirty = false;
      logger.info('💾 Preferences loaded', {
        favorites: this.data.favorites.length,
        categories: Object.keys(this.data.categoryVersions).length,
      });
    } catch (error) {
      logger.warn('Preferences file unreadable, using defaults', {
        path: this.filePath,
        error: toError(error).message,
      });
    }
  }

  getFavoriteProblems(): readonly number[] {
    return this.data.favorites;
  }

  setFavorite(pnum: number, marked: boolean): void {
    const has = this.data.favorites.includes(pnum);
    if (marked && !has) {
      this.data.favorites = [...this.data.favorites, pnum];
      this.dirty = true;
    } else if (!marked && has) {
      this.data.favorites = this.data.favorites.filter((n) => n !== pnum);
      this.dirty = true;
    }
  }

  getCategoryVersion(name: string): number | undefined {
    return this.data.categoryVersions[name];
  }

  setCategoryVersion(name: string, version: number): void {
    if (this.data.categoryVersions[name] === version) return;
    this.data.categoryVersions = { ...this.data.categoryVersions, [name]: version };
    this.dirty = true;
  }

  /**
   * Persist pending changes; no-op when nothing changed
   */
  async save(): Promise<void> {
    if (!this.dirty) return;
    await this.fileManager.writeText(this.filePath, JSON.stringify(this.data, null, 2));
    this.dirty = false;
    logger.debug('💾 Preferences saved', { path: this.filePath });
  }
}
