import fs from 'fs/promises';
import os from 'os';
import path from 'path';
import { JsonPreferenceStore } from '../src/database/PreferenceStore';
import { FileManager } from '../src/utils/FileManager';

describe('JsonPreferenceStore', () => {
  let tempDir: string;
  let fileManager: FileManager;

  beforeEach(async () => {
    tempDir = await fs.mkdtemp(path.join(os.tmpdir(), 'prefs-'));
    fileManager = new FileManager(tempDir);
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should start empty without a file', async () => {
    const store = new JsonPreferenceStore(fileManager);
    await store.load();

    expect(store.getFavoriteProblems()).toEqual([]);
    expect(store.getCategoryVersion('dp')).toBeUndefined();
  });

  it('should fall back to defaults for an invalid file', async () => {
    await fs.writeFile(fileManager.getPreferencesFile(), '{"favorites": "all"}');
    const store = new JsonPreferenceStore(fileManager);
    await store.load();

    expect(store.getFavoriteProblems()).toEqual([]);
  });

  it('should persist changes and read them back', async () => {
    const store = new JsonPreferenceStore(fileManager);
    store.setFavorite(100, true);
    store.setFavorite(101, true);
    store.setFavorite(100, false);
    store.setCategoryVersion('dp', 3);
    await store.save();

    const reloaded = new JsonPreferenceStore(fileManager);
    await reloaded.load();

    expect(reloaded.getFavoriteProblems()).toEqual([101]);
    expect(reloaded.getCategoryVersion('dp')).toBe(3);
  });

  it('should not write when nothing changed', async () => {
    const store = new JsonPreferenceStore(fileManager);
    await store.save();

    expect(await fileManager.fileExists(fileManager.getPreferencesFile())).toBe(false);
  });
});
