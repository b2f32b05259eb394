import { PreferenceStore } from '../../src/database/PreferenceStore';

export class MemoryPreferenceStore implements PreferenceStore {
  readonly versions = new Map<string, number>();
  saves = 0;
  failSave = false;

  constructor(private readonly favorites: number[] = []) {}

  getFavoriteProblems(): readonly number[] {
    return this.favorites;
  }

  getCategoryVersion(name: string): number | undefined {
    return this.versions.get(name);
  }

  setCategoryVersion(name: string, version: number): void {
    this.versions.set(name, version);
  }

  async save(): Promise<void> {
    this.saves++;
    if (this.failSave) {
      throw new Error('Disk full');
    }
  }
}
