import { FileManager } from '../utils/FileManager';
import { AppEvents, EventBus, eventBus as defaultEventBus } from '../utils/EventBus';
import { logError, logger, toError } from '../utils/logger';
import { extractFirstNumber, formatVolumeName } from '../utils/logicHelpers';
import { CategoryNode } from './CategoryNode';
import { PreferenceStore } from './PreferenceStore';
import { ProblemInfo } from './ProblemInfo';
import {
  CategoryIndex,
  CategoryIndexSchema,
  CategoryNodeSchema,
  ProblemPayloadSchema,
  ProblemRow,
} from './schemas';

export const NODE_ROOT = 'Root';
export const VOLUMES_ROOT = 'Volumes';

/**
 * One immutable generation of the in-memory indices
 */
export interface DatabaseSnapshot {
  readonly problemList: readonly ProblemInfo[];
  readonly problemsByNumber: ReadonlyMap<number, ProblemInfo>;
  readonly idToNumber: ReadonlyMap<number, number>;
  readonly categoryRoot: CategoryNode;
}

/**
 * Runs a job off the caller's turn. Throws when the job cannot be scheduled.
 */
export type BackgroundScheduler = (job: () => void) => void;

export interface LoadOptions {
  background?: boolean;
}

export interface ProblemDatabaseOptions {
  scheduler?: BackgroundScheduler;
  eventBus?: EventBus;
}

const defaultScheduler: BackgroundScheduler = (job) => {
  setImmediate(job);
};

function createRoot(): CategoryNode {
  return new CategoryNode(NODE_ROOT, 'All Categories');
}

function emptySnapshot(): DatabaseSnapshot {
  return {
    problemList: [],
    problemsByNumber: new Map<number, ProblemInfo>(),
    idToNumber: new Map<number, number>(),
    categoryRoot: createRoot(),
  };
}

/**
 * ProblemDatabase - Turns the cached payload into in-memory indices
 *
 * Every load builds a complete new snapshot and publishes it with a single
 * assignment, so readers see either the old generation or the new one.
 */
export class ProblemDatabase {
  private snapshot: DatabaseSnapshot = emptySnapshot();
  private ready = true;
  private available = false;

  private readonly fileManager: FileManager;
  private readonly preferences: PreferenceStore;
  private readonly scheduler: BackgroundScheduler;
  private readonly eventBus: EventBus;

  constructor(
    fileManager: FileManager,
    preferences: PreferenceStore,
    options: ProblemDatabaseOptions = {},
  ) {
    this.fileManager = fileManager;
    this.preferences = preferences;
    this.scheduler = options.scheduler ?? defaultScheduler;
    this.eventBus = options.eventBus ?? defaultEventBus;
  }

  // ==========================================================================
  // Loading
  // ==========================================================================

  /**
   * Load the database from the downloaded payload.
   *
   * A request arriving while a load runs is dropped. A background request
   * that cannot be scheduled runs inline on the caller instead.
   */
  async load(options: LoadOptions = {}): Promise<void> {
    if (!this.ready) {
      logger.debug('Database load already in progress, request dropped');
      return;
    }

    // reserved here so a dispatched load cannot be overtaken before it runs
    this.ready = false;

    if (options.background && this.dispatch()) {
      return;
    }

    await this.runLoad();
  }

  /**
   * Rebuild the category tree on top of the current problem list
   */
  async reloadCategories(): Promise<void> {
    if (!this.ready) {
      logger.debug('Database load already in progress, category reload dropped');
      return;
    }
    this.ready = false;
    try {
      const current = this.snapshot;
      const root = this.buildCategoryRoot(current.problemList);
      await this.mergeCategories(root);
      this.snapshot = { ...current, categoryRoot: root };
    } finally {
      this.ready = true;
    }
    this.publishUpdate(AppEvents.CATEGORY_DATA_UPDATED);
  }

  private dispatch(): boolean {
    try {
      this.scheduler(() => {
        this.runLoad().catch((error) => {
          logError(toError(error), { operation: 'ProblemDatabase.backgroundLoad' });
        });
      });
      return true;
    } catch (error) {
      logger.warn('Background load could not be scheduled, loading inline', {
        error: toError(error).message,
      });
      return false;
    }
  }

  /**
   * Caller must have cleared `ready` before calling
   */
  private async runLoad(): Promise<void> {
    try {
      const rows = await this.readProblemPayload();
      const next = await this.buildSnapshot(rows);
      this.applyFavorites(next.problemsByNumber);
      await this.mergeCategories(next.categoryRoot);

      this.snapshot = next;
      this.available = true;
      logger.info('📚 Problem database loaded', {
        problems: next.problemsByNumber.size,
        categories: next.categoryRoot.branches.length,
      });
    } catch (error) {
      logError(toError(error), { operation: 'ProblemDatabase.load' });
      if (!this.available) {
        this.eventBus.publish(AppEvents.DOWNLOAD_REQUESTED, {
          resource: 'problem-database',
          reason: 'Problem database could not be loaded',
        });
      }
    } finally {
      this.ready = true;
    }

    this.publishUpdate(AppEvents.CATEGORY_DATA_UPDATED);
    this.publishUpdate(AppEvents.PROBLEM_DATABASE_UPDATED);
  }

  private async readProblemPayload(): Promise<ProblemRow[]> {
    const text = await this.fileManager.readText(this.fileManager.getProblemInfoFile());
    return ProblemPayloadSchema.parse(JSON.parse(text));
  }

  private async buildSnapshot(rows: ProblemRow[]): Promise<DatabaseSnapshot> {
    const problemList = rows.map((row) => new ProblemInfo(row));
    const problemsByNumber = new Map<number, ProblemInfo>();
    const idToNumber = new Map<number, number>();

    for (const problem of problemList) {
      // sequential: at most one stat in flight
      problem.fileSize = await this.fileManager.getFileSize(
        this.fileManager.getProblemHtmlFile(problem.pnum),
      );
      problemsByNumber.set(problem.pnum, problem);
      if (!idToNumber.has(problem.pid)) {
        idToNumber.set(problem.pid, problem.pnum);
      }
    }

    return {
      problemList,
      problemsByNumber,
      idToNumber,
      categoryRoot: this.buildCategoryRoot(problemList),
    };
  }

  /**
   * New root holding the "Volumes" subtree, one node per volume in first-seen order
   */
  private buildCategoryRoot(problemList: readonly ProblemInfo[]): CategoryNode {
    const root = createRoot();
    const volumes = root.addBranch(new CategoryNode(VOLUMES_ROOT, 'Problem list by volumes'));
    const byVolume = new Map<number, CategoryNode>();

    for (const problem of problemList) {
      let node = byVolume.get(problem.volume);
      if (!node) {
        node = volumes.addBranch(new CategoryNode(formatVolumeName(problem.volume)));
        byVolume.set(problem.volume, node);
      }
      if (!node.problems.some((p) => p.pnum === problem.pnum)) {
        node.problems.push({ pnum: problem.pnum });
      }
    }

    return root;
  }

  private applyFavorites(problemsByNumber: ReadonlyMap<number, ProblemInfo>): void {
    for (const pnum of this.preferences.getFavoriteProblems()) {
      const problem = problemsByNumber.get(pnum);
      if (problem) {
        problem.marked = true;
      }
    }
  }

  // ==========================================================================
  // Categories
  // ==========================================================================

  private async mergeCategories(root: CategoryNode): Promise<void> {
    const index = await this.readCategoryIndex();
    for (const [name, version] of Object.entries(index)) {
      if (await this.loadCategoryData(root, name)) {
        this.preferences.setCategoryVersion(name, version);
      }
    }

    try {
      await this.preferences.save();
    } catch (error) {
      logError(toError(error), { operation: 'PreferenceStore.save' });
    }
  }

  /**
   * Read the category index, empty when missing or unreadable
   */
  async readCategoryIndex(): Promise<CategoryIndex> {
    const file = this.fileManager.getCategoryIndexFile();
    if (!(await this.fileManager.fileExists(file))) {
      logger.debug('No category index cached yet', { path: file });
      return {};
    }
    try {
      return CategoryIndexSchema.parse(JSON.parse(await this.fileManager.readText(file)));
    } catch (error) {
      logError(toError(error), { operation: 'ProblemDatabase.readCategoryIndex' });
      return {};
    }
  }

  private async loadCategoryData(root: CategoryNode, filename: string): Promise<boolean> {
    try {
      const file = this.fileManager.getCategoryDataFile(filename);
      const raw = CategoryNodeSchema.parse(JSON.parse(await this.fileManager.readText(file)));
      const node = CategoryNode.fromJSON(raw);
      root.removeCategory(node.name);
      root.addBranch(node);
      return true;
    } catch (error) {
      logError(toError(error), { operation: 'ProblemDatabase.loadCategoryData', category: filename });
      return false;
    }
  }

  private publishUpdate(
    event: AppEvents.CATEGORY_DATA_UPDATED | AppEvents.PROBLEM_DATABASE_UPDATED,
  ): void {
    const snapshot = this.snapshot;
    this.eventBus.publish(event, {
      problemCount: snapshot.problemsByNumber.size,
      categoryCount: snapshot.categoryRoot.branches.length,
    });
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  getSnapshot(): DatabaseSnapshot {
    return this.snapshot;
  }

  /**
   * False while a load is running
   */
  isReady(): boolean {
    return this.ready;
  }

  /**
   * True once a load has succeeded
   */
  isAvailable(): boolean {
    return this.available;
  }

  hasProblem(pnum: number): boolean {
    return this.snapshot.problemsByNumber.has(pnum);
  }

  getProblem(pnum: number): ProblemInfo | undefined {
    return this.snapshot.problemsByNumber.get(pnum);
  }

  getTitle(pnum: number): string {
    return this.getProblem(pnum)?.title ?? '-';
  }

  getProblemId(pnum: number): number {
    return this.getProblem(pnum)?.pid ?? 0;
  }

  /**
   * Problem number for a problem id, 0 when unknown
   */
  getNumber(pid: number): number {
    return this.snapshot.idToNumber.get(pid) ?? 0;
  }

  /**
   * Problem number named by a file, -1 when it names no known problem
   */
  getProblemNumber(fileName: string): number {
    const pnum = extractFirstNumber(fileName);
    return pnum >= 0 && this.hasProblem(pnum) ? pnum : -1;
  }
}
