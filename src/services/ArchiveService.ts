import { ProblemDatabase } from '../database/ProblemDatabase';
import { PreferenceStore } from '../database/PreferenceStore';
import { isStale } from '../database/staleness';
import { ArchiveDownloader } from '../download/ArchiveDownloader';
import { AppConfig, DownloadCompleteData, DownloadRequestedData } from '../types';
import { AppEvents, EventBus, eventBus as defaultEventBus } from '../utils/EventBus';
import { FileManager } from '../utils/FileManager';
import { logError, logger, logOperation, toError } from '../utils/logger';

/**
 * ArchiveService - Keeps the local cache in step with the archive
 * Loads what is cached, refreshes whatever is stale and reloads after each download
 */
export class ArchiveService {
  private readonly pendingCategories = new Set<string>();
  private loadPending = false;
  private categoryReloadPending = false;
  private unsubscribers: Array<() => void> = [];

  constructor(
    private readonly config: AppConfig,
    private readonly fileManager: FileManager,
    private readonly database: ProblemDatabase,
    private readonly downloader: ArchiveDownloader,
    private readonly preferences: PreferenceStore,
    private readonly eventBus: EventBus = defaultEventBus,
  ) {}

  /**
   * Load the cached database, then refresh stale files
   */
  async start(): Promise<void> {
    if (this.unsubscribers.length === 0) {
      this.unsubscribers = [
        this.eventBus.subscribe(AppEvents.DOWNLOAD_REQUESTED, (data) => this.handleDownloadRequested(data)),
        this.eventBus.subscribe(AppEvents.DOWNLOAD_COMPLETED, (data) => this.handleDownloadCompleted(data)),
        this.eventBus.subscribe(AppEvents.CATEGORY_DATA_UPDATED, () => this.flushPending()),
      ];
    }

    await this.database.load();
    await this.updateIfStale();
  }

  /**
   * Download the problem payload and the category index when they are stale
   */
  async updateIfStale(now: number = Date.now()): Promise<void> {
    const problemFile = this.fileManager.getProblemInfoFile();
    if (
      await isStale(this.fileManager, problemFile, {
        maxAgeMs: this.config.problemMaxAgeMs,
        minBytes: this.config.minCacheBytes,
      }, now)
    ) {
      logger.info('Problem database is stale, downloading', { path: problemFile });
      this.downloader.downloadProblemDatabase();
    }

    const indexFile = this.fileManager.getCategoryIndexFile();
    if (
      await isStale(this.fileManager, indexFile, {
        maxAgeMs: this.config.categoryIndexMaxAgeMs,
        minBytes: this.config.minCacheBytes,
      }, now)
    ) {
      logger.info('Category index is stale, downloading', { path: indexFile });
      this.downloader.downloadCategoryIndex();
    }
  }

  stop(): void {
    this.unsubscribers.forEach((unsubscribe) => unsubscribe());
    this.unsubscribers = [];
    this.downloader.stopAll();
    logOperation('Archive service stopped');
  }

  private handleDownloadRequested(data: DownloadRequestedData): void {
    logOperation('Download requested', { resource: data.resource, reason: data.reason, category: data.category });
    switch (data.resource) {
      case 'problem-database':
        this.downloader.downloadProblemDatabase();
        break;
      case 'category-index':
        this.downloader.downloadCategoryIndex();
        break;
      case 'category-data':
        if (data.category) {
          this.requestCategory(data.category);
        }
        break;
    }
  }

  private handleDownloadCompleted(data: DownloadCompleteData): void {
    if (!data.success) {
      logger.warn('Archive download failed', {
        resource: data.resource,
        url: data.url,
        error: data.error,
      });
    }

    switch (data.resource) {
      case 'problem-database':
        if (data.success) {
          this.scheduleLoad();
        }
        break;
      case 'category-index':
        if (data.success) {
          this.run(this.refreshCategories(), 'refresh categories');
        }
        break;
      case 'category-data':
        if (data.category) {
          this.pendingCategories.delete(data.category);
        }
        if (this.pendingCategories.size === 0) {
          this.scheduleCategoryReload();
        }
        break;
    }
  }

  /**
   * Download every category whose cached version differs from the index
   */
  private async refreshCategories(): Promise<void> {
    const index = await this.database.readCategoryIndex();
    const outdated: string[] = [];
    for (const [name, version] of Object.entries(index)) {
      const cached = await this.fileManager.fileExists(this.fileManager.getCategoryDataFile(name));
      if (!cached || this.preferences.getCategoryVersion(name) !== version) {
        outdated.push(name);
      }
    }

    if (outdated.length === 0) {
      this.scheduleCategoryReload();
      return;
    }

    logger.info('Downloading updated categories', { count: outdated.length });
    outdated.forEach((name) => this.requestCategory(name));
  }

  /**
   * The database drops requests while it is busy, so hold them until it reports back
   */
  private scheduleLoad(): void {
    if (!this.database.isReady()) {
      this.loadPending = true;
      return;
    }
    this.run(this.database.load({ background: true }), 'reload database');
  }

  private scheduleCategoryReload(): void {
    if (!this.database.isReady()) {
      this.categoryReloadPending = true;
      return;
    }
    this.run(this.database.reloadCategories(), 'reload categories');
  }

  private flushPending(): void {
    if (this.loadPending) {
      // a full load merges the categories as well
      this.loadPending = false;
      this.categoryReloadPending = false;
      this.scheduleLoad();
    } else if (this.categoryReloadPending) {
      this.categoryReloadPending = false;
      this.scheduleCategoryReload();
    }
  }

  private requestCategory(name: string): void {
    this.pendingCategories.add(name);
    this.downloader.downloadCategoryData(name);
  }

  private run(job: Promise<void>, operation: string): void {
    job.catch((error) => {
      logError(toError(error), { operation });
    });
  }
}
