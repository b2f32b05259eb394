/**
 * ArchiveDownloader - Downloads the archive's cached resources
 * Keeps at most one running task per URL and announces every finished task on the EventBus
 */

import { AppConfig, ArchiveResource } from '../types';
import { AppEvents, EventBus, eventBus as defaultEventBus } from '../utils/EventBus';
import { FileManager } from '../utils/FileManager';
import { logger } from '../utils/logger';
import { HttpClient, TaskMonitor } from './core/types';
import { FileDownloadTask } from './tasks/FileDownloadTask';

export class ArchiveDownloader {
    private readonly config: AppConfig;
    private readonly client: HttpClient;
    private readonly fileManager: FileManager;
    private readonly eventBus: EventBus;
    private readonly tasks = new Map<string, FileDownloadTask>();

    constructor(
        config: AppConfig,
        client: HttpClient,
        fileManager: FileManager,
        eventBus: EventBus = defaultEventBus,
    ) {
        this.config = config;
        this.client = client;
        this.fileManager = fileManager;
        this.eventBus = eventBus;
    }

    downloadProblemDatabase(): FileDownloadTask {
        return this.download(
            'problem-database',
            this.config.problemDatabaseUrl,
            this.fileManager.getProblemInfoFile(),
        );
    }

    downloadCategoryIndex(): FileDownloadTask {
        return this.download(
            'category-index',
            this.config.categoryIndexUrl,
            this.fileManager.getCategoryIndexFile(),
        );
    }

    downloadCategoryData(name: string): FileDownloadTask {
        return this.download(
            'category-data',
            this.config.categoryDataUrl.replace('{name}', encodeURIComponent(name)),
            this.fileManager.getCategoryDataFile(name),
            name,
        );
    }

    /**
     * Tasks that have not finished yet
     */
    getActiveTasks(): FileDownloadTask[] {
        return Array.from(this.tasks.values()).filter((task) => !task.isFinished());
    }

    stopAll(): void {
        for (const task of this.tasks.values()) {
            task.stop();
        }
    }

    private download(
        resource: ArchiveResource,
        url: string,
        filePath: string,
        category?: string,
    ): FileDownloadTask {
        const existing = this.tasks.get(url);
        if (existing && !existing.isFinished()) {
            logger.debug('Download already running, reusing task', { resource, url, taskId: existing.id });
            return existing;
        }

        const task = new FileDownloadTask(this.client, url, filePath, {
            retryCount: this.config.retryCount,
            reportIntervalMs: this.config.reportIntervalMs,
            timeoutMs: this.config.requestTimeoutMs,
        });
        task.addTaskMonitor(this.createMonitor(resource, filePath, category));
        this.tasks.set(url, task);

        logger.info('📥 Downloading archive resource', { resource, url, category });
        task.start();
        return task;
    }

    private createMonitor(resource: ArchiveResource, filePath: string, category?: string): TaskMonitor {
        return {
            onProgress: (task) => {
                logger.debug(`[${resource}] ${task.toString()}`);
            },
            onFinished: (task) => {
                if (this.tasks.get(task.url) === task) {
                    this.tasks.delete(task.url);
                }
                this.eventBus.publish(AppEvents.DOWNLOAD_COMPLETED, {
                    resource,
                    url: task.url,
                    success: task.isSuccess(),
                    category,
                    filePath: task.isSuccess() ? filePath : undefined,
                    error: task.getError()?.message,
                });
            },
        };
    }
}
