import 'dotenv/config';
import * as Sentry from '@sentry/node';
import { loadConfig } from './utils/config';
import { logger } from './utils/logger';
import { eventBus, AppEvents } from './utils/EventBus';
import { FileManager } from './utils/FileManager';
import { JsonPreferenceStore } from './database/PreferenceStore';
import { ProblemDatabase } from './database/ProblemDatabase';
import { ArchiveDownloader, NodeFetchHttpClient } from './download';
import { ArchiveService } from './services/ArchiveService';
import { AppConfig } from './types';

function initializeSentry(): void {
  if (!process.env.SENTRY_DSN) return;
  Sentry.init({
    dsn: process.env.SENTRY_DSN,
    tracesSampleRate: 1.0,
  });
}

async function initializeComponents(config: AppConfig): Promise<ArchiveService> {
  const fileManager = new FileManager(config.dataDirectory);
  await fileManager.initialize();

  const preferences = new JsonPreferenceStore(fileManager);
  await preferences.load();

  const database = new ProblemDatabase(fileManager, preferences, { eventBus });
  const downloader = new ArchiveDownloader(
    config,
    new NodeFetchHttpClient(config.requestTimeoutMs),
    fileManager,
    eventBus,
  );

  eventBus.subscribe(AppEvents.PROBLEM_DATABASE_UPDATED, (data) => {
    logger.info('📚 Problem database updated', { ...data });
  });
  eventBus.subscribe(AppEvents.CATEGORY_DATA_UPDATED, (data) => {
    logger.info('🗂️ Category data updated', { ...data });
  });

  return new ArchiveService(config, fileManager, database, downloader, preferences, eventBus);
}

function setupShutdownHandlers(service: ArchiveService): void {
  const shutdown = (signal: string) => {
    logger.info(`${signal} received, stopping downloads`);
    service.stop();
  };
  process.once('SIGINT', () => shutdown('SIGINT'));
  process.once('SIGTERM', () => shutdown('SIGTERM'));

  process.on('unhandledRejection', (reason) => {
    logger.error('Unhandled Rejection', { reason });
    Sentry.captureException(reason);
  });
}

async function main(): Promise<void> {
  initializeSentry();
  logger.info('🚀 Starting archive sync...');

  const config = loadConfig();
  logger.info('✅ Configuration loaded', {
    dataDirectory: config.dataDirectory,
    retryCount: config.retryCount,
    problemMaxAgeHours: config.problemMaxAgeMs / 3600000,
  });

  const service = await initializeComponents(config);
  setupShutdownHandlers(service);
  await service.start();
}

main().catch((error: unknown) => {
  logger.error('Fatal error during startup', {
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  Sentry.captureException(error);
  process.exit(1);
});
