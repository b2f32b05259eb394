import { EventEmitter } from 'events';
import { logger } from './logger';
import {
  DatabaseUpdatedData,
  DownloadCompleteData,
  DownloadRequestedData,
} from '../types';

export enum AppEvents {
  CATEGORY_DATA_UPDATED = 'category_data_updated',
  PROBLEM_DATABASE_UPDATED = 'problem_database_updated',
  DOWNLOAD_REQUESTED = 'download_requested',
  DOWNLOAD_COMPLETED = 'download_completed',
}

export interface AppEventMap {
  [AppEvents.CATEGORY_DATA_UPDATED]: DatabaseUpdatedData;
  [AppEvents.PROBLEM_DATABASE_UPDATED]: DatabaseUpdatedData;
  [AppEvents.DOWNLOAD_REQUESTED]: DownloadRequestedData;
  [AppEvents.DOWNLOAD_COMPLETED]: DownloadCompleteData;
}

export type AppEventListener<E extends AppEvents> = (data: AppEventMap[E]) => void;

export class EventBus extends EventEmitter {
  constructor() {
    super();
    this.setMaxListeners(20);
  }

  public publish<E extends AppEvents>(event: E, data: AppEventMap[E]): boolean {
    logger.debug(`EventBus: Emitting ${event}`, { data });
    return this.emit(event, data);
  }

  public subscribe<E extends AppEvents>(event: E, listener: AppEventListener<E>): () => void {
    logger.debug(`EventBus: Listener added for ${event}`);
    this.on(event, listener);
    return () => {
      this.off(event, listener);
    };
  }
}

export const eventBus = new EventBus();
