/**
 * Shared type definitions
 */

export type { AppConfig, StalenessPolicy } from './config';
export type {
  ArchiveResource,
  DownloadRequestedData,
  DownloadCompleteData,
  DatabaseUpdatedData,
} from './events';
