/**
 * Event payloads for EventBus
 */

export type ArchiveResource = 'problem-database' | 'category-index' | 'category-data';

export interface DownloadRequestedData {
  resource: ArchiveResource;
  reason: string;
  category?: string;
}

export interface DownloadCompleteData {
  resource: ArchiveResource;
  url: string;
  success: boolean;
  category?: string;
  filePath?: string;
  error?: string;
}

export interface DatabaseUpdatedData {
  problemCount: number;
  categoryCount: number;
}
