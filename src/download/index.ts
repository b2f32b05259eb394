/**
 * Download System - Main Entry Point
 */

// Core components
export * from './core';

// HTTP capability
export { NodeFetchHttpClient } from './http/NodeFetchHttpClient';

// Concrete tasks
export { FileDownloadTask } from './tasks/FileDownloadTask';
export type { FileDownloadOptions } from './tasks/FileDownloadTask';

// Archive resources
export { ArchiveDownloader } from './ArchiveDownloader';
