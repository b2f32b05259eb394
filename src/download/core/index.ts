/**
 * Core index - exports all core components
 */

export * from './types';
export * from './errors';
export { ProgressState, PROGRESS_EPSILON } from './ProgressState';
export { RetryPolicy, MIN_PRIORITY, MAX_PRIORITY } from './RetryPolicy';
export { DownloadTask, BUFFER_SIZE, REPORT_INTERVAL_MILLIS } from './DownloadTask';
