/**
 * Core Types for Download System
 * Defines the task state machine, the HTTP capability and the observer contract
 */

import type { DownloadTask } from './DownloadTask';

// ============================================================================
// Enums
// ============================================================================

export enum TaskStatus {
    WAITING = 'waiting',
    RUNNING = 'running',
    STOPPING = 'stopping',
    FINISHED = 'finished',
}

// ============================================================================
// HTTP capability
// ============================================================================

export type HttpMethod = 'GET' | 'POST';

export interface RequestDescriptor {
    url: string;
    method?: HttpMethod;
    headers?: Record<string, string>;
    body?: string;
    timeoutMs?: number;
}

export interface HttpResponse {
    readonly statusCode: number;
    /** -1 when the server did not announce a length */
    readonly contentLength: number;
    readonly contentEncoding?: string;
    readonly chunked: boolean;
    readonly body: AsyncIterable<Uint8Array>;

    /**
     * Release the underlying connection. Safe to call more than once.
     */
    release(): void;
}

export interface HttpClient {
    execute(request: RequestDescriptor): Promise<HttpResponse>;
}

// ============================================================================
// Observer contract
// ============================================================================

/**
 * Receives notifications on the task's own worker. Implementations must
 * return quickly: a slow monitor delays the download.
 */
export interface TaskMonitor {
    onProgress(task: DownloadTask): void;
    onFinished(task: DownloadTask): void;
}

// ============================================================================
// Configuration Types
// ============================================================================

export interface DownloadTaskOptions {
    retryCount?: number;
    reportIntervalMs?: number;
    bufferSize?: number;
    retryPolicy?: RetryPolicyOptions;
}

export interface RetryPolicyOptions {
    /** 0 disables backoff, so retries start immediately */
    baseDelayMs?: number;
    maxDelayMs?: number;
}
