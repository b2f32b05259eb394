/**
 * RetryPolicy - Decides whether a failed attempt is retried
 *
 * Each retry raises the worker's priority one step. A bounded exponential
 * backoff is available but off by default, so a retry starts right away.
 */

import { RetryPolicyOptions, TaskStatus } from './types';

export const MIN_PRIORITY = 1;
export const MAX_PRIORITY = 10;

const DEFAULT_MAX_DELAY = 30000;

export class RetryPolicy {
    private readonly baseDelayMs: number;
    private readonly maxDelayMs: number;

    constructor(options: RetryPolicyOptions = {}) {
        this.baseDelayMs = Math.max(0, options.baseDelayMs ?? 0);
        this.maxDelayMs = Math.max(0, options.maxDelayMs ?? DEFAULT_MAX_DELAY);
    }

    /**
     * @param attempt zero-based index of the attempt that just failed
     */
    shouldRetry(attempt: number, retryCount: number, status: TaskStatus): boolean {
        return status === TaskStatus.RUNNING && attempt < retryCount;
    }

    escalate(priority: number): number {
        return Math.min(MAX_PRIORITY, Math.max(MIN_PRIORITY, priority + 1));
    }

    /**
     * Delay before the attempt following `attempt`
     */
    getDelay(attempt: number): number {
        if (this.baseDelayMs === 0) return 0;
        return Math.min(this.maxDelayMs, this.baseDelayMs * Math.pow(2, attempt));
    }
}
