/**
 * DownloadTask - Abstract resilient download of a single HTTP resource
 *
 * Each task owns exactly one worker: the async attempt loop started by
 * start(). Subclasses decide what the bytes become through four hooks.
 */

import { v4 as uuidv4 } from 'uuid';
import { logError, logger, toError } from '../../utils/logger';
import { formatByteLength } from '../../utils/logicHelpers';
import { DownloadError, DownloadInterruptedError } from './errors';
import { ProgressState } from './ProgressState';
import { MIN_PRIORITY, RetryPolicy } from './RetryPolicy';
import {
    DownloadTaskOptions,
    HttpClient,
    RequestDescriptor,
    TaskMonitor,
    TaskStatus,
} from './types';

export const BUFFER_SIZE = 2048;
export const REPORT_INTERVAL_MILLIS = 100;

export abstract class DownloadTask {
    readonly id: string = uuidv4();
    readonly url: string;

    protected readonly client: HttpClient;

    private status: TaskStatus = TaskStatus.WAITING;
    private retryCount: number;
    private priority = MIN_PRIORITY;
    private attempts = 0;
    private finishReported = false;
    private started = false;
    private resolveFinished: () => void = () => undefined;

    private readonly finished: Promise<void>;
    private readonly progress = new ProgressState();
    private readonly monitors: TaskMonitor[] = [];
    private readonly retryPolicy: RetryPolicy;
    private readonly reportIntervalMs: number;
    private readonly bufferSize: number;

    constructor(client: HttpClient, url: string, options: DownloadTaskOptions = {}) {
        this.client = client;
        this.url = url;
        this.retryCount = Math.max(0, options.retryCount ?? 0);
        this.reportIntervalMs = Math.max(0, options.reportIntervalMs ?? REPORT_INTERVAL_MILLIS);
        this.bufferSize = Math.max(1, options.bufferSize ?? BUFFER_SIZE);
        this.retryPolicy = new RetryPolicy(options.retryPolicy);
        this.finished = new Promise<void>((resolve) => {
            this.resolveFinished = resolve;
        });
    }

    // ========================================================================
    // Hooks
    // ========================================================================

    /**
     * Describe the request of the next attempt
     */
    protected abstract buildRequest(): RequestDescriptor;

    /**
     * Prepare for a new body, e.g. open the output file
     */
    protected abstract beforeStart(): Promise<void>;

    /**
     * Consume one piece of the body, at most bufferSize bytes long
     */
    protected abstract processChunk(data: Uint8Array): Promise<void>;

    /**
     * Commit the result once the whole body has been consumed
     */
    protected abstract afterSuccess(): Promise<void>;

    /**
     * Called after every failed attempt, before the retry decision
     */
    protected async onAttemptFailed(_error: Error): Promise<void> {
        // nothing to clean up by default
    }

    // ========================================================================
    // Control
    // ========================================================================

    /**
     * Starts the download. Ignored once started.
     */
    start(): void {
        // set before run(): its first progress report reaches monitors synchronously
        if (this.started) return;
        this.started = true;
        this.status = TaskStatus.RUNNING;
        logger.info('⬇️ Download started', { taskId: this.id, url: this.url, retryCount: this.retryCount });
        this.run().catch((error) => {
            logError(toError(error), { operation: 'DownloadTask.run', taskId: this.id });
        });
    }

    /**
     * Requests a stop. Observed by the worker at the next chunk boundary.
     */
    stop(): void {
        if (this.status !== TaskStatus.RUNNING) return;
        this.status = TaskStatus.STOPPING;
        logger.info('⏹️ Download stop requested', { taskId: this.id, url: this.url });
    }

    /**
     * Resolves after the finish notification has been delivered
     */
    whenFinished(): Promise<void> {
        return this.finished;
    }

    /**
     * Monitors are notified in registration order
     */
    addTaskMonitor(monitor: TaskMonitor | null | undefined): void {
        if (monitor) {
            this.monitors.push(monitor);
        }
    }

    // ========================================================================
    // Worker
    // ========================================================================

    private async run(): Promise<void> {
        const retryCount = this.retryCount;

        for (let attempt = 0; this.getStatus() === TaskStatus.RUNNING; attempt++) {
            this.attempts = attempt + 1;
            this.progress.resetAttempt();
            this.reportProgress();

            try {
                await this.attempt();
                this.finish(undefined);
                return;
            } catch (error) {
                const err = toError(error);
                await this.runFailureHook(err);

                if (!this.retryPolicy.shouldRetry(attempt, retryCount, this.getStatus())) {
                    this.finish(this.getStatus() === TaskStatus.RUNNING ? err : this.asInterruption(err));
                    return;
                }

                this.priority = this.retryPolicy.escalate(this.priority);
                const delay = this.retryPolicy.getDelay(attempt);
                logger.warn(`Download attempt ${attempt + 1} failed, retrying (retry ${attempt + 1}/${retryCount})`, {
                    taskId: this.id,
                    url: this.url,
                    priority: this.priority,
                    delay,
                    error: err.message,
                });
                if (delay > 0) {
                    await new Promise((resolve) => setTimeout(resolve, delay));
                }
            }
        }

        // Only reachable when a stop lands between two attempts
        this.finish(
            this.getStatus() === TaskStatus.STOPPING
                ? new DownloadInterruptedError()
                : new DownloadError('Download Failed'),
        );
    }

    private async attempt(): Promise<void> {
        const request = this.buildRequest();
        const response = await this.client.execute(request);
        try {
            this.progress.setChunked(response.chunked);
            this.progress.setTotalBytes(response.contentLength);
            this.reportProgress();

            await this.beforeStart();

            for await (const chunk of response.body) {
                for (let offset = 0; offset < chunk.byteLength; offset += this.bufferSize) {
                    const piece = chunk.subarray(offset, offset + this.bufferSize);
                    await this.processChunk(piece);
                    this.progress.addDownloadedBytes(piece.byteLength);
                    this.reportProgress();
                    this.ensureRunning();
                }
            }
            this.ensureRunning();

            this.progress.setEncoding(response.contentEncoding);
            await this.afterSuccess();
        } finally {
            response.release();
        }
    }

    private ensureRunning(): void {
        if (this.getStatus() !== TaskStatus.RUNNING) {
            throw new DownloadInterruptedError();
        }
    }

    private asInterruption(error: Error): DownloadInterruptedError {
        if (error instanceof DownloadInterruptedError) return error;
        return new DownloadInterruptedError(undefined, { cause: error });
    }

    private async runFailureHook(error: Error): Promise<void> {
        try {
            await this.onAttemptFailed(error);
        } catch (hookError) {
            logger.warn('Attempt cleanup failed', {
                taskId: this.id,
                error: toError(hookError).message,
            });
        }
    }

    private finish(error: Error | undefined): void {
        this.progress.setError(error);
        this.status = TaskStatus.FINISHED;

        if (error) {
            logger.warn('Download failed', {
                taskId: this.id,
                url: this.url,
                attempts: this.attempts,
                error: error.message,
            });
        } else {
            logger.info('✅ Download finished', {
                taskId: this.id,
                url: this.url,
                attempts: this.attempts,
                bytes: this.progress.getDownloadedBytes(),
            });
            this.reportProgress();
        }

        this.reportFinish();
        this.resolveFinished();
    }

    // ========================================================================
    // Notifications
    // ========================================================================

    private reportProgress(): void {
        if (!this.progress.shouldReport(Date.now(), this.reportIntervalMs)) return;
        this.notify('onProgress');
    }

    private reportFinish(): void {
        if (!this.isFinished() || this.finishReported) return;
        this.finishReported = true;
        this.notify('onFinished');
    }

    private notify(event: keyof TaskMonitor): void {
        for (const monitor of this.monitors) {
            try {
                monitor[event](this);
            } catch (error) {
                logger.error('Task monitor threw', {
                    taskId: this.id,
                    event,
                    error: toError(error).message,
                });
            }
        }
    }

    // ========================================================================
    // Counters
    // ========================================================================

    getTotalBytes(): number {
        return this.progress.getTotalBytes();
    }

    getDownloadedBytes(): number {
        return this.progress.getDownloadedBytes();
    }

    getTotalByteLength(): string {
        return formatByteLength(this.getTotalBytes());
    }

    getDownloadedByteLength(): string {
        return formatByteLength(this.getDownloadedBytes());
    }

    /**
     * Progress in percent, strictly positive
     */
    getDownloadProgress(): number {
        return this.progress.getPercentage();
    }

    /**
     * Progress formatted to a fixed number of decimals (6 when precision is not positive)
     */
    formatDownloadProgress(precision = 6): string {
        return this.getDownloadProgress().toFixed(precision > 0 ? precision : 6);
    }

    // ========================================================================
    // State
    // ========================================================================

    getRetryCount(): number {
        return this.retryCount;
    }

    /**
     * Number of retries after the first attempt. Ignored once started.
     */
    setRetryCount(count: number): void {
        if (this.started) {
            logger.warn('Retry count change ignored on a started task', { taskId: this.id });
            return;
        }
        this.retryCount = Math.max(0, count);
    }

    getAttemptCount(): number {
        return this.attempts;
    }

    getPriority(): number {
        return this.priority;
    }

    getError(): Error | undefined {
        return this.progress.getError();
    }

    getErrorMessage(): string {
        return this.getError()?.message ?? 'No Error';
    }

    /**
     * Content encoding of the last response, undefined for the default encoding
     */
    getEncoding(): string | undefined {
        return this.progress.getEncoding();
    }

    isChunked(): boolean {
        return this.progress.isChunked();
    }

    getStatus(): TaskStatus {
        return this.status;
    }

    getStatusMessage(): string {
        switch (this.status) {
            case TaskStatus.WAITING:
                return 'Waiting';
            case TaskStatus.RUNNING:
                return 'Running';
            case TaskStatus.STOPPING:
                return 'Stopping';
            case TaskStatus.FINISHED:
                return this.isSuccess() ? 'Success' : `Failed : ${this.getErrorMessage()}`;
        }
    }

    isWaiting(): boolean {
        return this.status === TaskStatus.WAITING;
    }

    isRunning(): boolean {
        return this.status === TaskStatus.RUNNING || this.status === TaskStatus.STOPPING;
    }

    isFinished(): boolean {
        return this.status === TaskStatus.FINISHED;
    }

    isSuccess(): boolean {
        return this.isFinished() && this.getError() === undefined;
    }

    isFailed(): boolean {
        return this.isFinished() && this.getError() !== undefined;
    }

    toString(): string {
        return `${this.url} : ${this.formatDownloadProgress(2)}% [${this.getDownloadedByteLength()} of ${this.getTotalByteLength()}] ~ ${this.getStatusMessage()}`;
    }
}
