/**
 * ProgressState - Byte counters and response metadata of one download task
 */

/** Keeps the percentage strictly positive so "not started" differs from 0% of a known size */
export const PROGRESS_EPSILON = 1e-14;

export class ProgressState {
    private totalBytes = 0;
    private downloadedBytes = 0;
    private lastReportTime = 0;
    private encoding?: string;
    private chunked = false;
    private error?: Error;

    /**
     * Reset the per-attempt state. Encoding and chunked flag survive so
     * they always describe the most recent response.
     */
    resetAttempt(): void {
        this.error = undefined;
        this.totalBytes = 0;
        this.downloadedBytes = 0;
    }

    getTotalBytes(): number {
        return this.totalBytes;
    }

    /**
     * Unknown or negative lengths are stored as 0.
     */
    setTotalBytes(bytes: number): void {
        this.totalBytes = Number.isFinite(bytes) ? Math.max(0, bytes) : 0;
    }

    getDownloadedBytes(): number {
        return this.downloadedBytes;
    }

    setDownloadedBytes(bytes: number): void {
        this.downloadedBytes = Math.max(0, bytes);
        this.totalBytes = Math.max(this.downloadedBytes, this.totalBytes);
    }

    addDownloadedBytes(bytes: number): void {
        this.setDownloadedBytes(this.downloadedBytes + bytes);
    }

    getEncoding(): string | undefined {
        return this.encoding;
    }

    setEncoding(encoding: string | undefined): void {
        this.encoding = encoding;
    }

    isChunked(): boolean {
        return this.chunked;
    }

    setChunked(chunked: boolean): void {
        this.chunked = chunked;
    }

    getError(): Error | undefined {
        return this.error;
    }

    setError(error: Error | undefined): void {
        this.error = error;
    }

    /**
     * Progress in percent. Never divides by zero.
     */
    getPercentage(): number {
        if (this.totalBytes === 0) {
            return PROGRESS_EPSILON;
        }
        return (this.downloadedBytes * 100) / this.totalBytes + PROGRESS_EPSILON;
    }

    /**
     * Throttle gate: true at most once per interval, and records the fan-out time.
     */
    shouldReport(now: number, intervalMs: number): boolean {
        if (now - this.lastReportTime >= intervalMs) {
            this.lastReportTime = now;
            return true;
        }
        return false;
    }
}
