/**
 * Base error for all download failures.
 */
export class DownloadError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = this.constructor.name;
        // Set the prototype explicitly to allow 'instanceof' checks
        Object.setPrototypeOf(this, new.target.prototype);
    }
}

/**
 * Thrown inside the worker when a stop request is observed mid-stream.
 * Never retried.
 */
export class DownloadInterruptedError extends DownloadError {
    constructor(message = 'Download was interrupted before it was finished.', options?: { cause?: unknown }) {
        super(message, options);
    }
}

/**
 * Thrown when the server responds with a non-2xx HTTP status.
 */
export class HttpStatusError extends DownloadError {
    public readonly statusCode: number;
    public readonly statusText: string;

    constructor(statusCode: number, statusText: string) {
        super(`HTTP ${statusCode} ${statusText}`.trim());
        this.statusCode = statusCode;
        this.statusText = statusText;
    }
}
