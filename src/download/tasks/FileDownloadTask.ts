/**
 * FileDownloadTask - Streams a resource into a local file
 *
 * Bytes land in "<target>.part", which replaces the target only after the
 * whole body arrived.
 */

import fs, { FileHandle } from 'fs/promises';
import path from 'path';
import { DownloadTask } from '../core/DownloadTask';
import { DownloadTaskOptions, HttpClient, RequestDescriptor } from '../core/types';

export interface FileDownloadOptions extends DownloadTaskOptions {
    headers?: Record<string, string>;
    timeoutMs?: number;
}

export class FileDownloadTask extends DownloadTask {
    readonly filePath: string;
    readonly partialPath: string;

    private readonly headers?: Record<string, string>;
    private readonly timeoutMs?: number;
    private handle?: FileHandle;

    constructor(client: HttpClient, url: string, filePath: string, options: FileDownloadOptions = {}) {
        super(client, url, options);
        this.filePath = filePath;
        this.partialPath = `${filePath}.part`;
        this.headers = options.headers;
        this.timeoutMs = options.timeoutMs;
    }

    protected buildRequest(): RequestDescriptor {
        return {
            url: this.url,
            method: 'GET',
            headers: this.headers,
            timeoutMs: this.timeoutMs,
        };
    }

    protected async beforeStart(): Promise<void> {
        await this.closeHandle();
        await fs.mkdir(path.dirname(this.filePath), { recursive: true });
        this.handle = await fs.open(this.partialPath, 'w');
    }

    protected async processChunk(data: Uint8Array): Promise<void> {
        if (!this.handle) {
            throw new Error('Output file is not open');
        }
        await this.handle.write(data);
    }

    protected async afterSuccess(): Promise<void> {
        await this.closeHandle();
        await fs.rename(this.partialPath, this.filePath);
    }

    protected async onAttemptFailed(): Promise<void> {
        await this.closeHandle();
        await fs.rm(this.partialPath, { force: true });
    }

    private async closeHandle(): Promise<void> {
        const handle = this.handle;
        this.handle = undefined;
        if (handle) {
            await handle.close();
        }
    }
}
