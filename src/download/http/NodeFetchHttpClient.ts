/**
 * NodeFetchHttpClient - HttpClient backed by node-fetch
 */

import { Readable } from 'stream';
import fetch from 'node-fetch';
import { logger } from '../../utils/logger';
import { HttpStatusError } from '../core/errors';
import { HttpClient, HttpResponse, RequestDescriptor } from '../core/types';

const DEFAULT_TIMEOUT = 30000;
const USER_AGENT = 'archive-sync/1.0 (+https://archive.example.org)';

async function* toBytes(stream: NodeJS.ReadableStream): AsyncGenerator<Uint8Array> {
    for await (const chunk of stream) {
        yield typeof chunk === 'string' ? Buffer.from(chunk) : chunk;
    }
}

function releaseStream(stream: NodeJS.ReadableStream): void {
    if (stream instanceof Readable && !stream.destroyed) {
        stream.destroy();
    }
}

export class NodeFetchHttpClient implements HttpClient {
    private readonly defaultTimeout: number;

    constructor(defaultTimeout: number = DEFAULT_TIMEOUT) {
        this.defaultTimeout = defaultTimeout;
    }

    async execute(request: RequestDescriptor): Promise<HttpResponse> {
        const method = request.method ?? 'GET';
        logger.debug('HTTP request', { method, url: request.url });

        const response = await fetch(request.url, {
            method,
            headers: {
                'User-Agent': USER_AGENT,
                ...request.headers,
            },
            body: request.body,
            // node-fetch v2 timeout covers both the response and the body
            timeout: request.timeoutMs ?? this.defaultTimeout,
        });

        const body = response.body;

        if (!response.ok) {
            releaseStream(body);
            throw new HttpStatusError(response.status, response.statusText);
        }

        const contentLength = parseInt(response.headers.get('content-length') || '', 10);
        const transferEncoding = response.headers.get('transfer-encoding') || '';

        return {
            statusCode: response.status,
            contentLength: Number.isNaN(contentLength) ? -1 : contentLength,
            contentEncoding: response.headers.get('content-encoding') ?? undefined,
            chunked: transferEncoding.toLowerCase().includes('chunked'),
            body: toBytes(body),
            release: () => releaseStream(body),
        };
    }
}
