import { DownloadTask } from '../../src/download/core/DownloadTask';
import {
  HttpClient,
  HttpResponse,
  RequestDescriptor,
  TaskMonitor,
  TaskStatus,
} from '../../src/download/core/types';

/**
 * One scripted answer of the fake client
 */
export type ScriptedStep =
  | { kind: 'fail'; error: Error }
  | {
      kind: 'respond';
      chunks: Uint8Array[];
      contentLength?: number;
      contentEncoding?: string;
      chunked?: boolean;
      /** index of the chunk at which the body breaks */
      failAt?: number;
      error?: Error;
    };

export function fail(message: string): ScriptedStep {
  return { kind: 'fail', error: new Error(message) };
}

export function respond(
  chunks: Array<Uint8Array | string>,
  options: Omit<Extract<ScriptedStep, { kind: 'respond' }>, 'kind' | 'chunks'> = {},
): ScriptedStep {
  return {
    kind: 'respond',
    chunks: chunks.map((chunk) => (typeof chunk === 'string' ? Buffer.from(chunk) : chunk)),
    ...options,
  };
}

export function bytes(length: number, fill = 1): Uint8Array {
  return Buffer.alloc(length, fill);
}

/**
 * In-process HttpClient answering from a script
 */
export class FakeHttpClient implements HttpClient {
  readonly requests: RequestDescriptor[] = [];
  released = 0;

  constructor(private readonly script: (request: RequestDescriptor, index: number) => ScriptedStep) {}

  /**
   * Answer with the steps in order, then with the fallback
   */
  static sequence(steps: ScriptedStep[], fallback?: ScriptedStep): FakeHttpClient {
    return new FakeHttpClient((_request, index) => {
      const step = steps[index] ?? fallback;
      if (!step) {
        throw new Error(`No scripted response for request ${index + 1}`);
      }
      return step;
    });
  }

  /**
   * Answer by URL, unknown URLs fail
   */
  static routes(table: Record<string, () => ScriptedStep>): FakeHttpClient {
    return new FakeHttpClient((request) => {
      const route = table[request.url];
      return route ? route() : fail(`Unexpected request ${request.url}`);
    });
  }

  async execute(request: RequestDescriptor): Promise<HttpResponse> {
    const index = this.requests.length;
    this.requests.push(request);
    const step = this.script(request, index);
    if (step.kind === 'fail') {
      throw step.error;
    }

    const total = step.chunks.reduce((sum, chunk) => sum + chunk.byteLength, 0);
    return {
      statusCode: 200,
      contentLength: step.contentLength ?? total,
      contentEncoding: step.contentEncoding,
      chunked: step.chunked ?? false,
      body: stream(step.chunks, step.failAt, step.error),
      release: () => {
        this.released++;
      },
    };
  }
}

async function* stream(chunks: Uint8Array[], failAt?: number, error?: Error): AsyncGenerator<Uint8Array> {
  for (let i = 0; i <= chunks.length; i++) {
    if (failAt === i) {
      throw error ?? new Error('Connection reset');
    }
    if (i < chunks.length) {
      yield chunks[i];
    }
  }
}

/**
 * DownloadTask collecting the body in memory
 */
export class MemoryDownloadTask extends DownloadTask {
  readonly received: Uint8Array[] = [];
  readonly failures: Error[] = [];
  beforeStartCalls = 0;
  afterSuccessCalls = 0;
  /** afterSuccess throws this many times before it passes */
  afterSuccessFailures = 0;
  onChunk?: (task: MemoryDownloadTask, data: Uint8Array) => void;

  protected buildRequest(): RequestDescriptor {
    return { url: this.url };
  }

  protected async beforeStart(): Promise<void> {
    this.beforeStartCalls++;
    this.received.length = 0;
  }

  protected async processChunk(data: Uint8Array): Promise<void> {
    this.received.push(data);
    this.onChunk?.(this, data);
  }

  protected async afterSuccess(): Promise<void> {
    this.afterSuccessCalls++;
    if (this.afterSuccessFailures > 0) {
      this.afterSuccessFailures--;
      throw new Error('Commit failed');
    }
  }

  protected async onAttemptFailed(error: Error): Promise<void> {
    this.failures.push(error);
  }

  receivedLength(): number {
    return this.received.reduce((sum, chunk) => sum + chunk.byteLength, 0);
  }
}

export interface MonitorEvent {
  type: 'progress' | 'finished';
  downloaded: number;
  total: number;
  status: TaskStatus;
}

export class RecordingMonitor implements TaskMonitor {
  readonly events: MonitorEvent[] = [];

  onProgress(task: DownloadTask): void {
    this.record('progress', task);
  }

  onFinished(task: DownloadTask): void {
    this.record('finished', task);
  }

  types(): Array<MonitorEvent['type']> {
    return this.events.map((event) => event.type);
  }

  private record(type: MonitorEvent['type'], task: DownloadTask): void {
    this.events.push({
      type,
      downloaded: task.getDownloadedBytes(),
      total: task.getTotalBytes(),
      status: task.getStatus(),
    });
  }
}
