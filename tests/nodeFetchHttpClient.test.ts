import { Readable } from 'stream';
import fetch from 'node-fetch';
import { HttpStatusError } from '../src/download/core/errors';
import { NodeFetchHttpClient } from '../src/download/http/NodeFetchHttpClient';

jest.mock('node-fetch', () => jest.fn());

const mockedFetch = fetch as unknown as jest.Mock;

function mockResponse(
  status: number,
  headers: Record<string, string>,
  chunks: string[] = [],
  statusText = 'OK',
) {
  const body = Readable.from(chunks.map((chunk) => Buffer.from(chunk)));
  mockedFetch.mockResolvedValueOnce({
    ok: status >= 200 && status < 300,
    status,
    statusText,
    headers: { get: (name: string) => headers[name.toLowerCase()] ?? null },
    body,
  });
  return body;
}

async function collect(body: AsyncIterable<Uint8Array>): Promise<string> {
  const parts: Buffer[] = [];
  for await (const chunk of body) {
    parts.push(Buffer.from(chunk));
  }
  return Buffer.concat(parts).toString('utf-8');
}

describe('NodeFetchHttpClient', () => {
  beforeEach(() => {
    mockedFetch.mockReset();
  });

  it('should expose the response body and headers', async () => {
    mockResponse(200, { 'content-length': '5' }, ['abc', 'de']);
    const client = new NodeFetchHttpClient(1234);

    const response = await client.execute({ url: 'http://test/p' });

    expect(response.statusCode).toBe(200);
    expect(response.contentLength).toBe(5);
    expect(response.contentEncoding).toBeUndefined();
    expect(response.chunked).toBe(false);
    expect(await collect(response.body)).toBe('abcde');
    expect(mockedFetch).toHaveBeenCalledWith(
      'http://test/p',
      expect.objectContaining({
        method: 'GET',
        timeout: 1234,
        headers: expect.objectContaining({ 'User-Agent': expect.any(String) }),
      }),
    );
  });

  it('should report an unknown length for chunked responses', async () => {
    mockResponse(200, { 'transfer-encoding': 'Chunked', 'content-encoding': 'gzip' });
    const client = new NodeFetchHttpClient();

    const response = await client.execute({ url: 'http://test/p', timeoutMs: 50 });

    expect(response.contentLength).toBe(-1);
    expect(response.chunked).toBe(true);
    expect(response.contentEncoding).toBe('gzip');
    expect(mockedFetch).toHaveBeenCalledWith('http://test/p', expect.objectContaining({ timeout: 50 }));
  });

  it('should pass request headers along', async () => {
    mockResponse(200, {});
    const client = new NodeFetchHttpClient();

    await client.execute({ url: 'http://test/p', headers: { Accept: 'application/json' } });

    expect(mockedFetch.mock.calls[0][1].headers).toEqual(
      expect.objectContaining({ Accept: 'application/json' }),
    );
  });

  it('should reject error statuses and release the body', async () => {
    const body = mockResponse(404, {}, ['missing'], 'Not Found');
    const client = new NodeFetchHttpClient();

    const request = client.execute({ url: 'http://test/p' });

    await expect(request).rejects.toBeInstanceOf(HttpStatusError);
    await expect(request).rejects.toMatchObject({ statusCode: 404, message: 'HTTP 404 Not Found' });
    expect(body.destroyed).toBe(true);
  });

  it('should release the body on demand', async () => {
    const body = mockResponse(200, {}, ['abc']);
    const client = new NodeFetchHttpClient();

    const response = await client.execute({ url: 'http://test/p' });
    response.release();
    response.release();

    expect(body.destroyed).toBe(true);
  });
});
