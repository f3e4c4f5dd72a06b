// HTTP fetcher tests
import { gzipSync } from 'zlib';
import { request } from 'undici';
import { fetchHttp, classifyTransportError } from './http';

jest.mock('undici', () => ({
  request: jest.fn(),
}));

const mockRequest = request as jest.Mock;

function mockResponse(statusCode: number, body: Buffer | string, headers: Record<string, string | string[]> = {}) {
  const buffer = typeof body === 'string' ? Buffer.from(body) : body;
  return {
    statusCode,
    headers,
    body: {
      arrayBuffer: jest.fn().mockResolvedValue(
        buffer.buffer.slice(buffer.byteOffset, buffer.byteOffset + buffer.byteLength),
      ),
    },
  };
}

describe('fetchHttp', () => {
  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should return body, status and flattened headers', async () => {
    mockRequest.mockResolvedValue(
      mockResponse(200, '<html>ok</html>', { 'content-type': 'text/html', 'set-cookie': ['a=1', 'b=2'] }),
    );

    const result = await fetchHttp({ url: 'https://example.com', headers: { 'User-Agent': 'test-agent' } });

    expect(result.ok).toBe(true);
    if (!result.ok) return;
    expect(result.response.statusCode).toBe(200);
    expect(result.response.body).toBe('<html>ok</html>');
    expect(result.response.headers).toEqual({ 'content-type': 'text/html', 'set-cookie': 'a=1, b=2' });
    expect(mockRequest).toHaveBeenCalledWith('https://example.com', expect.objectContaining({
      method: 'GET',
      maxRedirections: 5,
      headers: { 'Accept-Encoding': 'gzip, deflate, br', 'User-Agent': 'test-agent' },
    }));
  });

  it('should decompress gzip bodies', async () => {
    mockRequest.mockResolvedValue(
      mockResponse(200, gzipSync(Buffer.from('<html>zipped</html>')), { 'content-encoding': 'gzip' }),
    );

    const result = await fetchHttp({ url: 'https://example.com' });

    expect(result.ok && result.response.body).toBe('<html>zipped</html>');
  });

  it('should return non-2xx statuses as responses', async () => {
    mockRequest.mockResolvedValue(mockResponse(403, 'denied'));

    const result = await fetchHttp({ url: 'https://example.com' });

    expect(result.ok).toBe(true);
    expect(result.ok && result.response.statusCode).toBe(403);
  });

  it('should classify timeouts', async () => {
    mockRequest.mockRejectedValue(Object.assign(new Error('Headers Timeout Error'), { code: 'UND_ERR_HEADERS_TIMEOUT' }));

    const result = await fetchHttp({ url: 'https://example.com', timeout: 1000 });

    expect(result).toEqual({
      ok: false,
      errorCode: 'FETCH_TIMEOUT',
      error: 'Request timeout after 1000ms',
      elapsedMs: expect.any(Number),
    });
  });

  it('should classify DNS errors', async () => {
    mockRequest.mockRejectedValue(Object.assign(new Error('getaddrinfo ENOTFOUND nowhere.test'), { code: 'ENOTFOUND' }));

    const result = await fetchHttp({ url: 'https://nowhere.test' });

    expect(result.ok).toBe(false);
    expect(!result.ok && result.errorCode).toBe('FETCH_DNS');
  });
});

describe('classifyTransportError', () => {
  it('should read codes from the error cause', () => {
    const error = new TypeError('fetch failed', { cause: { code: 'ECONNREFUSED' } });

    expect(classifyTransportError(error)).toEqual({
      errorCode: 'FETCH_CONNECTION',
      error: 'Connection failed: ECONNREFUSED - fetch failed',
    });
  });

  it('should treat abort signals as timeouts', () => {
    const error = Object.assign(new Error('The operation was aborted'), { name: 'AbortError' });

    expect(classifyTransportError(error, 500).errorCode).toBe('FETCH_TIMEOUT');
  });

  it('should classify browser navigation errors', () => {
    expect(classifyTransportError(new Error('page.goto: net::ERR_NAME_NOT_RESOLVED at https://x.test')).errorCode).toBe('FETCH_DNS');
    expect(classifyTransportError(new Error('net::ERR_CERT_AUTHORITY_INVALID')).errorCode).toBe('FETCH_TLS');
  });

  it('should fall back to a connection error', () => {
    expect(classifyTransportError('boom')).toEqual({ errorCode: 'FETCH_CONNECTION', error: 'Fetch failed: boom' });
  });
});
