import { afterEach, describe, expect, it, vi } from 'vitest';
import { pino } from 'pino';
import { HtmlFetcher } from './fetcher.js';

const logger = pino({ level: 'silent' });

function createFetcher(): HtmlFetcher {
  return new HtmlFetcher({ userAgent: 'test-agent', timeout: 1000, rateLimitMs: 0 }, logger);
}

describe('HtmlFetcher', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('parses the body of a successful response', async () => {
    const fetchMock = vi.fn<typeof fetch>(
      async () => new Response('<html><body><p id="greeting">Olá</p></body></html>', { status: 200 })
    );
    vi.stubGlobal('fetch', fetchMock);

    const $ = await createFetcher().fetchDocument('https://example.com/page');

    expect($?.('#greeting').text()).toBe('Olá');
    expect(fetchMock).toHaveBeenCalledWith(
      'https://example.com/page',
      expect.objectContaining({
        headers: expect.objectContaining({ 'User-Agent': 'test-agent' }),
      })
    );
  });

  it('returns null on a non-2xx status', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<typeof fetch>(async () => new Response('unavailable', { status: 503 }))
    );

    expect(await createFetcher().fetchDocument('https://example.com/down')).toBeNull();
  });

  it('returns null when the request fails', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn<typeof fetch>(async () => {
        throw new TypeError('fetch failed');
      })
    );

    expect(await createFetcher().fetchDocument('https://example.com/offline')).toBeNull();
  });
});
