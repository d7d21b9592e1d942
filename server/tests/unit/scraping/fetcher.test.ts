import { describe, it, expect, beforeEach, afterEach, vi, type Mock } from 'vitest';
import { EthicalFetcher } from '@server/utils/scraping/fetcher';
import { RateLimiter } from '@server/utils/scraping/rateLimiter';
import { RobotsChecker } from '@server/utils/scraping/robotsChecker';
import { FetchError } from '@server/types/errors';

const URL_UNDER_TEST = 'https://pfr.test/years/2011/week_1.htm';

describe('EthicalFetcher', () => {
  let fetchMock: Mock<typeof fetch>;
  let rateLimiter: RateLimiter;
  let robotsChecker: RobotsChecker;

  beforeEach(() => {
    fetchMock = vi.fn<typeof fetch>();
    vi.stubGlobal('fetch', fetchMock);
    rateLimiter = new RateLimiter(0);
    robotsChecker = new RobotsChecker('test-agent');
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  function makeFetcher(respectRobots = false, timeout = 1000) {
    return new EthicalFetcher({ userAgent: 'test-agent', timeout, respectRobots, rateLimiter, robotsChecker });
  }

  it('returns status and body and sends the configured headers', async () => {
    fetchMock.mockResolvedValue(new Response('<html>week</html>', { status: 200, statusText: 'OK' }));

    const result = await makeFetcher().fetch(URL_UNDER_TEST);

    expect(result).toEqual({ url: URL_UNDER_TEST, status: 200, statusText: 'OK', ok: true, body: '<html>week</html>' });
    expect(fetchMock).toHaveBeenCalledTimes(1);
    expect(fetchMock).toHaveBeenCalledWith(
      URL_UNDER_TEST,
      expect.objectContaining({
        headers: expect.objectContaining({ 'User-Agent': 'test-agent', 'Accept-Language': 'en-US,en;q=0.9' }),
      })
    );
  });

  it('hands back non-2xx responses without throwing', async () => {
    fetchMock.mockResolvedValue(new Response('Access Denied', { status: 403, statusText: 'Forbidden' }));

    const result = await makeFetcher().fetch(URL_UNDER_TEST);

    expect(result.ok).toBe(false);
    expect(result.status).toBe(403);
    expect(result.body).toBe('Access Denied');
  });

  it('makes a single attempt and wraps network failures', async () => {
    fetchMock.mockRejectedValue(new TypeError('fetch failed'));

    await expect(makeFetcher().fetch(URL_UNDER_TEST)).rejects.toThrow(
      `Failed to fetch ${URL_UNDER_TEST}: fetch failed`
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('aborts requests that exceed the timeout', async () => {
    fetchMock.mockImplementation(
      (_input, init) =>
        new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('This operation was aborted')));
        })
    );

    await expect(makeFetcher(false, 5).fetch(URL_UNDER_TEST)).rejects.toThrow(
      `Failed to fetch ${URL_UNDER_TEST}: Timed out after 5ms`
    );
  });

  it('spaces requests through the rate limiter by host', async () => {
    fetchMock.mockResolvedValue(new Response('ok'));
    const wait = vi.spyOn(rateLimiter, 'waitIfNeeded');

    await makeFetcher().fetch(URL_UNDER_TEST);

    expect(wait).toHaveBeenCalledWith('pfr.test', 0);
  });

  it('paces by the robots.txt crawl-delay when robots are respected', async () => {
    fetchMock.mockResolvedValue(new Response('ok'));
    vi.spyOn(robotsChecker, 'canFetch').mockResolvedValue(true);
    vi.spyOn(robotsChecker, 'getCrawlDelay').mockReturnValue(2);
    const wait = vi.spyOn(rateLimiter, 'waitIfNeeded').mockResolvedValue();

    await makeFetcher(true).fetch(URL_UNDER_TEST);

    expect(wait).toHaveBeenCalledWith('pfr.test', 2000);
  });

  it('ignores the crawl-delay when robots are not consulted', async () => {
    fetchMock.mockResolvedValue(new Response('ok'));
    const crawlDelay = vi.spyOn(robotsChecker, 'getCrawlDelay').mockReturnValue(2);
    const wait = vi.spyOn(rateLimiter, 'waitIfNeeded');

    await makeFetcher(false).fetch(URL_UNDER_TEST);

    expect(crawlDelay).not.toHaveBeenCalled();
    expect(wait).toHaveBeenCalledWith('pfr.test', 0);
  });

  it('refuses URLs robots.txt disallows', async () => {
    vi.spyOn(robotsChecker, 'canFetch').mockResolvedValue(false);

    await expect(makeFetcher(true).fetch(URL_UNDER_TEST)).rejects.toBeInstanceOf(FetchError);
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('skips the robots check when asked', async () => {
    const canFetch = vi.spyOn(robotsChecker, 'canFetch').mockResolvedValue(false);
    fetchMock.mockResolvedValue(new Response('ok'));

    const result = await makeFetcher(true).fetch(URL_UNDER_TEST, { bypassRobots: true });

    expect(result.body).toBe('ok');
    expect(canFetch).not.toHaveBeenCalled();
  });
});
