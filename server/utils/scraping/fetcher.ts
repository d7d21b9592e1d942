/**
 * Ethical Fetcher for the schedule source
 *
 * Sends a fixed, descriptive user agent, spaces requests per host and can
 * honour robots.txt, including its crawl-delay. It makes exactly one attempt
 * per call and hands back non-2xx responses as-is: callers look at the body
 * before deciding the request failed.
 */

import { config } from '../../config';
import { withSource } from '../../logger';
import { FetchError } from '../../types/errors';
import { globalRateLimiter, type RateLimiter } from './rateLimiter';
import { globalRobotsChecker, type RobotsChecker } from './robotsChecker';

const log = withSource('fetcher');

export interface FetchOptions {
  timeout?: number;
  headers?: Record<string, string>;
  bypassRobots?: boolean;
}

export interface FetchResult {
  url: string;
  status: number;
  statusText: string;
  ok: boolean;
  body: string;
}

export interface EthicalFetcherOptions {
  userAgent?: string;
  timeout?: number;
  respectRobots?: boolean;
  rateLimiter?: RateLimiter;
  robotsChecker?: RobotsChecker;
}

export class EthicalFetcher {
  private readonly userAgent: string;
  private readonly timeout: number;
  private readonly respectRobots: boolean;
  private readonly rateLimiter: RateLimiter;
  private readonly robotsChecker: RobotsChecker;

  constructor(options: EthicalFetcherOptions = {}) {
    this.userAgent = options.userAgent ?? config.scraperUserAgent;
    this.timeout = options.timeout ?? config.scraperTimeoutMs;
    this.respectRobots = options.respectRobots ?? config.scraperRespectRobots;
    this.rateLimiter = options.rateLimiter ?? globalRateLimiter;
    this.robotsChecker = options.robotsChecker ?? globalRobotsChecker;
  }

  /**
   * Fetch a URL once.
   * @throws FetchError on network failure, timeout or a robots.txt refusal
   */
  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const { timeout = this.timeout, headers = {}, bypassRobots = false } = options;

    const host = new URL(url).hostname;
    let crawlDelayMs = 0;
    if (this.respectRobots && !bypassRobots) {
      const canFetch = await this.robotsChecker.canFetch(url);
      if (!canFetch) {
        throw new FetchError(`Robots.txt disallows fetching: ${url}`, { url });
      }
      const crawlDelay = this.robotsChecker.getCrawlDelay(host);
      crawlDelayMs = crawlDelay ? crawlDelay * 1000 : 0;
    }

    await this.rateLimiter.waitIfNeeded(host, crawlDelayMs);

    const controller = new AbortController();
    const timeoutId = setTimeout(() => controller.abort(), timeout);

    try {
      log.debug({ url }, 'Fetching');
      const response = await fetch(url, {
        headers: {
          'User-Agent': this.userAgent,
          'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
          'Accept-Language': 'en-US,en;q=0.9',
          ...headers,
        },
        signal: controller.signal,
      });
      const body = await response.text();

      return {
        url,
        status: response.status,
        statusText: response.statusText,
        ok: response.ok,
        body,
      };
    } catch (err) {
      const message = controller.signal.aborted
        ? `Timed out after ${timeout}ms`
        : err instanceof Error ? err.message : String(err);
      throw new FetchError(`Failed to fetch ${url}: ${message}`, { url });
    } finally {
      clearTimeout(timeoutId);
    }
  }
}

/**
 * Shared fetcher instance used by the schedule adapter
 */
export const ethicalFetcher = new EthicalFetcher();
