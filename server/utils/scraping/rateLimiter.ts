/**
 * Rate Limiter for the schedule source
 *
 * Holds requests to the same host at least `delayMs` apart. With a delay of 0
 * requests go out back to back.
 */

import { config } from '../../config';

export class RateLimiter {
  private lastRequest: Map<string, number> = new Map();
  private readonly delayMs: number;

  /**
   * @param delayMs Minimum spacing between requests to the same host
   */
  constructor(delayMs: number = 0) {
    this.delayMs = Math.max(0, delayMs);
  }

  /**
   * Wait if necessary to respect the spacing for a host
   * @param host e.g. "www.pro-football-reference.com"
   * @param minDelayMs Spacing the host asks for (robots.txt crawl-delay); the larger of the two wins
   */
  async waitIfNeeded(host: string, minDelayMs: number = 0): Promise<void> {
    const waitTime = this.getTimeUntilNextRequest(host, minDelayMs);
    if (waitTime > 0) {
      await new Promise((resolve) => setTimeout(resolve, waitTime));
    }

    this.lastRequest.set(host, Date.now());
  }

  /**
   * Milliseconds until the next request to `host` may go out, or 0
   */
  getTimeUntilNextRequest(host: string, minDelayMs: number = 0): number {
    const lastTime = this.lastRequest.get(host);
    if (lastTime === undefined) return 0;
    const spacing = Math.max(this.delayMs, minDelayMs);
    return Math.max(0, spacing - (Date.now() - lastTime));
  }
}

export const globalRateLimiter = new RateLimiter(config.scraperRequestDelayMs);
