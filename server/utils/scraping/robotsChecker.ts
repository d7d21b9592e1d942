/**
 * Robots.txt Checker
 *
 * Fetches and caches robots.txt per host and answers whether a URL may be
 * fetched by our user agent.
 */

import robotsParser from 'robots-parser';
import { config } from '../../config';
import { withSource } from '../../logger';

type Robot = ReturnType<typeof robotsParser>;

const log = withSource('robotsChecker');

export class RobotsChecker {
  private robots: Map<string, Robot> = new Map();
  private readonly userAgent: string;

  constructor(userAgent: string = config.scraperUserAgent) {
    this.userAgent = userAgent;
  }

  /**
   * @returns false only when robots.txt explicitly disallows the URL
   */
  async canFetch(url: string): Promise<boolean> {
    const robot = await this.load(url);
    return robot.isAllowed(url, this.userAgent) ?? true;
  }

  /**
   * Crawl delay in seconds for our user agent, if a loaded robots.txt sets one
   */
  getCrawlDelay(host: string): number | null {
    const robot = this.robots.get(host);
    if (!robot) return null;
    return robot.getCrawlDelay(this.userAgent) ?? null;
  }

  private async load(url: string): Promise<Robot> {
    const urlObj = new URL(url);
    const host = urlObj.hostname;
    const cached = this.robots.get(host);
    if (cached) return cached;

    const robotsUrl = `${urlObj.protocol}//${urlObj.host}/robots.txt`;
    let robotsTxt = '';
    try {
      const response = await fetch(robotsUrl, { headers: { 'User-Agent': this.userAgent } });
      robotsTxt = response.ok ? await response.text() : '';
    } catch (err) {
      // Unreachable robots.txt is treated as "allow everything"
      log.warn({ err, robotsUrl }, 'Could not fetch robots.txt, assuming allowed');
    }

    const robot = robotsParser(robotsUrl, robotsTxt);
    this.robots.set(host, robot);
    return robot;
  }
}

export const globalRobotsChecker = new RobotsChecker();
