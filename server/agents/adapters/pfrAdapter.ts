import type { GameRecord, WeekDesignator } from '@shared/schema';
import { config } from '../../config';
import { withSource } from '../../logger';
import { AccessDeniedError, FetchError, ParseError } from '../../types/errors';
import { ethicalFetcher, type EthicalFetcher } from '../../utils/scraping/fetcher';
import { HTMLParser } from '../../utils/scraping/parser';
import { isSuperBowlWeek } from '../../utils/season/calendar';
import { normalizeWeek } from '../../utils/season/weeks';
import type { IScheduleSource } from '../types';
import { parseBoxscore } from './boxscoreParser';

const log = withSource('pfrAdapter');

const ACCESS_DENIED_MARKER = 'access denied';
const BOXSCORE_PATH_SEGMENT = '/boxscores/';

export interface PfrAdapterOptions {
  baseUrl?: string;
  fetcher?: EthicalFetcher;
}

/**
 * ProFootballReferenceAdapter
 *
 * Reads a season week from the week index page and one box score page per
 * game. A week index looks like this, one `table.teams` per game:
 *
 *   <table class="teams"><tbody>
 *     <tr class="date"><td colspan=3>Sep 8, 2011</td></tr>
 *     <tr class="loser"><td><a href="/teams/nor/2011.htm">New Orleans Saints</a></td>
 *       <td class="right">34</td>
 *       <td class="right gamelink"><a href="/boxscores/201109080gnb.htm">Final</a></td></tr>
 *     <tr class="winner">...</tr>
 *   </tbody></table>
 *
 * Requests go out one at a time so the source's pacing is respected.
 */
export class ProFootballReferenceAdapter implements IScheduleSource {
  private readonly baseUrl: string;
  private readonly fetcher: EthicalFetcher;

  constructor(options: PfrAdapterOptions = {}) {
    this.baseUrl = (options.baseUrl ?? config.sourceBaseUrl).replace(/\/+$/, '');
    this.fetcher = options.fetcher ?? ethicalFetcher;
  }

  /**
   * e.g. https://www.pro-football-reference.com/years/2009/week_1.htm
   */
  buildWeekUrl(year: number, week: number): string {
    return `${this.baseUrl}/years/${year}/week_${week}.htm`;
  }

  /**
   * Normalize a caller's year/week and fetch that week.
   */
  async loadGameTimes(year: number | string, week: WeekDesignator | number | string): Promise<GameRecord[]> {
    const normalized = normalizeWeek(year, week);
    return this.fetchWeek(normalized.year, normalized.week);
  }

  /**
   * All games of a normalized season week, ordered by kickoff.
   */
  async fetchWeek(year: number, week: number): Promise<GameRecord[]> {
    return this.fetchWeekPage(year, week, true);
  }

  private async fetchWeekPage(year: number, week: number, allowSuperBowlFallback: boolean): Promise<GameRecord[]> {
    const url = this.buildWeekUrl(year, week);
    log.info({ year, week, url }, 'Fetching week index');

    const html = await this.fetchPage(url);
    const $ = HTMLParser.load(html);
    const gameTables = $.root().find('table.teams').toArray();

    if (gameTables.length === 0) {
      // Some seasons list the Super Bowl as a third championship-round game
      if (allowSuperBowlFallback && isSuperBowlWeek(week, year)) {
        log.warn({ year, week }, `No games found for ${year} week ${week}, reverting to week ${week - 1}`);
        const previous = await this.fetchWeekPage(year, week - 1, false);
        return previous.slice(-1);
      }
      throw new ParseError(`Could not parse any games from ${url}`, { url, year, week });
    }

    const games: GameRecord[] = [];
    for (const [index, table] of gameTables.entries()) {
      const links = $(table)
        .find('a')
        .toArray()
        .map((a) => $(a).attr('href') ?? '')
        .filter((href) => href.includes(BOXSCORE_PATH_SEGMENT));
      if (links.length !== 1) {
        throw new ParseError(`Expected 1 box score link in game table ${index}, found ${links.length}`, {
          url,
          gameIndex: index,
          links,
        });
      }

      const boxscoreUrl = new URL(links[0], `${this.baseUrl}/`).toString();
      const boxscoreHtml = await this.fetchPage(boxscoreUrl);
      games.push(parseBoxscore(boxscoreHtml, { url: boxscoreUrl }));
    }

    log.info({ year, week, count: games.length }, 'Fetched week');
    return sortByKickoff(games);
  }

  private async fetchPage(url: string): Promise<string> {
    const response = await this.fetcher.fetch(url);
    if (response.body.toLowerCase().includes(ACCESS_DENIED_MARKER)) {
      throw new AccessDeniedError(url, { status: response.status });
    }
    if (!response.ok) {
      throw new FetchError(`HTTP ${response.status}: ${response.statusText} for ${url}`, {
        url,
        status: response.status,
      });
    }
    return response.body;
  }
}

/**
 * Stable ascending sort on the naive kickoff timestamp
 */
export function sortByKickoff(games: readonly GameRecord[]): GameRecord[] {
  return [...games].sort((a, b) => a.startTime.localeCompare(b.startTime));
}
