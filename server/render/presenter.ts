import { differenceInMinutes, format, parseISO } from 'date-fns';
import type { GameRecord, TeamSeasonRecord, WeekDesignator } from '@shared/schema';
import type { RenderOptions } from '../agents/types';
import { config } from '../config';
import { DomainError } from '../types/errors';
import { TeamMapper } from '../utils/scraping/teamMapper';
import { isPostseasonWeek, weeksInRegularSeason } from '../utils/season/calendar';
import { normalizeWeek } from '../utils/season/weeks';

export type SeasonPortion = 'reg' | 'post';

export interface WeekPosition {
  year: number;
  /** Week within its portion: postseason weeks count from 1 */
  week: number;
  portion: SeasonPortion;
}

const KICKOFF_DISPLAY_FORMAT = 'EEEE, MMM d, h:mm a';
const LISTING_TIMESTAMP_FORMAT = 'yyyy-MM-dd HH:mm:ss';
// Games further apart than this start a new time-slot block
const BLOCK_GAP_MINUTES = 60;

export function seasonPosition(year: number | string, week: WeekDesignator | number | string): WeekPosition {
  const normalized = normalizeWeek(year, week);
  if (isPostseasonWeek(normalized.week, normalized.year)) {
    return {
      year: normalized.year,
      week: normalized.week - weeksInRegularSeason(normalized.year),
      portion: 'post',
    };
  }
  return { ...normalized, portion: 'reg' };
}

/** 10-6, or 10-5-1 when the team has a tie */
export function formatRecord(record: TeamSeasonRecord): string {
  const base = `${record.wins}-${record.losses}`;
  return record.ties > 0 ? `${base}-${record.ties}` : base;
}

/** "Thursday, Sep 8, 8:40 PM" */
export function formatKickoff(startTime: string): string {
  return format(parseISO(startTime), KICKOFF_DISPLAY_FORMAT);
}

/**
 * Plain listing, one game per line with the full kickoff timestamp:
 * "New York Giants at New England Patriots, 2012-02-05 18:30:00"
 */
export function listGames(games: readonly GameRecord[]): string {
  return games
    .map((game) => {
      const kickoff = format(parseISO(game.startTime), LISTING_TIMESTAMP_FORMAT);
      return `${game.teamAway} at ${game.teamHome}, ${kickoff}\n`;
    })
    .join('');
}

/**
 * e.g. https://www.nfl.com/games/titans-at-seahawks-2021-reg-2
 */
export function buildDeepLink(game: GameRecord, position: WeekPosition, baseUrl: string = config.deepLinkBaseUrl): string {
  const prefix = baseUrl.endsWith('/') ? baseUrl : `${baseUrl}/`;
  const away = TeamMapper.slug(game.teamAway);
  const home = TeamMapper.slug(game.teamHome);
  return `${prefix}${away}-at-${home}-${position.year}-${position.portion}-${position.week}`;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;');
}

function describeGame(game: GameRecord, options: RenderOptions): string {
  const recordSuffix = (team: string): string => {
    const record = options.teamRecords?.get(team);
    return record ? ` (${formatRecord(record)})` : '';
  };

  let quality = '';
  if (options.includeQuality && game.quality) {
    quality = game.quality === 'bad' ? ' (bad game)' : ' (good game)';
  }

  return (
    `${game.teamAway}${recordSuffix(game.teamAway)} at ` +
    `${game.teamHome}${recordSuffix(game.teamHome)}, ` +
    `${formatKickoff(game.startTime)}${quality}`
  );
}

/**
 * Render one week's games, in the order given, as an HTML document or a
 * plain text block. A gap of more than an hour between consecutive kickoffs
 * starts a new block.
 */
export function renderGames(
  games: readonly GameRecord[],
  week: WeekDesignator | number | string,
  year: number | string,
  options: RenderOptions
): string {
  if (options.format !== 'html' && options.format !== 'text') {
    throw new DomainError(`Unsupported output format: ${String(options.format)}`);
  }

  const position = seasonPosition(year, week);
  const html = options.format === 'html';
  const lines: string[] = [];
  let previousKickoff: Date | undefined;

  for (const game of games) {
    const kickoff = parseISO(game.startTime);
    const newBlock =
      previousKickoff !== undefined && differenceInMinutes(kickoff, previousKickoff) > BLOCK_GAP_MINUTES;
    previousKickoff = kickoff;

    const description = describeGame(game, options);
    const link = options.includeDeepLinks ? buildDeepLink(game, position, options.deepLinkBaseUrl) : undefined;

    if (html) {
      const body = link
        ? `<a href="${escapeHtml(link)}">${escapeHtml(description)}</a>`
        : escapeHtml(description);
      lines.push(`${newBlock ? '<br/>' : ''}<p>${body}</p>`);
    } else {
      if (newBlock) lines.push('');
      lines.push(link ? `${description} <${link}>` : description);
    }
  }

  if (html) {
    return ['<html><body>', ...lines, '</body></html>'].join('\n');
  }
  return lines.length > 0 ? `${lines.join('\n')}\n` : '';
}
