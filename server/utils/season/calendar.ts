/**
 * Season Calendar
 *
 * Regular-season lengths and playoff round offsets for every season since 1961.
 * Year boundaries follow league rule changes and the strike-shortened seasons.
 */

import type { PlayoffRound } from '@shared/schema';
import { DomainError } from '../../types/errors';

export const FIRST_CALENDAR_SEASON = 1961;
export const FIRST_WILDCARD_SEASON = 1978;

const ROUND_OFFSETS_BEFORE_WILDCARD: Partial<Record<PlayoffRound, number>> = {
  divisional: 1,
  championship: 2,
  superbowl: 3,
};

const ROUND_OFFSETS: Record<PlayoffRound, number> = {
  wildcard: 1,
  divisional: 2,
  championship: 3,
  superbowl: 4,
};

function assertSeasonYear(year: number): void {
  if (!Number.isInteger(year) || year < FIRST_CALENDAR_SEASON) {
    throw new DomainError(`Seasons before ${FIRST_CALENDAR_SEASON} are not supported: ${year}`, { year });
  }
}

/**
 * Number of regular-season weeks in the season that starts in `year`.
 */
export function weeksInRegularSeason(year: number): number {
  assertSeasonYear(year);

  if (year <= 1977) {
    return year === 1966 ? 15 : 14;
  }
  if (year <= 1989) {
    // 1987 lost a week of games to the strike but kept the 16-week calendar
    return year === 1982 ? 17 : 16;
  }
  if (year <= 2020) {
    return year === 1993 || year === 2001 ? 18 : 17;
  }
  return 18;
}

/**
 * Number of weeks after the last regular-season week that `round` is played.
 */
export function playoffRoundOffset(round: PlayoffRound, year: number): number {
  assertSeasonYear(year);

  if (year < FIRST_WILDCARD_SEASON) {
    const offset = ROUND_OFFSETS_BEFORE_WILDCARD[round];
    if (offset === undefined) {
      throw new DomainError(`The wild card round did not exist until ${FIRST_WILDCARD_SEASON}`, { year, round });
    }
    return offset;
  }
  return ROUND_OFFSETS[round];
}

export function playoffRoundsInSeason(year: number): PlayoffRound[] {
  return year < FIRST_WILDCARD_SEASON
    ? ['divisional', 'championship', 'superbowl']
    : ['wildcard', 'divisional', 'championship', 'superbowl'];
}

/** Regular-season weeks plus every playoff round. */
export function weeksInSeason(year: number): number {
  return weeksInRegularSeason(year) + playoffRoundsInSeason(year).length;
}

export function isPostseasonWeek(week: number, year: number): boolean {
  return week > weeksInRegularSeason(year);
}

export function isSuperBowlWeek(week: number, year: number): boolean {
  return week === weeksInRegularSeason(year) + playoffRoundOffset('superbowl', year);
}
