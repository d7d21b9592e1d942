import { playoffRounds, type PlayoffRound, type WeekDesignator } from '@shared/schema';
import { DomainError } from '../../types/errors';
import { playoffRoundOffset, playoffRoundsInSeason, weeksInRegularSeason } from './calendar';

export const MIN_SUPPORTED_YEAR = 1966;
export const MAX_SUPPORTED_YEAR = 2050;

export interface NormalizedWeek {
  year: number;
  week: number;
}

const ROUND_DISPLAY_NAMES: Record<PlayoffRound, string> = {
  wildcard: 'wild card',
  divisional: 'divisional',
  championship: 'championship',
  superbowl: 'super bowl',
};

/**
 * Lowercase and drop all whitespace: "sUpeR   boWL" -> "superbowl"
 */
export function foldWeekName(raw: string): string {
  return raw.toLowerCase().replace(/\s+/g, '');
}

function isPlayoffRound(name: string): name is PlayoffRound {
  return playoffRounds.some((round) => round === name);
}

/**
 * Classify a raw week argument (CLI string, query param, number).
 */
export function toWeekDesignator(raw: WeekDesignator | number | string): WeekDesignator {
  if (typeof raw === 'number') {
    return { kind: 'numeric', week: raw };
  }
  if (typeof raw !== 'string') {
    return raw;
  }

  const folded = foldWeekName(raw);
  if (/^-?\d+$/.test(folded)) {
    return { kind: 'numeral', text: folded };
  }
  if (isPlayoffRound(folded)) {
    return { kind: 'round', round: folded };
  }
  throw new DomainError(`Unrecognized week name ${folded}`, { week: raw });
}

export function toSeasonYear(raw: number | string): number {
  const year = typeof raw === 'string' && /^\s*\d+\s*$/.test(raw) ? parseInt(raw, 10) : raw;
  if (typeof year !== 'number' || !Number.isInteger(year)) {
    throw new DomainError(`Invalid season year: ${raw}`, { year: raw });
  }
  if (year < MIN_SUPPORTED_YEAR || year > MAX_SUPPORTED_YEAR) {
    throw new DomainError(
      `Season year ${year} is outside ${MIN_SUPPORTED_YEAR}-${MAX_SUPPORTED_YEAR}`,
      { year }
    );
  }
  return year;
}

/**
 * Convert a year and week designator into a season year and 1-indexed week,
 * with playoff rounds placed after the regular season.
 */
export function normalizeWeek(
  rawYear: number | string,
  rawWeek: WeekDesignator | number | string
): NormalizedWeek {
  const year = toSeasonYear(rawYear);
  const designator = toWeekDesignator(rawWeek);

  let week: number;
  switch (designator.kind) {
    case 'numeric':
      week = designator.week;
      break;
    case 'numeral':
      week = parseInt(designator.text, 10);
      break;
    case 'round':
      week = weeksInRegularSeason(year) + playoffRoundOffset(designator.round, year);
      break;
  }

  if (!Number.isInteger(week) || week < 1) {
    throw new DomainError(`Week must be a positive integer: ${week}`, { year, week });
  }

  return { year, week };
}

/**
 * Name for a zero-indexed week: "week 12", or the playoff round name.
 */
export function weekIndexToName(weekIndex: number, year: number): string {
  const season = toSeasonYear(year);
  const regularWeeks = weeksInRegularSeason(season);

  if (!Number.isInteger(weekIndex) || weekIndex < 0) {
    throw new DomainError(`Invalid week index: ${weekIndex}`, { year: season, week: weekIndex });
  }
  if (weekIndex < regularWeeks) {
    return `week ${weekIndex + 1}`;
  }

  const round = playoffRoundsInSeason(season)[weekIndex - regularWeeks];
  if (!round) {
    throw new DomainError(`Week index ${weekIndex} is past the end of the ${season} season`, {
      year: season,
      week: weekIndex,
    });
  }
  return ROUND_DISPLAY_NAMES[round];
}

/** "week 3" -> "Week 3", "super bowl" -> "Super Bowl" */
export function weekDisplayName(weekIndex: number, year: number): string {
  return weekIndexToName(weekIndex, year).replace(/\b\w/g, (c) => c.toUpperCase());
}
