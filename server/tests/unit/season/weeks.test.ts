import { describe, it, expect } from 'vitest';
import {
  foldWeekName,
  normalizeWeek,
  toSeasonYear,
  toWeekDesignator,
  weekDisplayName,
  weekIndexToName,
} from '@server/utils/season/weeks';
import { weeksInRegularSeason } from '@server/utils/season/calendar';
import { DomainError } from '@server/types/errors';

describe('toWeekDesignator', () => {
  it('classifies numbers, numerals and round names', () => {
    expect(toWeekDesignator(3)).toEqual({ kind: 'numeric', week: 3 });
    expect(toWeekDesignator(' 12 ')).toEqual({ kind: 'numeral', text: '12' });
    expect(toWeekDesignator('Wild Card')).toEqual({ kind: 'round', round: 'wildcard' });
    expect(toWeekDesignator('sUpeR      boWL')).toEqual({ kind: 'round', round: 'superbowl' });
  });

  it('passes designators through unchanged', () => {
    expect(toWeekDesignator({ kind: 'round', round: 'divisional' })).toEqual({ kind: 'round', round: 'divisional' });
  });

  it('rejects unknown week names', () => {
    expect(() => toWeekDesignator('bye week')).toThrow('Unrecognized week name byeweek');
  });

  it('folds case and whitespace', () => {
    expect(foldWeekName('  Cham pion\tship ')).toBe('championship');
  });
});

describe('toSeasonYear', () => {
  it('accepts numeral strings', () => {
    expect(toSeasonYear('2008')).toBe(2008);
    expect(toSeasonYear(' 1991 ')).toBe(1991);
  });

  it.each([1965, 2051, 'twenty', 2012.5])('rejects %s', (year) => {
    expect(() => toSeasonYear(year)).toThrow(DomainError);
  });
});

describe('normalizeWeek', () => {
  it('keeps numeric weeks as they are', () => {
    expect(normalizeWeek(2009, 1)).toEqual({ year: 2009, week: 1 });
    expect(normalizeWeek('2022', '12')).toEqual({ year: 2022, week: 12 });
    expect(normalizeWeek(2011, '19')).toEqual({ year: 2011, week: 19 });
  });

  it('places playoff rounds after the regular season', () => {
    expect(normalizeWeek('2008', 'wild card')).toEqual({ year: 2008, week: 18 });
    expect(normalizeWeek('1991', 'sUpeR      boWL')).toEqual({ year: 1991, week: 21 });
    expect(normalizeWeek(2002, 'super bowl')).toEqual({ year: 2002, week: 21 });
    expect(normalizeWeek(2021, { kind: 'round', round: 'divisional' })).toEqual({ year: 2021, week: 20 });
  });

  it('applies the three-round table to 1966', () => {
    const { week } = normalizeWeek(1966, 'super bowl');
    expect(week).toBe(weeksInRegularSeason(1966) + 3);
    expect(week).toBe(18);
  });

  it('rejects the wild card round for every season before 1978', () => {
    for (let year = 1966; year < 1978; year++) {
      expect(() => normalizeWeek(year, 'wild card')).toThrow(DomainError);
    }
  });

  it('accepts the wild card round for seasons from 1978 on', () => {
    for (const year of [1978, 1982, 1993, 2001, 2020, 2021, 2050]) {
      expect(normalizeWeek(year, 'wild card').week).toBe(weeksInRegularSeason(year) + 1);
    }
  });

  it('rejects weeks below 1 and fractional weeks', () => {
    expect(() => normalizeWeek(2010, 0)).toThrow(DomainError);
    expect(() => normalizeWeek(2010, '-3')).toThrow(DomainError);
    expect(() => normalizeWeek(2010, 2.5)).toThrow(DomainError);
  });

  it('rejects years outside 1966-2050', () => {
    expect(() => normalizeWeek(1965, 1)).toThrow(DomainError);
    expect(() => normalizeWeek('2051', 1)).toThrow(DomainError);
  });
});

describe('weekIndexToName', () => {
  it('names regular-season weeks', () => {
    expect(weekIndexToName(0, 2011)).toBe('week 1');
    expect(weekIndexToName(16, 2011)).toBe('week 17');
  });

  it('names playoff rounds', () => {
    expect(weekIndexToName(17, 2011)).toBe('wild card');
    expect(weekIndexToName(18, 2011)).toBe('divisional');
    expect(weekIndexToName(19, 2011)).toBe('championship');
    expect(weekIndexToName(20, 2011)).toBe('super bowl');
    expect(weekIndexToName(14, 1970)).toBe('divisional');
    expect(weekIndexToName(16, 1970)).toBe('super bowl');
  });

  it('rejects indexes past the last round', () => {
    expect(() => weekIndexToName(21, 2011)).toThrow(DomainError);
    expect(() => weekIndexToName(-1, 2011)).toThrow(DomainError);
  });

  it('title-cases display names', () => {
    expect(weekDisplayName(20, 2011)).toBe('Super Bowl');
    expect(weekDisplayName(2, 2011)).toBe('Week 3');
  });
});
