import { describe, it, expect } from 'vitest';
import { TeamMapper } from '@server/utils/scraping/teamMapper';

describe('TeamMapper', () => {
  it('keeps the nickname', () => {
    expect(TeamMapper.shortName('Dallas Cowboys')).toBe('Cowboys');
    expect(TeamMapper.shortName('New  York\tGiants ')).toBe('Giants');
    expect(TeamMapper.shortName('Washington Football Team')).toBe('Football Team');
  });

  it('builds URL slugs', () => {
    expect(TeamMapper.slug('Tampa Bay Buccaneers')).toBe('buccaneers');
    expect(TeamMapper.slug('Washington Football Team')).toBe('football-team');
    expect(TeamMapper.slug('Los Angeles 49ers')).toBe('49ers');
  });
});
