import type { GameRecord, LineScore } from '@shared/schema';

/**
 * Build a game for record/quality tests; the final score is the last element.
 */
export function makeGame(
  teamAway: string,
  teamHome: string,
  awayScores: LineScore,
  homeScores: LineScore,
  startTime = '2011-09-11T13:00:00',
  overrides: Partial<GameRecord> = {}
): GameRecord {
  return {
    teamAway,
    teamHome,
    startTime,
    awayScores,
    homeScores,
    awayRecord: '0-0',
    homeRecord: '0-0',
    ...overrides,
  };
}

/** Final-only line score: every point in the fourth quarter */
export function finalOnly(points: number): LineScore {
  return [0, 0, 0, points, 0, points];
}
