import type { GameQuality, GameRecord, TeamRecords, TeamSeasonRecord } from '@shared/schema';
import { weeksInRegularSeason } from '../utils/season/calendar';

export type GameResult = 'home_win' | 'away_win' | 'tie';

export interface SeasonReplay {
  /** recordsBeforeWeek[i]: every team's record before zero-indexed week i */
  recordsBeforeWeek: TeamRecords[];
  finalRecords: TeamRecords;
  /** Input weeks with regular-season games tagged good/bad */
  weeks: GameRecord[][];
}

const BLOWOUT_MARGIN = 16;
const ONE_SCORE_MARGIN = 8;
const SHOOTOUT_TOTAL = 60;

export function gameResult(awayPoints: number, homePoints: number): GameResult {
  if (homePoints > awayPoints) return 'home_win';
  if (homePoints < awayPoints) return 'away_win';
  return 'tie';
}

/**
 * good: one-score finish, a second-half comeback, or a two-score game with
 * more than 60 points. bad: a blowout the halftime leader won.
 */
export function classifyGame(game: GameRecord): GameQuality | undefined {
  const awayFinal = game.awayScores[5];
  const homeFinal = game.homeScores[5];
  const result = gameResult(awayFinal, homeFinal);
  const halftime = gameResult(
    game.awayScores[0] + game.awayScores[1],
    game.homeScores[0] + game.homeScores[1]
  );

  const margin = Math.abs(homeFinal - awayFinal);
  const total = homeFinal + awayFinal;
  const comeback = halftime !== 'tie' && halftime !== result;

  if (margin > BLOWOUT_MARGIN && halftime === result) {
    return 'bad';
  }
  if (margin <= ONE_SCORE_MARGIN || comeback || (margin <= BLOWOUT_MARGIN && total > SHOOTOUT_TOTAL)) {
    return 'good';
  }
  return undefined;
}

function emptyRecord(): TeamSeasonRecord {
  return { wins: 0, losses: 0, ties: 0 };
}

function snapshot(records: Map<string, TeamSeasonRecord>): TeamRecords {
  return new Map(Array.from(records, ([team, record]) => [team, { ...record }]));
}

function applyResult(records: Map<string, TeamSeasonRecord>, game: GameRecord): void {
  const away = records.get(game.teamAway) ?? emptyRecord();
  const home = records.get(game.teamHome) ?? emptyRecord();

  switch (gameResult(game.awayScores[5], game.homeScores[5])) {
    case 'home_win':
      home.wins += 1;
      away.losses += 1;
      break;
    case 'away_win':
      away.wins += 1;
      home.losses += 1;
      break;
    case 'tie':
      away.ties += 1;
      home.ties += 1;
      break;
  }

  records.set(game.teamAway, away);
  records.set(game.teamHome, home);
}

/**
 * Replay a season's regular-season weeks in order, accumulating team records
 * and tagging game quality. `weeks[i]` holds the games of week i + 1; playoff
 * weeks may follow and are passed through untagged. Inputs are not modified.
 */
export function replaySeason(year: number, weeks: readonly (readonly GameRecord[])[]): SeasonReplay {
  const regularWeeks = Math.min(weeksInRegularSeason(year), weeks.length);

  const records = new Map<string, TeamSeasonRecord>();
  for (const games of weeks) {
    for (const game of games) {
      if (!records.has(game.teamAway)) records.set(game.teamAway, emptyRecord());
      if (!records.has(game.teamHome)) records.set(game.teamHome, emptyRecord());
    }
  }

  const recordsBeforeWeek: TeamRecords[] = [snapshot(records)];
  const tagged: GameRecord[][] = [];

  weeks.forEach((games, weekIndex) => {
    if (weekIndex >= regularWeeks) {
      tagged.push(games.map((game) => ({ ...game })));
      return;
    }

    tagged.push(
      games.map((game) => {
        applyResult(records, game);
        const quality = classifyGame(game);
        const { quality: _previous, ...rest } = game;
        return quality ? { ...rest, quality } : rest;
      })
    );
    recordsBeforeWeek.push(snapshot(records));
  });

  return { recordsBeforeWeek, finalRecords: snapshot(records), weeks: tagged };
}
