import { gameRecordSchema, type GameRecord } from "../shared/schema";

/**
 * Where fetched weeks are kept between calls. Callers supply the store; the
 * pipeline itself never persists anything.
 */
export interface IScheduleStore {
  getWeek(year: number, week: number): Promise<GameRecord[] | undefined>;
  saveWeek(year: number, week: number, games: GameRecord[]): Promise<void>;
  listWeeks(year: number): Promise<number[]>;
  clear(): Promise<void>;
}

function weekKey(year: number, week: number): string {
  return `${year}:${week}`;
}

export class MemStorage implements IScheduleStore {
  private weeks: Map<string, GameRecord[]>;

  constructor() {
    this.weeks = new Map();
  }

  async getWeek(year: number, week: number): Promise<GameRecord[] | undefined> {
    const games = this.weeks.get(weekKey(year, week));
    return games
      ? games.map((game) => ({ ...game, awayScores: [...game.awayScores], homeScores: [...game.homeScores] }))
      : undefined;
  }

  async saveWeek(year: number, week: number, games: GameRecord[]): Promise<void> {
    const validated = games.map((game) => gameRecordSchema.parse(game));
    this.weeks.set(weekKey(year, week), validated);
  }

  async listWeeks(year: number): Promise<number[]> {
    const prefix = `${year}:`;
    return Array.from(this.weeks.keys())
      .filter((key) => key.startsWith(prefix))
      .map((key) => parseInt(key.slice(prefix.length), 10))
      .sort((a, b) => a - b);
  }

  async clear(): Promise<void> {
    this.weeks.clear();
  }
}

export const storage: IScheduleStore = new MemStorage();
