import type { GameRecord, TeamRecords, WeekDesignator } from "@shared/schema";
import type { IScheduleSource, LoadSeasonOptions, RenderWeekOptions } from "./types";
import { ProFootballReferenceAdapter } from "./adapters/pfrAdapter";
import { replaySeason } from "./seasonReplay";
import { storage as defaultStorage, type IScheduleStore } from "../storage";
import { config } from "../config";
import { withSource } from "../logger";
import { renderGames } from "../render/presenter";
import { isPostseasonWeek, weeksInRegularSeason, weeksInSeason } from "../utils/season/calendar";
import { normalizeWeek } from "../utils/season/weeks";

const log = withSource("schedule-agent");

export interface ScheduleAgentOptions {
  source?: IScheduleSource;
  store?: IScheduleStore;
  cacheEnabled?: boolean;
}

/**
 * ScheduleAgent
 *
 * Normalizes the caller's year/week, serves weeks from the store when it
 * already has them and otherwise fetches and stores them.
 */
export class ScheduleAgent {
  private source: IScheduleSource;
  private store: IScheduleStore;
  private cacheEnabled: boolean;

  constructor(options: ScheduleAgentOptions = {}) {
    this.source = options.source ?? new ProFootballReferenceAdapter();
    this.store = options.store ?? defaultStorage;
    this.cacheEnabled = options.cacheEnabled ?? config.scheduleCacheEnabled;
  }

  async getWeek(year: number | string, week: WeekDesignator | number | string): Promise<GameRecord[]> {
    const normalized = normalizeWeek(year, week);

    if (this.cacheEnabled) {
      const cached = await this.store.getWeek(normalized.year, normalized.week);
      if (cached) {
        log.debug({ ...normalized, count: cached.length }, "week served from store");
        return cached;
      }
    }

    const games = await this.source.fetchWeek(normalized.year, normalized.week);
    if (this.cacheEnabled) {
      await this.store.saveWeek(normalized.year, normalized.week, games);
    }
    return games;
  }

  /**
   * Every week of a season, fetched one after another. weeks[i] is week i + 1.
   */
  async loadSeason(year: number | string, options: LoadSeasonOptions = {}): Promise<GameRecord[][]> {
    const { includePostseason = true } = options;
    const season = normalizeWeek(year, 1).year;
    const weekCount = includePostseason ? weeksInSeason(season) : weeksInRegularSeason(season);

    log.info({ year: season, weekCount }, "loading season");
    const weeks: GameRecord[][] = [];
    for (let week = 1; week <= weekCount; week++) {
      weeks.push(await this.getWeek(season, week));
    }
    return weeks;
  }

  /**
   * Team records going into a week, replayed from weeks 1..week-1. Playoff
   * weeks get the final regular-season records.
   */
  async recordsBeforeWeek(year: number | string, week: WeekDesignator | number | string): Promise<TeamRecords> {
    const normalized = normalizeWeek(year, week);
    const lastRegularWeek = weeksInRegularSeason(normalized.year);
    const weeks = await this.weeksThrough(normalized.year, Math.min(normalized.week, lastRegularWeek));
    const replay = replaySeason(normalized.year, weeks);
    return normalized.week > lastRegularWeek
      ? replay.finalRecords
      : replay.recordsBeforeWeek[normalized.week - 1];
  }

  async renderWeek(
    year: number | string,
    week: WeekDesignator | number | string,
    options: RenderWeekOptions
  ): Promise<string> {
    const normalized = normalizeWeek(year, week);
    let games = await this.getWeek(normalized.year, normalized.week);
    let teamRecords: TeamRecords | undefined;

    const regularSeason = !isPostseasonWeek(normalized.week, normalized.year);
    if (regularSeason && (options.includeRecords || options.includeQuality)) {
      const weeks = await this.weeksThrough(normalized.year, normalized.week);
      const replay = replaySeason(normalized.year, weeks);
      games = replay.weeks[normalized.week - 1];
      if (options.includeRecords) {
        teamRecords = replay.recordsBeforeWeek[normalized.week - 1];
      }
    }

    return renderGames(games, normalized.week, normalized.year, {
      format: options.format,
      includeQuality: options.includeQuality,
      includeDeepLinks: options.includeDeepLinks,
      teamRecords,
    });
  }

  private async weeksThrough(year: number, week: number): Promise<GameRecord[][]> {
    const weeks: GameRecord[][] = [];
    for (let current = 1; current <= week; current++) {
      weeks.push(await this.getWeek(year, current));
    }
    return weeks;
  }
}
