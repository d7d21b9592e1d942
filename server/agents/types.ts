import type { GameRecord, OutputFormat, TeamRecords } from "@shared/schema";

/**
 * Anything that can produce the games of a normalized season week.
 */
export interface IScheduleSource {
  fetchWeek(year: number, week: number): Promise<GameRecord[]>;
}

export interface RenderOptions {
  format: OutputFormat;
  includeQuality?: boolean;
  teamRecords?: TeamRecords;
  includeDeepLinks?: boolean;
  /** Overrides the configured provider prefix */
  deepLinkBaseUrl?: string;
}

export interface RenderWeekOptions {
  format: OutputFormat;
  includeQuality?: boolean;
  includeRecords?: boolean;
  includeDeepLinks?: boolean;
}

export interface LoadSeasonOptions {
  includePostseason?: boolean;
}
