import { z } from "zod";

export const playoffRounds = ["wildcard", "divisional", "championship", "superbowl"] as const;

export const playoffRoundSchema = z.enum(playoffRounds);
export type PlayoffRound = z.infer<typeof playoffRoundSchema>;

/**
 * A week as a caller names it: a number, a numeral string, or a playoff round.
 */
export const weekDesignatorSchema = z.discriminatedUnion("kind", [
  z.object({ kind: z.literal("numeric"), week: z.number() }),
  z.object({ kind: z.literal("numeral"), text: z.string() }),
  z.object({ kind: z.literal("round"), round: playoffRoundSchema }),
]);
export type WeekDesignator = z.infer<typeof weekDesignatorSchema>;

// Second-overtime games keep the raw "ot1,ot2" text in the overtime slot
export const overtimeScoreSchema = z.union([z.number().int().nonnegative(), z.string().min(1)]);
export type OvertimeScore = z.infer<typeof overtimeScoreSchema>;

const points = z.number().int().nonnegative();

/** [q1, q2, q3, q4, overtime, final] */
export const lineScoreSchema = z.tuple([points, points, points, points, overtimeScoreSchema, points]);
export type LineScore = z.infer<typeof lineScoreSchema>;

export const gameQualitySchema = z.enum(["good", "bad"]);
export type GameQuality = z.infer<typeof gameQualitySchema>;

// Naive wall-clock time as published, e.g. 2011-09-08T20:40:00 (no offset)
export const localDateTimeSchema = z
  .string()
  .regex(/^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}$/, "Expected yyyy-MM-ddTHH:mm:ss");

export const gameRecordSchema = z.object({
  teamAway: z.string().min(1),
  teamHome: z.string().min(1),
  startTime: localDateTimeSchema,
  awayScores: lineScoreSchema,
  homeScores: lineScoreSchema,
  awayRecord: z.string(),
  homeRecord: z.string(),
  boxscoreUrl: z.string().optional(),
  boxscoreHtml: z.string().optional(),
  quality: gameQualitySchema.optional(),
});
export type GameRecord = z.infer<typeof gameRecordSchema>;

export const teamSeasonRecordSchema = z.object({
  wins: z.number().int().nonnegative(),
  losses: z.number().int().nonnegative(),
  ties: z.number().int().nonnegative(),
});
export type TeamSeasonRecord = z.infer<typeof teamSeasonRecordSchema>;

export type TeamRecords = ReadonlyMap<string, TeamSeasonRecord>;

export const outputFormats = ["text", "html"] as const;
export type OutputFormat = typeof outputFormats[number];

/** Game as exposed over the API: no cached markup. */
export type PublicGame = Omit<GameRecord, "boxscoreHtml">;

export function toPublicGame(game: GameRecord): PublicGame {
  const { boxscoreHtml: _html, ...rest } = game;
  return rest;
}
