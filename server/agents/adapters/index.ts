/**
 * Adapters Module
 *
 * Central export point for the schedule source adapter and its box score parser.
 */

export { ProFootballReferenceAdapter, sortByKickoff } from './pfrAdapter';
export type { PfrAdapterOptions } from './pfrAdapter';
export { parseBoxscore, parseTitleTeams, parseKickoff, verifyReparse } from './boxscoreParser';
export type { ParseBoxscoreOptions, ReparseResult } from './boxscoreParser';
