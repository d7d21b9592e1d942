import type { CheerioAPI } from 'cheerio';
import { format, isValid, parse } from 'date-fns';
import type { GameRecord, LineScore, OvertimeScore } from '@shared/schema';
import { withSource } from '../../logger';
import { ParseError, type ErrorDetails } from '../../types/errors';
import { HTMLParser, type Selection } from '../../utils/scraping/parser';

const log = withSource('boxscoreParser');

export interface ParseBoxscoreOptions {
  /** Where the document came from; recorded on the game and in errors */
  url?: string;
}

export const LOCAL_DATE_TIME_FORMAT = "yyyy-MM-dd'T'HH:mm:ss";

const START_TIME_LABEL = 'Start Time';
const KICKOFF_FORMATS = ['MMM d, yyyy h:mma', 'MMMM d, yyyy h:mma'];
const WEEKDAY_PREFIX = /^(monday|tuesday|wednesday|thursday|friday|saturday|sunday),?\s+/i;

// Title shapes:
//   New Orleans Saints at Green Bay Packers - September 8th, 2011 | Pro-Football-Reference.com
//   Wild Card - Atlanta Falcons at Arizona Cardinals - January 3rd, 2009 | ...
//   Dallas Cowboys  at  Tampa Bay Buccaneers - September 9th, 2021 - Raymond James Stadium | ...
//   Super Bowl games use "vs." instead of "at"
const TEAM_SEPARATOR = / at | vs\. /;

/**
 * Split a box score title into away and home team names.
 */
export function parseTitleTeams(title: string, context?: ErrorDetails): { teamAway: string; teamHome: string } {
  const match = TEAM_SEPARATOR.exec(title);
  if (!match) {
    throw new ParseError(`Could not parse title: ${title}`, { title, ...context });
  }

  let teamAway = title.slice(0, match.index).trim();
  let teamHome = title.slice(match.index + match[0].length).trim();

  // Drop a leading "<round> - " from the away side
  if (teamAway.includes(' - ')) {
    teamAway = teamAway.split(' - ')[1].trim();
  }
  // Drop " - <date>[ - <stadium>] | <site>" from the home side
  if (teamHome.includes(' - ')) {
    teamHome = teamHome.split(' - ')[0].trim();
  }

  if (!teamAway || !teamHome) {
    throw new ParseError(`Could not find both teams in title: ${title}`, { title, ...context });
  }
  return { teamAway, teamHome };
}

/**
 * Turn "Thursday Sep 8, 2011" and "8:40pm" into a naive local timestamp,
 * 2011-09-08T20:40:00. The source does not say which time zone it uses, so no
 * offset is attached.
 */
export function parseKickoff(dateText: string, timeText: string, context?: ErrorDetails): string {
  const date = HTMLParser.cleanText(dateText).replace(WEEKDAY_PREFIX, '');
  const time = timeText.replace(/\s+/g, '').replace(/\./g, '').toLowerCase();
  const text = `${date} ${time}`;

  for (const pattern of KICKOFF_FORMATS) {
    const parsed = parse(text, pattern, new Date(2000, 0, 1));
    if (isValid(parsed)) {
      return format(parsed, LOCAL_DATE_TIME_FORMAT);
    }
  }
  throw new ParseError(`Could not parse kickoff time "${dateText} ${timeText}"`, {
    dateText,
    timeText,
    ...context,
  });
}

function parseLineScoreRow(
  $: CheerioAPI,
  row: Selection,
  expectedTeam: string,
  side: 'away' | 'home',
  context: ErrorDetails
): LineScore {
  const cells = row.find('td').toArray().map((cell) => $(cell).text());
  const rowContext = { ...context, side, columns: cells.length };

  // 7 cells: logo, name, q1..q4, final
  // 8 cells: logo, name, q1..q4, ot, final
  // 9 cells: logo, name, q1..q4, ot, ot2, final
  if (cells.length < 7 || cells.length > 9) {
    throw new ParseError(`Unexpected linescore column count ${cells.length} for ${side} team`, rowContext);
  }

  const nameCell = cells[1];
  if (!nameCell.includes(expectedTeam)) {
    throw new ParseError(`Linescore ${side} row does not match team ${expectedTeam}`, {
      ...rowContext,
      expectedTeam,
      nameCell: HTMLParser.cleanText(nameCell),
    });
  }

  const score = (index: number, what: string) => HTMLParser.parseInteger(cells[index], what, rowContext);

  let overtime: OvertimeScore = 0;
  if (cells.length === 8) {
    overtime = score(6, `${side} overtime`);
  } else if (cells.length === 9) {
    overtime = `${cells[6].trim()},${cells[7].trim()}`;
  }

  return [
    score(2, `${side} q1`),
    score(3, `${side} q2`),
    score(4, `${side} q3`),
    score(5, `${side} q4`),
    overtime,
    score(cells.length - 1, `${side} final`),
  ];
}

/**
 * Parse one box score page into a game record.
 *
 * Pure over the document text: the same markup always yields the same record.
 * @throws ParseError naming the element that was missing or unexpected
 */
export function parseBoxscore(boxscoreHtml: string, options: ParseBoxscoreOptions = {}): GameRecord {
  const context: ErrorDetails = options.url ? { url: options.url } : {};
  const $ = HTMLParser.load(boxscoreHtml);

  const titles = $.root().find('title');
  if (titles.length === 0) {
    throw new ParseError('Box score has no title', context);
  }
  const title = HTMLParser.cleanText(titles.first().text());
  const { teamAway, teamHome } = parseTitleTeams(title, context);

  // Scorebox: final scores, then the post-game records
  const scorebox = HTMLParser.expectCount($, 'div.scorebox', 1, context);
  const finalScores = HTMLParser.expectCount($, 'div.score', 2, context, scorebox)
    .toArray()
    .map((div, i) => HTMLParser.parseInteger($(div).text(), i === 0 ? 'away score' : 'home score', context));
  const [awayFinal, homeFinal] = finalScores;

  const recordStrings = scorebox
    .find('div')
    .toArray()
    .map((div) => $(div).text())
    .filter((text) => text.length < 10 && text.includes('-'))
    .map((text) => text.trim());
  if (recordStrings.length !== 2) {
    throw new ParseError(`Expected 2 team records in scorebox, found ${recordStrings.length}`, {
      ...context,
      records: recordStrings,
    });
  }
  const [awayRecord, homeRecord] = recordStrings;

  // Quarter-by-quarter scores
  const linescore = HTMLParser.expectCount($, 'table.linescore', 1, context);
  const rows = HTMLParser.expectCount($, 'tbody tr', 2, context, linescore);
  const awayScores = parseLineScoreRow($, rows.eq(0), teamAway, 'away', context);
  const homeScores = parseLineScoreRow($, rows.eq(1), teamHome, 'home', context);

  // Some pages list the two teams in opposite orders in the scorebox and the linescore
  if (awayFinal !== awayScores[5]) {
    if (awayFinal !== homeScores[5]) {
      throw new ParseError(`Away final score ${awayFinal} does not match the linescore`, { ...context, title });
    }
    log.warn({ title, ...context }, 'Box score has the home/away scores reversed');
  }
  if (homeFinal !== homeScores[5]) {
    if (homeFinal !== awayScores[5]) {
      throw new ParseError(`Home final score ${homeFinal} does not match the linescore`, { ...context, title });
    }
    log.warn({ title, ...context }, 'Box score has the away/home scores reversed');
  }

  // <div class="scorebox_meta"><div>Thursday Sep 8, 2011</div><div><strong>Start Time</strong>: 8:40pm</div>...
  const meta = HTMLParser.expectCount($, 'div.scorebox_meta', 1, context);
  const metaLines = meta.find('div').toArray().map((div) => $(div).text());
  if (metaLines.length < 2) {
    throw new ParseError('Scorebox meta block is missing its date or start time', context);
  }
  const [dateLine, timeLine] = metaLines;
  if (!timeLine.trim().startsWith(START_TIME_LABEL)) {
    throw new ParseError(`Expected a "${START_TIME_LABEL}" line, got "${HTMLParser.cleanText(timeLine)}"`, context);
  }
  const timeText = timeLine.slice(timeLine.indexOf(':') + 1);
  const startTime = parseKickoff(dateLine, timeText, context);

  return {
    teamAway,
    teamHome,
    startTime,
    awayScores,
    homeScores,
    awayRecord,
    homeRecord,
    boxscoreUrl: options.url,
    boxscoreHtml,
  };
}

export interface ReparseResult {
  identical: boolean;
  differences: string[];
}

/**
 * Re-run the parser over a stored game's markup and compare teams, scores and
 * start time with what was stored.
 */
export function verifyReparse(game: GameRecord): ReparseResult {
  if (game.boxscoreHtml === undefined) {
    return { identical: false, differences: ['boxscoreHtml'] };
  }

  const reparsed = parseBoxscore(game.boxscoreHtml, { url: game.boxscoreUrl });
  const differences: string[] = [];
  if (reparsed.teamAway !== game.teamAway) differences.push('teamAway');
  if (reparsed.teamHome !== game.teamHome) differences.push('teamHome');
  if (reparsed.startTime !== game.startTime) differences.push('startTime');
  if (!sameScores(reparsed.awayScores, game.awayScores)) differences.push('awayScores');
  if (!sameScores(reparsed.homeScores, game.homeScores)) differences.push('homeScores');

  return { identical: differences.length === 0, differences };
}

function sameScores(a: LineScore, b: LineScore): boolean {
  return a.every((value, i) => value === b[i]);
}
