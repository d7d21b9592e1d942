import path from "path";
import { pathToFileURL } from "url";
import { ScheduleAgent } from "./agents/scheduleAgent";
import { withSource } from "./logger";
import { listGames } from "./render/presenter";
import { AccessDeniedError, DomainError, logError } from "./types/errors";

const log = withSource("cli");

const USAGE = `Usage: tsx server/cli.ts <year> <week> [--html] [--quality] [--records]

  year       Season year (the year of week 1, not the calendar year of the game)
  week       A week number (1-22) or a playoff round: wild card, divisional,
             championship, super bowl

  --html     Output HTML with links to the game video provider instead of plain text
  --quality  Annotate regular-season games as good or bad
  --records  Prefix each team with its record going into the week
`;

export interface CliArgs {
  year: string;
  week: string;
  html: boolean;
  quality: boolean;
  records: boolean;
}

/**
 * Positional year and week; a multi-word round name may be passed unquoted.
 */
export function parseArgs(argv: string[]): CliArgs | undefined {
  const flags = new Set(argv.filter((arg) => arg.startsWith("--")));
  const positional = argv.filter((arg) => !arg.startsWith("--"));
  if (positional.length < 2) {
    return undefined;
  }

  const unknown = Array.from(flags).filter((flag) => !["--html", "--quality", "--records"].includes(flag));
  if (unknown.length > 0) {
    throw new DomainError(`Unknown option(s): ${unknown.join(", ")}`);
  }

  return {
    year: positional[0],
    week: positional.slice(1).join(" "),
    html: flags.has("--html"),
    quality: flags.has("--quality"),
    records: flags.has("--records"),
  };
}

export function exitCodeFor(err: unknown): number {
  if (err instanceof AccessDeniedError) return 3;
  if (err instanceof DomainError) return 2;
  return 1;
}

export async function runCli(argv: string[], agent: ScheduleAgent = new ScheduleAgent()): Promise<string> {
  const args = parseArgs(argv);
  if (!args) {
    return USAGE;
  }

  if (args.html || args.quality || args.records) {
    return agent.renderWeek(args.year, args.week, {
      format: args.html ? "html" : "text",
      includeDeepLinks: args.html,
      includeQuality: args.quality,
      includeRecords: args.records,
    });
  }

  return listGames(await agent.getWeek(args.year, args.week));
}

async function main() {
  const output = await runCli(process.argv.slice(2));
  process.stdout.write(output.endsWith("\n") ? output : `${output}\n`);
}

const invokedDirectly =
  process.argv[1] !== undefined && pathToFileURL(path.resolve(process.argv[1])).href === import.meta.url;

if (invokedDirectly) {
  main().catch((err: unknown) => {
    logError(log, err, { operation: "cli", argv: process.argv.slice(2) });
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = exitCodeFor(err);
  });
}
