import { loadConfig, type AppConfig } from "../config";
import {
  runAthletesById,
  runAthletesIndex,
  runFetchMissing,
  runLineups,
  runStatus,
  runTransactions,
  type CommandContext,
} from "../core/commands";
import { createFetch, type FetchLike } from "../core/fetch";
import { createRunId, Logger, MetricsRegistry, parseLogLevel } from "../observability";
import { createStore } from "../store";

export type CommandName = "transactions" | "lineups" | "athletes-index" | "athletes-by-id" | "fetch-missing" | "status";

const COMMANDS: readonly CommandName[] = [
  "transactions",
  "lineups",
  "athletes-index",
  "athletes-by-id",
  "fetch-missing",
  "status",
];

export interface ParsedCliArgs {
  command: CommandName;
  resume: boolean;
  ignoreHttpsErrors: boolean;
  start: number;
  limit: number;
  maxPages?: number;
  idCsv?: string;
  missingCsv?: string;
  configPath?: string;
}

export interface CliRuntime {
  env?: NodeJS.ProcessEnv;
  fetchFn?: FetchLike;
}

const HELP_TEXT = `
Usage:
  fantasy-ingest <command> [options]

Commands:
  transactions     Pull league transactions for each season in range
  lineups          Pull weekly lineups for each season in range
  athletes-index   Page through the athletes index and build the name map
  athletes-by-id   Fetch one athlete record per id in the queue
  fetch-missing    Build a queue from the missing-id report and fetch it
  status           Show recorded runs and dataset counts

Options:
  --config <path>        Optional path to JSON config file
  --resume               Skip work finished by an earlier run
  --start <n>            First queue position to crawl (default 0)
  --limit <n>            Number of queue entries to crawl (default all)
  --id-csv <path>        Identifier queue for athletes-by-id
  --missing-csv <path>   Missing-id report for fetch-missing
  --max-pages <n>        Cap on athletes index pages
  --ignore-https-errors  Ignore TLS certificate errors (use only when required)
  -h, --help             Show this help
`;

function parseCommand(raw: string | undefined): CommandName | undefined {
  return COMMANDS.find((command) => command === raw);
}

function optionValue(argv: string[], flag: string): string | undefined {
  const index = argv.indexOf(flag);
  return index >= 0 ? argv[index + 1] : undefined;
}

function intOption(argv: string[], flag: string): number | undefined {
  const raw = optionValue(argv, flag);
  const parsed = raw ? Number.parseInt(raw, 10) : undefined;
  return parsed !== undefined && Number.isFinite(parsed) ? parsed : undefined;
}

export function parseCliArgs(argv: string[]): ParsedCliArgs | "help" {
  if (argv.includes("-h") || argv.includes("--help")) {
    return "help";
  }

  const command = parseCommand(argv[0]);
  if (!command) {
    return "help";
  }

  return {
    command,
    resume: argv.includes("--resume"),
    ignoreHttpsErrors: argv.includes("--ignore-https-errors"),
    start: intOption(argv, "--start") ?? 0,
    limit: intOption(argv, "--limit") ?? 0,
    maxPages: intOption(argv, "--max-pages"),
    idCsv: optionValue(argv, "--id-csv"),
    missingCsv: optionValue(argv, "--missing-csv"),
    configPath: optionValue(argv, "--config"),
  };
}

export function applyCliOverrides(config: AppConfig, parsed: ParsedCliArgs): AppConfig {
  return {
    ...config,
    resume: parsed.resume || config.resume,
    ignoreHttpsErrors: parsed.ignoreHttpsErrors || config.ignoreHttpsErrors,
    maxPages: parsed.maxPages ?? config.maxPages,
  };
}

async function dispatch(parsed: ParsedCliArgs, context: CommandContext): Promise<void> {
  const logger = context.logger.child(parsed.command);
  switch (parsed.command) {
    case "transactions":
      await runTransactions({ ...context, logger });
      break;
    case "lineups":
      await runLineups({ ...context, logger });
      break;
    case "athletes-index":
      await runAthletesIndex({ ...context, logger });
      break;
    case "athletes-by-id":
      await runAthletesById({ ...context, logger }, { idCsv: parsed.idCsv, start: parsed.start, limit: parsed.limit });
      break;
    case "fetch-missing":
      await runFetchMissing({ ...context, logger }, parsed.missingCsv);
      break;
    case "status":
      await runStatus({ ...context, logger });
      break;
  }
}

export async function runCli(argv: string[], runtime: CliRuntime = {}): Promise<number> {
  const parsed = parseCliArgs(argv);
  if (parsed === "help") {
    console.log(HELP_TEXT.trim());
    return 0;
  }

  const env = runtime.env ?? process.env;
  const config = applyCliOverrides(loadConfig(parsed.configPath, env), parsed);
  const runId = createRunId(parsed.command);
  const store = createStore(config);
  const metrics = new MetricsRegistry();
  const logger = new Logger({ component: "cli", runId, minLevel: parseLogLevel(env.LOG_LEVEL) });
  const context: CommandContext = {
    runId,
    config,
    store,
    logger,
    metrics,
    env,
    fetchFn: runtime.fetchFn ?? createFetch(config.ignoreHttpsErrors),
  };

  logger.info("command_start", {
    command: parsed.command,
    resume: config.resume,
    ignoreHttpsErrors: config.ignoreHttpsErrors,
    start: parsed.start,
    limit: parsed.limit,
    maxPages: config.maxPages,
  });

  try {
    await dispatch(parsed, context);
    logger.info("command_complete", { command: parsed.command });
    return 0;
  } finally {
    await store.close();
    metrics.printSummary({ runId, command: parsed.command });
  }
}

export function getHelpText(): string {
  return HELP_TEXT.trim();
}
