import fs from "node:fs";
import path from "node:path";
import { z } from "zod";
import { ConfigurationError } from "../core/errors";
import { parseJson } from "../core/payload";
import type { AppConfig, ConfigOverrides } from "./types";

const DEFAULT_CONFIG: AppConfig = {
  leagueId: undefined,
  startSeason: 2025,
  endSeason: 2025,
  fantasyHost: "https://lm-api-reads.fantasy.espn.com/apis/v3/games/ffl",
  athletesUrl: "https://sports.core.api.espn.com/v3/sports/football/nfl/athletes",
  userAgent:
    "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/605.1.15 (KHTML, like Gecko) Version/17.0 Safari/605.1.15",
  ignoreHttpsErrors: false,
  requestTimeoutMs: 30_000,
  maxFetchAttempts: 6,
  retryBackoffBase: 1.4,
  retryUnitMs: 1_000,
  minDelayMs: 250,
  maxDelayMs: 750,
  resume: false,
  maxScoringPeriod: 18,
  indexPageSize: 200_000,
  maxPages: 0,
  outputDirs: {
    transactions: "data/espn_transactions",
    lineups: "data/espn_lineups",
    athletesIndex: "data/espn_core/index",
    athletesById: "data/espn_core/athletes_by_id",
  },
  crawlLogPath: "data/espn_core/pull_by_id_log.csv",
  idQueuePath: "data/espn_core/espn_id_queue.csv",
  missingIdsPath: "data/verify/espn_ids_missing.csv",
  missingQueuePath: "data/espn_core/espn_id_queue_missing.csv",
  debugPath: "data/debug/espn_fallback_debug.json",
  storePath: "data/state.sqlite",
};

const configFileSchema = z
  .object({
    leagueId: z.union([z.string(), z.number()]).transform(String),
    startSeason: z.number().int(),
    endSeason: z.number().int(),
    fantasyHost: z.string(),
    athletesUrl: z.string(),
    userAgent: z.string(),
    ignoreHttpsErrors: z.boolean(),
    requestTimeoutMs: z.number().int().positive(),
    maxFetchAttempts: z.number().int().positive(),
    retryBackoffBase: z.number().positive(),
    retryUnitMs: z.number().nonnegative(),
    minDelayMs: z.number().nonnegative(),
    maxDelayMs: z.number().nonnegative(),
    resume: z.boolean(),
    maxScoringPeriod: z.number().int().positive(),
    indexPageSize: z.number().int().positive(),
    maxPages: z.number().int().nonnegative(),
    outputDirs: z
      .object({
        transactions: z.string(),
        lineups: z.string(),
        athletesIndex: z.string(),
        athletesById: z.string(),
      })
      .partial(),
    crawlLogPath: z.string(),
    idQueuePath: z.string(),
    missingIdsPath: z.string(),
    missingQueuePath: z.string(),
    debugPath: z.string(),
    storePath: z.string(),
  })
  .partial()
  .strict();

function readConfigFile(configPath?: string): ConfigOverrides {
  if (!configPath) {
    return {};
  }

  const absolutePath = path.resolve(configPath);
  if (!fs.existsSync(absolutePath)) {
    throw new ConfigurationError(`Config file not found: ${absolutePath}`);
  }

  const raw = fs.readFileSync(absolutePath, "utf-8");
  const json = parseJson(raw);
  if (!json.ok) {
    throw new ConfigurationError(`Config file is not valid JSON: ${absolutePath}: ${json.error}`);
  }
  const parsed = configFileSchema.safeParse(json.value);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new ConfigurationError(`Invalid config file ${absolutePath}: ${issue.path.join(".")} ${issue.message}`);
  }
  return parsed.data;
}

function toInt(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseInt(value, 10);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toFloat(value: string | undefined, fallback: number): number {
  if (!value) {
    return fallback;
  }

  const parsed = Number.parseFloat(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function toBool(value: string | undefined, fallback: boolean): boolean {
  if (!value) {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (normalized === "1" || normalized === "true" || normalized === "yes") {
    return true;
  }
  if (normalized === "0" || normalized === "false" || normalized === "no") {
    return false;
  }
  return fallback;
}

export function loadConfig(configPath?: string, env: NodeJS.ProcessEnv = process.env): AppConfig {
  const fileConfig = readConfigFile(configPath);

  const merged: AppConfig = {
    ...DEFAULT_CONFIG,
    ...fileConfig,
    outputDirs: {
      ...DEFAULT_CONFIG.outputDirs,
      ...(fileConfig.outputDirs ?? {}),
    },
  };

  // SEASON pins a single season unless START_SEASON / END_SEASON widen it
  const season = toInt(env.SEASON, Number.NaN);
  const startSeason = toInt(env.START_SEASON, Number.isFinite(season) ? season : merged.startSeason);
  const endSeason = toInt(env.END_SEASON, Number.isFinite(season) ? season : merged.endSeason);

  return {
    ...merged,
    leagueId: env.ESPN_LEAGUE_ID ?? merged.leagueId,
    startSeason,
    endSeason,
    fantasyHost: env.ESPN_FANTASY_HOST ?? merged.fantasyHost,
    athletesUrl: env.ESPN_ATHLETES_URL ?? merged.athletesUrl,
    userAgent: env.USER_AGENT ?? merged.userAgent,
    ignoreHttpsErrors: toBool(env.IGNORE_HTTPS_ERRORS, merged.ignoreHttpsErrors),
    requestTimeoutMs: toInt(env.REQUEST_TIMEOUT_MS, merged.requestTimeoutMs),
    maxFetchAttempts: toInt(env.MAX_FETCH_ATTEMPTS, merged.maxFetchAttempts),
    retryBackoffBase: toFloat(env.RETRY_BACKOFF_BASE, merged.retryBackoffBase),
    retryUnitMs: toInt(env.RETRY_UNIT_MS, merged.retryUnitMs),
    minDelayMs: toInt(env.MIN_DELAY_MS, merged.minDelayMs),
    maxDelayMs: toInt(env.MAX_DELAY_MS, merged.maxDelayMs),
    resume: toBool(env.RESUME, merged.resume),
    maxScoringPeriod: toInt(env.MAX_SCORING_PERIOD, merged.maxScoringPeriod),
    indexPageSize: toInt(env.INDEX_PAGE_SIZE, merged.indexPageSize),
    maxPages: toInt(env.MAX_PAGES, merged.maxPages),
    crawlLogPath: env.CRAWL_LOG_PATH ?? merged.crawlLogPath,
    idQueuePath: env.ID_QUEUE_PATH ?? merged.idQueuePath,
    missingIdsPath: env.MISSING_IDS_PATH ?? merged.missingIdsPath,
    missingQueuePath: env.MISSING_QUEUE_PATH ?? merged.missingQueuePath,
    debugPath: env.DEBUG_PATH ?? merged.debugPath,
    storePath: env.STORE_PATH ?? merged.storePath,
    outputDirs: {
      transactions: env.OUTPUT_TRANSACTIONS_DIR ?? merged.outputDirs.transactions,
      lineups: env.OUTPUT_LINEUPS_DIR ?? merged.outputDirs.lineups,
      athletesIndex: env.OUTPUT_ATHLETES_INDEX_DIR ?? merged.outputDirs.athletesIndex,
      athletesById: env.OUTPUT_ATHLETES_BY_ID_DIR ?? merged.outputDirs.athletesById,
    },
  };
}

export function requireLeagueId(config: AppConfig): string {
  if (!config.leagueId) {
    throw new ConfigurationError("Missing ESPN_LEAGUE_ID environment variable.");
  }
  return config.leagueId;
}

export { DEFAULT_CONFIG };
