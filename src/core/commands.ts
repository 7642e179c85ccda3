import { requireLeagueId, type AppConfig } from "../config";
import {
  combineLineupSummaries,
  combinedLineupsPath,
  pullSeasonLineups,
  type SeasonLineupSummary,
} from "../aggregate/lineups";
import {
  combineSeasons,
  combinedTransactionsPath,
  pullSeasonTransactions,
  writeSeasonTransactions,
  type LeagueRequestContext,
  type SeasonTransactions,
} from "../aggregate/transactions";
import { pullAthletesIndex } from "../crawl/athletesIndex";
import { buildLeagueHeaders } from "../crawl/leagueResources";
import type { FallbackDeps } from "../crawl/viewFallback";
import { crawlAthletesById, type AthleteCrawlSummary } from "../download/athleteCrawler";
import type { Logger, MetricsRegistry } from "../observability";
import { readIdQueue, selectWindow, writeIdQueue } from "../queue/idQueue";
import { CrawlLog, writeJsonAtomic, type RunStore } from "../store";
import { loadCredential } from "./credentials";
import { ConfigurationError } from "./errors";
import type { FetchLike } from "./fetch";
import { RetryClient } from "./retryClient";

export interface CommandContext {
  runId: string;
  config: AppConfig;
  store: RunStore;
  logger: Logger;
  metrics: MetricsRegistry;
  fetchFn: FetchLike;
  env: NodeJS.ProcessEnv;
  /** Replaces every wait (retry backoff and crawl delay); tests pass a no-op. */
  sleep?: (ms: number) => Promise<void>;
}

export interface IdCrawlOptions {
  idCsv?: string;
  start: number;
  limit: number;
}

function createClient(ctx: CommandContext, followRedirects: boolean, defaultHeaders?: Record<string, string>): RetryClient {
  return new RetryClient({
    fetchFn: ctx.fetchFn,
    logger: ctx.logger.child("http"),
    metrics: ctx.metrics,
    maxAttempts: ctx.config.maxFetchAttempts,
    backoffBase: ctx.config.retryBackoffBase,
    unitMs: ctx.config.retryUnitMs,
    timeoutMs: ctx.config.requestTimeoutMs,
    defaultHeaders,
    followRedirects,
    sleep: ctx.sleep,
  });
}

function athleteHeaders(config: AppConfig): Record<string, string> {
  return {
    Accept: "application/json,text/plain,*/*",
    "User-Agent": config.userAgent,
  };
}

function seasonRange(config: AppConfig): number[] {
  if (config.startSeason > config.endSeason) {
    throw new ConfigurationError(
      `Start season ${config.startSeason} is after end season ${config.endSeason}.`,
    );
  }
  const seasons: number[] = [];
  for (let season = config.startSeason; season <= config.endSeason; season += 1) {
    seasons.push(season);
  }
  return seasons;
}

// Everything a league command needs is resolved before the first request.
function prepareLeague(ctx: CommandContext): { deps: FallbackDeps; league: LeagueRequestContext; seasons: number[] } {
  const seasons = seasonRange(ctx.config);
  const leagueId = requireLeagueId(ctx.config);
  const cookie = loadCredential(ctx.env);
  return {
    seasons,
    deps: {
      client: createClient(ctx, false),
      logger: ctx.logger,
      metrics: ctx.metrics,
      debugPath: ctx.config.debugPath,
    },
    league: {
      host: ctx.config.fantasyHost,
      leagueId,
      headers: buildLeagueHeaders(leagueId, cookie, ctx.config.userAgent),
      maxScoringPeriod: ctx.config.maxScoringPeriod,
    },
  };
}

async function trackRun<T>(ctx: CommandContext, command: string, action: () => Promise<T>): Promise<T> {
  await ctx.store.startRun(ctx.runId, command, new Date().toISOString());
  try {
    const result = await action();
    await ctx.store.finishRun(ctx.runId, "completed", new Date().toISOString());
    return result;
  } catch (error) {
    await ctx.store.finishRun(ctx.runId, "failed", new Date().toISOString());
    throw error;
  }
}

export async function runTransactions(ctx: CommandContext): Promise<void> {
  const { deps, league, seasons } = prepareLeague(ctx);
  const outputDir = ctx.config.outputDirs.transactions;

  await trackRun(ctx, "transactions", async () => {
    ctx.logger.info("transactions_start", { leagueId: league.leagueId, seasons });
    const pulled: SeasonTransactions[] = [];

    for (const season of seasons) {
      const stopTimer = ctx.metrics.startTimer("season_ms");
      const payload = await pullSeasonTransactions(deps, league, season);
      const outputPath = await writeSeasonTransactions(outputDir, payload);
      await ctx.store.recordDatasetCount({
        dataset: "transactions",
        season,
        count: payload.transactions.length,
        runId: ctx.runId,
        updatedAt: new Date().toISOString(),
      });
      pulled.push(payload);
      ctx.logger.info("transactions_season_saved", {
        season,
        count: payload.transactions.length,
        path: outputPath,
        durationMs: stopTimer(),
      });
    }

    const combined = combineSeasons(league.leagueId, ctx.config.startSeason, ctx.config.endSeason, pulled);
    const combinedPath = combinedTransactionsPath(outputDir, ctx.config.startSeason, ctx.config.endSeason);
    await writeJsonAtomic(combinedPath, combined, { pretty: true });
    ctx.logger.info("transactions_complete", { count: combined.transactions.length, path: combinedPath });
  });
}

export async function runLineups(ctx: CommandContext): Promise<void> {
  const { deps, league, seasons } = prepareLeague(ctx);
  const outputDir = ctx.config.outputDirs.lineups;

  await trackRun(ctx, "lineups", async () => {
    ctx.logger.info("lineups_start", { leagueId: league.leagueId, seasons });
    const summaries: SeasonLineupSummary[] = [];

    for (const season of seasons) {
      const stopTimer = ctx.metrics.startTimer("season_ms");
      const summary = await pullSeasonLineups(deps, league, season, outputDir);
      await ctx.store.recordDatasetCount({
        dataset: "lineups",
        season,
        count: summary.rows,
        runId: ctx.runId,
        updatedAt: new Date().toISOString(),
      });
      summaries.push(summary);
      ctx.logger.info("lineups_season_saved", { season, weeks: summary.weeks, rows: summary.rows, durationMs: stopTimer() });
    }

    const combined = combineLineupSummaries(league.leagueId, ctx.config.startSeason, ctx.config.endSeason, summaries);
    const combinedPath = combinedLineupsPath(outputDir, ctx.config.startSeason, ctx.config.endSeason);
    await writeJsonAtomic(combinedPath, combined, { pretty: true });
    ctx.logger.info("lineups_complete", { path: combinedPath });
  });
}

export async function runAthletesIndex(ctx: CommandContext): Promise<void> {
  const client = createClient(ctx, true, athleteHeaders(ctx.config));

  await trackRun(ctx, "athletes-index", async () => {
    ctx.logger.info("athletes_index_start", { url: ctx.config.athletesUrl, resume: ctx.config.resume });
    const summary = await pullAthletesIndex(
      { client, logger: ctx.logger, metrics: ctx.metrics },
      {
        baseUrl: ctx.config.athletesUrl,
        outputDir: ctx.config.outputDirs.athletesIndex,
        pageSize: ctx.config.indexPageSize,
        maxPages: ctx.config.maxPages,
        resume: ctx.config.resume,
      },
    );
    await ctx.store.recordDatasetCount({
      dataset: "athletes_index",
      season: ctx.config.endSeason,
      count: summary.count,
      runId: ctx.runId,
      updatedAt: new Date().toISOString(),
    });
    ctx.logger.info("athletes_index_complete", { ...summary });
  });
}

async function crawlQueue(ctx: CommandContext, command: string, ids: readonly number[]): Promise<AthleteCrawlSummary> {
  const client = createClient(ctx, true, athleteHeaders(ctx.config));

  return trackRun(ctx, command, async () => {
    const summary = await crawlAthletesById(
      {
        client,
        logger: ctx.logger,
        metrics: ctx.metrics,
        crawlLog: new CrawlLog(ctx.config.crawlLogPath),
        delay: ctx.sleep,
      },
      {
        baseUrl: ctx.config.athletesUrl,
        outputDir: ctx.config.outputDirs.athletesById,
        ids,
        resume: ctx.config.resume,
        minDelayMs: ctx.config.minDelayMs,
        maxDelayMs: ctx.config.maxDelayMs,
      },
    );
    await ctx.store.recordDatasetCount({
      dataset: "athletes_by_id",
      season: ctx.config.endSeason,
      count: summary.ok,
      runId: ctx.runId,
      updatedAt: new Date().toISOString(),
    });
    return summary;
  });
}

export async function runAthletesById(ctx: CommandContext, options: IdCrawlOptions): Promise<AthleteCrawlSummary> {
  const ids = selectWindow(await readIdQueue(options.idCsv ?? ctx.config.idQueuePath), options.start, options.limit);
  return crawlQueue(ctx, "athletes-by-id", ids);
}

/** Rewrites the missing-id report as a queue and crawls it; nothing to do when it is empty. */
export async function runFetchMissing(ctx: CommandContext, missingCsv?: string): Promise<AthleteCrawlSummary | undefined> {
  const count = await writeIdQueue(missingCsv ?? ctx.config.missingIdsPath, ctx.config.missingQueuePath);
  if (count === 0) {
    ctx.logger.info("fetch_missing_empty", { path: missingCsv ?? ctx.config.missingIdsPath });
    return undefined;
  }
  ctx.logger.info("fetch_missing_start", { count, queuePath: ctx.config.missingQueuePath });
  return crawlQueue(ctx, "fetch-missing", await readIdQueue(ctx.config.missingQueuePath));
}

export async function runStatus(ctx: CommandContext): Promise<void> {
  ctx.logger.info("status_start");
  const stats = await ctx.store.getStats();
  ctx.logger.info("status_complete", { stats });
}
