import path from "node:path";
import { StructuralResponseError } from "../core/errors";
import { isJsonObject, type JsonObject } from "../core/payload";
import {
  leagueEndpoints,
  settingsPayloadSchema,
  teamsPayloadSchema,
  TRANSACTION_FILTERS,
  TRANSACTION_VIEWS,
  transactionsPayloadSchema,
  type SettingsPayload,
} from "../crawl/leagueResources";
import { enumerateDescriptors, fetchWithFallback, type FallbackDeps } from "../crawl/viewFallback";
import { writeJsonAtomic } from "../store/atomicWriter";

const DEFAULT_SCORING_PERIODS = 18;

export interface LeagueRequestContext {
  host: string;
  leagueId: string;
  headers: Record<string, string>;
  maxScoringPeriod: number;
}

export interface SeasonAccumulator {
  readonly transactions: readonly JsonObject[];
  readonly seenIds: ReadonlySet<string>;
  readonly duplicates: number;
}

export interface SeasonTransactions {
  season: number;
  league_id: string;
  generated_at: string;
  transactions: JsonObject[];
  teams: JsonObject[];
  members: JsonObject[];
}

export interface CombinedTransactions {
  league_id: string;
  start_season: number;
  end_season: number;
  generated_at: string;
  transactions: JsonObject[];
  by_season: Record<string, number>;
}

export const EMPTY_SEASON: SeasonAccumulator = { transactions: [], seenIds: new Set(), duplicates: 0 };

function toPeriodNumber(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.trunc(value);
  }
  if (typeof value === "string" && /^\s*-?\d+\s*$/.test(value)) {
    return Number.parseInt(value, 10);
  }
  return undefined;
}

/**
 * Number of scoring periods to walk: the final period when the league
 * reports one, else the current matchup period, clamped to [1, max].
 */
export function resolveScoringPeriods(settings: SettingsPayload | undefined, maxScoringPeriod: number): number {
  const status: JsonObject = settings?.status ?? {};
  const raw = status.finalScoringPeriod || status.currentMatchupPeriod;
  const periods = toPeriodNumber(raw) ?? DEFAULT_SCORING_PERIODS;
  return Math.max(1, Math.min(periods, maxScoringPeriod));
}

function stampDefault(record: JsonObject, key: string, value: unknown): void {
  if (!Object.prototype.hasOwnProperty.call(record, key)) {
    record[key] = value;
  }
}

function transactionKey(record: JsonObject): string | undefined {
  const id = record.id;
  if (typeof id === "string" || typeof id === "number") {
    return `${typeof id}:${id}`;
  }
  return undefined;
}

/**
 * Folds one scoring period into the season. The first period to report a
 * transaction id owns it; later copies are counted and dropped. Items with no
 * id cannot be deduplicated and are always kept.
 */
export function mergePeriodTransactions(
  acc: SeasonAccumulator,
  season: number,
  scoringPeriodId: number,
  items: readonly unknown[],
  view: string | undefined,
): SeasonAccumulator {
  const transactions = [...acc.transactions];
  const seenIds = new Set(acc.seenIds);
  let duplicates = acc.duplicates;

  for (const item of items) {
    if (!isJsonObject(item)) {
      continue;
    }
    const record: JsonObject = { ...item };
    stampDefault(record, "season", season);
    stampDefault(record, "scoringPeriodId", scoringPeriodId);
    if (view) {
      stampDefault(record, "__view", view);
    }

    const key = transactionKey(record);
    if (key !== undefined && seenIds.has(key)) {
      duplicates += 1;
      continue;
    }
    if (key !== undefined) {
      seenIds.add(key);
    }
    transactions.push(record);
  }

  return { transactions, seenIds, duplicates };
}

export async function fetchSeasonSettings(
  deps: FallbackDeps,
  ctx: LeagueRequestContext,
  season: number,
): Promise<SettingsPayload> {
  const result = await fetchWithFallback(deps, {
    resource: `settings:${season}`,
    descriptors: enumerateDescriptors(leagueEndpoints(ctx.host, season, ctx.leagueId), [["mSettings"]]),
    schema: settingsPayloadSchema,
    headers: ctx.headers,
  });
  if (result.kind === "exhausted") {
    throw new StructuralResponseError(
      `League settings unavailable for season ${season} after ${result.failures.length} attempts`,
    );
  }
  return result.payload;
}

export async function fetchPeriodTransactions(
  deps: FallbackDeps,
  ctx: LeagueRequestContext,
  season: number,
  scoringPeriodId: number,
): Promise<{ items: unknown[]; view?: string }> {
  const descriptors = enumerateDescriptors(
    leagueEndpoints(ctx.host, season, ctx.leagueId),
    TRANSACTION_VIEWS.map((view) => [view]),
    TRANSACTION_FILTERS,
    { scoringPeriodId },
  );
  const result = await fetchWithFallback(deps, {
    resource: `transactions:${season}:${scoringPeriodId}`,
    descriptors,
    schema: transactionsPayloadSchema,
    headers: ctx.headers,
  });
  if (result.kind === "exhausted") {
    return { items: [] };
  }
  return { items: result.payload.transactions, view: result.view };
}

export async function pullSeasonTransactions(
  deps: FallbackDeps,
  ctx: LeagueRequestContext,
  season: number,
  now: () => Date = () => new Date(),
): Promise<SeasonTransactions> {
  const settings = await fetchSeasonSettings(deps, ctx, season);
  const periods = resolveScoringPeriods(settings, ctx.maxScoringPeriod);
  deps.logger.info("transactions_season_start", { season, periods });

  let acc = EMPTY_SEASON;
  for (let scoringPeriodId = 1; scoringPeriodId <= periods; scoringPeriodId += 1) {
    const { items, view } = await fetchPeriodTransactions(deps, ctx, season, scoringPeriodId);
    const before = acc.transactions.length;
    acc = mergePeriodTransactions(acc, season, scoringPeriodId, items, view);
    deps.logger.info("transactions_period_complete", {
      season,
      scoringPeriodId,
      view: view ?? null,
      received: items.length,
      kept: acc.transactions.length - before,
    });
  }
  deps.metrics.incrementCounter("transactions_kept", acc.transactions.length);
  deps.metrics.incrementCounter("transactions_duplicate", acc.duplicates);

  const teamResult = await fetchWithFallback(deps, {
    resource: `teams:${season}`,
    descriptors: enumerateDescriptors(leagueEndpoints(ctx.host, season, ctx.leagueId), [["mTeam"]]),
    schema: teamsPayloadSchema,
    headers: ctx.headers,
  });

  return {
    season,
    league_id: ctx.leagueId,
    generated_at: now().toISOString(),
    transactions: [...acc.transactions],
    teams: teamResult.kind === "matched" ? teamResult.payload.teams : [],
    members: teamResult.kind === "matched" ? teamResult.payload.members ?? [] : [],
  };
}

export function combineSeasons(
  leagueId: string,
  startSeason: number,
  endSeason: number,
  seasons: readonly SeasonTransactions[],
  now: () => Date = () => new Date(),
): CombinedTransactions {
  const bySeason: Record<string, number> = {};
  const transactions: JsonObject[] = [];
  for (const season of seasons) {
    bySeason[String(season.season)] = season.transactions.length;
    transactions.push(...season.transactions);
  }
  return {
    league_id: leagueId,
    start_season: startSeason,
    end_season: endSeason,
    generated_at: now().toISOString(),
    transactions,
    by_season: bySeason,
  };
}

export function seasonTransactionsPath(outputDir: string, season: number): string {
  return path.join(outputDir, `transactions_${season}.json`);
}

export function combinedTransactionsPath(outputDir: string, startSeason: number, endSeason: number): string {
  return path.join(outputDir, `transactions_${startSeason}_${endSeason}.json`);
}

export async function writeSeasonTransactions(outputDir: string, payload: SeasonTransactions): Promise<string> {
  const outputPath = seasonTransactionsPath(outputDir, payload.season);
  await writeJsonAtomic(outputPath, payload, { pretty: true });
  return outputPath;
}
