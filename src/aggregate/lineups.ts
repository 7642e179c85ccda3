import path from "node:path";
import {
  LINEUP_VIEWS,
  leagueEndpoints,
  lineupPayloadSchema,
  type LeagueMember,
  type LineupPayload,
  type LineupTeam,
} from "../crawl/leagueResources";
import { enumerateDescriptors, fetchWithFallback, type FallbackDeps } from "../crawl/viewFallback";
import { writeJsonAtomic } from "../store/atomicWriter";
import { fetchSeasonSettings, resolveScoringPeriods, type LeagueRequestContext } from "./transactions";

// Slot ids the league API uses for bench (20) and injured reserve (21).
// Any slot outside this set is counted as started, including slot types
// the API may add later.
export const NON_STARTING_SLOTS: ReadonlySet<number> = new Set([20, 21]);

export interface LineupRow {
  week: number;
  team: string;
  player_id: string;
  started: boolean;
  points: number | null;
}

export interface WeekLineups {
  season: number;
  week: number;
  view: string | null;
  lineups: LineupRow[];
}

export function buildTeamName(team: LineupTeam, membersById: ReadonlyMap<string, LeagueMember>): string {
  let name = team.name ?? "";
  if (!name) {
    name = `${team.location ?? ""} ${team.nickname ?? ""}`.trim();
  }
  if (!name) {
    const ownerId = team.owners?.[0];
    const owner = ownerId !== undefined ? membersById.get(ownerId) : undefined;
    name = owner?.displayName || owner?.firstName || "";
  }
  return name || `Team ${team.id ?? "unknown"}`;
}

export function parseLineups(payload: LineupPayload, week: number): LineupRow[] {
  const membersById = new Map<string, LeagueMember>();
  for (const member of payload.members ?? []) {
    if (member.id) {
      membersById.set(member.id, member);
    }
  }

  const rows: LineupRow[] = [];
  for (const team of payload.teams) {
    const teamName = buildTeamName(team, membersById);
    for (const entry of team.roster?.entries ?? []) {
      if (entry.playerId === null || entry.playerId === undefined) {
        continue;
      }
      rows.push({
        week,
        team: teamName,
        player_id: String(entry.playerId),
        started: !NON_STARTING_SLOTS.has(entry.lineupSlotId ?? -1),
        points: entry.appliedStatTotal ?? null,
      });
    }
  }
  return rows;
}

export async function pullWeekLineups(
  deps: FallbackDeps,
  ctx: LeagueRequestContext,
  season: number,
  week: number,
): Promise<WeekLineups> {
  const result = await fetchWithFallback(deps, {
    resource: `lineups:${season}:${week}`,
    descriptors: enumerateDescriptors(leagueEndpoints(ctx.host, season, ctx.leagueId), [LINEUP_VIEWS], [undefined], {
      scoringPeriodId: week,
    }),
    schema: lineupPayloadSchema,
    headers: ctx.headers,
  });

  if (result.kind === "exhausted") {
    return { season, week, view: null, lineups: [] };
  }
  return { season, week, view: result.view, lineups: parseLineups(result.payload, week) };
}

export function weekLineupsPath(outputDir: string, season: number, week: number): string {
  return path.join(outputDir, String(season), `week-${week}.json`);
}

export async function writeWeekLineups(outputDir: string, payload: WeekLineups): Promise<string> {
  const outputPath = weekLineupsPath(outputDir, payload.season, payload.week);
  await writeJsonAtomic(outputPath, payload, { pretty: true });
  return outputPath;
}

export interface SeasonLineupSummary {
  season: number;
  weeks: number;
  rows: number;
  paths: string[];
}

/** Writes one file per scoring period; weeks the API has no teams for are written empty. */
export async function pullSeasonLineups(
  deps: FallbackDeps,
  ctx: LeagueRequestContext,
  season: number,
  outputDir: string,
): Promise<SeasonLineupSummary> {
  const settings = await fetchSeasonSettings(deps, ctx, season);
  const weeks = resolveScoringPeriods(settings, ctx.maxScoringPeriod);
  const paths: string[] = [];
  let rows = 0;

  for (let week = 1; week <= weeks; week += 1) {
    const payload = await pullWeekLineups(deps, ctx, season, week);
    paths.push(await writeWeekLineups(outputDir, payload));
    rows += payload.lineups.length;
    deps.logger.info("lineups_week_complete", { season, scoringPeriodId: week, rows: payload.lineups.length });
  }

  return { season, weeks, rows, paths };
}

export interface CombinedLineupSummary {
  league_id: string;
  start_season: number;
  end_season: number;
  generated_at: string;
  by_season: Record<string, number>;
  weeks_by_season: Record<string, number>;
}

export function combineLineupSummaries(
  leagueId: string,
  startSeason: number,
  endSeason: number,
  seasons: readonly SeasonLineupSummary[],
  now: () => Date = () => new Date(),
): CombinedLineupSummary {
  const bySeason: Record<string, number> = {};
  const weeksBySeason: Record<string, number> = {};
  for (const summary of seasons) {
    bySeason[String(summary.season)] = summary.rows;
    weeksBySeason[String(summary.season)] = summary.weeks;
  }
  return {
    league_id: leagueId,
    start_season: startSeason,
    end_season: endSeason,
    generated_at: now().toISOString(),
    by_season: bySeason,
    weeks_by_season: weeksBySeason,
  };
}

export function combinedLineupsPath(outputDir: string, startSeason: number, endSeason: number): string {
  return path.join(outputDir, `lineups_${startSeason}_${endSeason}.json`);
}
