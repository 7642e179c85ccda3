import { z } from "zod";
import type { EndpointShape } from "./viewFallback";

export const TRANSACTION_VIEWS = ["mTransactions2", "mTransactions"] as const;
export const LINEUP_VIEWS = ["mMatchup", "mMatchupScore", "mTeam", "mRoster"] as const;
export const TRANSACTION_FILTERS = [undefined, { transactions: { limit: 2000, offset: 0 } }] as const;

/**
 * The same league-season is reachable under two URL shapes; the history one
 * is what older seasons usually answer on.
 */
export function leagueEndpoints(host: string, season: number, leagueId: string): readonly EndpointShape[] {
  const trimmed = host.replace(/\/+$/, "");
  return Object.freeze([
    Object.freeze({
      name: "season",
      url: `${trimmed}/seasons/${season}/segments/0/leagues/${leagueId}`,
      params: {},
    }),
    Object.freeze({
      name: "history",
      url: `${trimmed}/leagueHistory/${leagueId}`,
      params: { seasonId: season },
    }),
  ]);
}

export function buildLeagueHeaders(leagueId: string, cookie: string, userAgent: string): Record<string, string> {
  return {
    Accept: "application/json",
    "User-Agent": userAgent,
    Referer: `https://fantasy.espn.com/football/league?leagueId=${leagueId}`,
    Origin: "https://fantasy.espn.com",
    Cookie: cookie,
  };
}

const looseObject = z.record(z.unknown());

export const settingsPayloadSchema = z
  .object({
    status: looseObject.refine((status) => Object.keys(status).length > 0, "status is empty"),
  })
  .passthrough();

export type SettingsPayload = z.infer<typeof settingsPayloadSchema>;

export const teamsPayloadSchema = z
  .object({
    teams: z.array(looseObject).min(1, "teams is empty"),
    members: z.array(looseObject).optional(),
  })
  .passthrough();

export type TeamsPayload = z.infer<typeof teamsPayloadSchema>;

export const transactionsPayloadSchema = z
  .object({
    transactions: z.array(z.unknown()).min(1, "transactions is empty"),
  })
  .passthrough();

export type TransactionsPayload = z.infer<typeof transactionsPayloadSchema>;

const rosterEntrySchema = z
  .object({
    playerId: z.union([z.number(), z.string()]).nullish(),
    lineupSlotId: z.number().nullish(),
    appliedStatTotal: z.number().nullish(),
  })
  .passthrough();

const lineupTeamSchema = z
  .object({
    id: z.union([z.number(), z.string()]).nullish(),
    name: z.string().nullish(),
    location: z.string().nullish(),
    nickname: z.string().nullish(),
    owners: z.array(z.string()).nullish(),
    roster: z
      .object({
        entries: z.array(rosterEntrySchema).nullish(),
      })
      .passthrough()
      .nullish(),
  })
  .passthrough();

const memberSchema = z
  .object({
    id: z.string().nullish(),
    displayName: z.string().nullish(),
    firstName: z.string().nullish(),
  })
  .passthrough();

export const lineupPayloadSchema = z
  .object({
    teams: z.array(lineupTeamSchema).min(1, "teams is empty"),
    members: z.array(memberSchema).optional(),
  })
  .passthrough();

export type LineupPayload = z.infer<typeof lineupPayloadSchema>;
export type LineupTeam = z.infer<typeof lineupTeamSchema>;
export type LeagueMember = z.infer<typeof memberSchema>;
