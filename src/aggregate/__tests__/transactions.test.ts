import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { createFakeFetch, createTestClient, jsonResponse, makeTempDir, quietLogger, removeDir } from "../../__tests__/support";
import { StructuralResponseError } from "../../core/errors";
import type { FetchLike } from "../../core/fetch";
import type { FallbackDeps } from "../../crawl/viewFallback";
import { MetricsRegistry } from "../../observability";
import {
  combineSeasons,
  combinedTransactionsPath,
  EMPTY_SEASON,
  mergePeriodTransactions,
  pullSeasonTransactions,
  resolveScoringPeriods,
  writeSeasonTransactions,
  type LeagueRequestContext,
} from "../transactions";

const FIXED_NOW = () => new Date("2024-09-01T12:00:00.000Z");

const league: LeagueRequestContext = {
  host: "https://league.test/ffl",
  leagueId: "7",
  headers: { Cookie: "espn_s2=test; SWID={test}" },
  maxScoringPeriod: 18,
};

describe("resolveScoringPeriods", () => {
  it("uses the final scoring period first", () => {
    expect(resolveScoringPeriods({ status: { finalScoringPeriod: 17, currentMatchupPeriod: 5 } }, 18)).toBe(17);
  });

  it("falls back to the current matchup period", () => {
    expect(resolveScoringPeriods({ status: { finalScoringPeriod: 0, currentMatchupPeriod: 5 } }, 18)).toBe(5);
    expect(resolveScoringPeriods({ status: { currentMatchupPeriod: "7" } }, 18)).toBe(7);
  });

  it("defaults to 18 and clamps to [1, max]", () => {
    expect(resolveScoringPeriods(undefined, 18)).toBe(18);
    expect(resolveScoringPeriods({ status: { isActive: true } }, 10)).toBe(10);
    expect(resolveScoringPeriods({ status: { finalScoringPeriod: 25 } }, 18)).toBe(18);
    expect(resolveScoringPeriods({ status: { finalScoringPeriod: -3 } }, 18)).toBe(1);
  });
});

describe("mergePeriodTransactions", () => {
  it("keeps the first occurrence of an id and counts later copies", () => {
    const first = mergePeriodTransactions(EMPTY_SEASON, 2024, 1, [{ id: "a", bid: 1 }, { id: "b" }], "mTransactions2");
    const second = mergePeriodTransactions(first, 2024, 2, [{ id: "a", bid: 2 }, { id: "c" }], "mTransactions2");

    expect(second.transactions).toEqual([
      { id: "a", bid: 1, season: 2024, scoringPeriodId: 1, __view: "mTransactions2" },
      { id: "b", season: 2024, scoringPeriodId: 1, __view: "mTransactions2" },
      { id: "c", season: 2024, scoringPeriodId: 2, __view: "mTransactions2" },
    ]);
    expect(second.duplicates).toBe(1);
    expect(first.transactions).toHaveLength(2);
  });

  it("treats numeric and string ids as different transactions", () => {
    const acc = mergePeriodTransactions(EMPTY_SEASON, 2024, 1, [{ id: 1 }, { id: "1" }, { id: 1 }], "v");

    expect(acc.transactions.map((record) => record.id)).toEqual([1, "1"]);
    expect(acc.duplicates).toBe(1);
  });

  it("keeps every record without an id", () => {
    const acc = mergePeriodTransactions(EMPTY_SEASON, 2024, 3, [{ type: "TRADE" }, { type: "TRADE" }], undefined);

    expect(acc.transactions).toEqual([
      { type: "TRADE", season: 2024, scoringPeriodId: 3 },
      { type: "TRADE", season: 2024, scoringPeriodId: 3 },
    ]);
    expect(acc.duplicates).toBe(0);
  });

  it("never overwrites fields the record already carries", () => {
    const acc = mergePeriodTransactions(EMPTY_SEASON, 2024, 4, [{ id: 9, season: 2023, scoringPeriodId: 1 }], "v");

    expect(acc.transactions).toEqual([{ id: 9, season: 2023, scoringPeriodId: 1, __view: "v" }]);
  });

  it("skips items that are not objects", () => {
    expect(mergePeriodTransactions(EMPTY_SEASON, 2024, 1, ["x", 3, null], "v").transactions).toEqual([]);
  });
});

describe("combineSeasons", () => {
  it("concatenates seasons and counts each", () => {
    const combined = combineSeasons(
      "7",
      2023,
      2024,
      [
        { season: 2023, league_id: "7", generated_at: "", transactions: [{ id: 1 }], teams: [], members: [] },
        { season: 2024, league_id: "7", generated_at: "", transactions: [{ id: 2 }, { id: 3 }], teams: [], members: [] },
      ],
      FIXED_NOW,
    );

    expect(combined).toEqual({
      league_id: "7",
      start_season: 2023,
      end_season: 2024,
      generated_at: "2024-09-01T12:00:00.000Z",
      transactions: [{ id: 1 }, { id: 2 }, { id: 3 }],
      by_season: { "2023": 1, "2024": 2 },
    });
  });

  it("names the combined file by season range", () => {
    expect(combinedTransactionsPath("/out", 2020, 2024)).toBe(path.join("/out", "transactions_2020_2024.json"));
  });
});

// League stub: settings report two periods; the history shape never answers.
function leagueServer(): ReturnType<typeof createFakeFetch> {
  return createFakeFetch((url) => {
    if (!url.pathname.includes("/seasons/2024/")) {
      return jsonResponse({}, 404);
    }
    const view = url.searchParams.get("view");
    const period = url.searchParams.get("scoringPeriodId");
    if (view === "mSettings") {
      return jsonResponse({ status: { finalScoringPeriod: 2 } });
    }
    if (view === "mTeam") {
      return jsonResponse({ teams: [{ id: 1 }], members: [{ id: "m1" }] });
    }
    if (view === "mTransactions2" && period === "1") {
      return jsonResponse({ transactions: [{ id: "a" }, { id: "b" }] });
    }
    if (view === "mTransactions2" && period === "2") {
      return jsonResponse({ transactions: [{ id: "b" }, { id: "c" }, { type: "FREEAGENT" }] });
    }
    return jsonResponse({ transactions: [] });
  });
}

describe("pullSeasonTransactions", () => {
  let dir: string;
  let metrics: MetricsRegistry;

  beforeEach(async () => {
    dir = await makeTempDir("transactions");
    metrics = new MetricsRegistry();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function depsFor(fetchFn: FetchLike): FallbackDeps {
    return {
      client: createTestClient(fetchFn, { maxAttempts: 1 }),
      logger: quietLogger(),
      metrics,
      debugPath: path.join(dir, "debug.json"),
    };
  }

  it("walks every scoring period and deduplicates across them", async () => {
    const payload = await pullSeasonTransactions(depsFor(leagueServer().fetchFn), league, 2024, FIXED_NOW);

    expect(payload.transactions).toEqual([
      { id: "a", season: 2024, scoringPeriodId: 1, __view: "mTransactions2" },
      { id: "b", season: 2024, scoringPeriodId: 1, __view: "mTransactions2" },
      { id: "c", season: 2024, scoringPeriodId: 2, __view: "mTransactions2" },
      { type: "FREEAGENT", season: 2024, scoringPeriodId: 2, __view: "mTransactions2" },
    ]);
    expect(payload.teams).toEqual([{ id: 1 }]);
    expect(payload.members).toEqual([{ id: "m1" }]);
    expect(payload.generated_at).toBe("2024-09-01T12:00:00.000Z");
    expect(metrics.getCounter("transactions_duplicate")).toBe(1);
    expect(metrics.getCounter("transactions_kept")).toBe(4);
  });

  it("fails the season when settings are unavailable everywhere", async () => {
    const { fetchFn } = createFakeFetch(() => jsonResponse({}, 404));

    await expect(pullSeasonTransactions(depsFor(fetchFn), league, 2024, FIXED_NOW)).rejects.toBeInstanceOf(
      StructuralResponseError,
    );
  });

  it("writes the season file atomically", async () => {
    const payload = await pullSeasonTransactions(depsFor(leagueServer().fetchFn), league, 2024, FIXED_NOW);

    const outputPath = await writeSeasonTransactions(dir, payload);

    expect(outputPath).toBe(path.join(dir, "transactions_2024.json"));
    const stored: unknown = JSON.parse(await fs.promises.readFile(outputPath, "utf-8"));
    expect(stored).toEqual(payload);
    expect(fs.existsSync(`${outputPath}.tmp`)).toBe(false);
  });
});
