import fs from "node:fs";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  createFakeFetch,
  createTestClient,
  jsonResponse,
  makeTempDir,
  quietLogger,
  removeDir,
  textResponse,
  type FakeHandler,
} from "../../__tests__/support";
import type { FetchLike } from "../../core/fetch";
import { MetricsRegistry } from "../../observability";
import { CrawlLog } from "../../store/crawlLog";
import {
  buildCoreItemRecord,
  crawlAthletesById,
  itemUrl,
  jitteredDelay,
  type AthleteCrawlDeps,
  type AthleteCrawlOptions,
} from "../athleteCrawler";

const BASE_URL = "https://core.test/athletes";
const FETCHED_AT = new Date("2024-09-01T12:34:56.789Z");

// 1 and 2 exist, 3 is unknown, 4 answers with a rate-limit page, 5 drops the connection.
const athleteServer: FakeHandler = (url) => {
  const id = url.pathname.split("/").pop();
  switch (id) {
    case "1":
    case "2":
      return jsonResponse({ id, fullName: `Player ${id}` });
    case "3":
      return textResponse("not found", 404, "text/plain");
    case "4":
      return textResponse("slow\ndown", 429, "text/plain");
    default:
      throw new Error("socket hang up");
  }
};

describe("athlete crawl helpers", () => {
  it("builds item urls without doubled slashes", () => {
    expect(itemUrl(`${BASE_URL}/`, 42)).toBe("https://core.test/athletes/42");
  });

  it("draws delays inside the configured range", () => {
    expect(jitteredDelay(250, 750, () => 0)).toBe(250);
    expect(jitteredDelay(250, 750, () => 0.5)).toBe(500);
    expect(jitteredDelay(750, 250, () => 1)).toBe(750);
  });

  it("keeps unparseable bodies as raw text", () => {
    expect(buildCoreItemRecord("u", 200, "<html>", FETCHED_AT)).toEqual({
      meta: { source: "u", http_status: 200, fetched_at: "2024-09-01T12:34:56Z" },
      data: null,
      raw: "<html>",
    });
  });
});

describe("crawlAthletesById", () => {
  let dir: string;
  let delays: number[];
  let metrics: MetricsRegistry;

  beforeEach(async () => {
    dir = await makeTempDir("athletes-by-id");
    delays = [];
    metrics = new MetricsRegistry();
  });

  afterEach(async () => {
    await removeDir(dir);
  });

  function deps(fetchFn: FetchLike): AthleteCrawlDeps {
    return {
      client: createTestClient(fetchFn, { maxAttempts: 1, followRedirects: true, metrics }),
      logger: quietLogger(),
      metrics,
      crawlLog: new CrawlLog(path.join(dir, "log.csv")),
      delay: async (ms) => {
        delays.push(ms);
      },
      random: () => 0,
      now: () => FETCHED_AT,
    };
  }

  function options(ids: number[], resume: boolean): AthleteCrawlOptions {
    return { baseUrl: BASE_URL, outputDir: path.join(dir, "out"), ids, resume, minDelayMs: 5, maxDelayMs: 15 };
  }

  it("records every outcome and keeps going past failures", async () => {
    const summary = await crawlAthletesById(deps(createFakeFetch(athleteServer).fetchFn), options([1, 3, 4, 5, 2], false));

    expect(summary).toEqual({
      requested: 5,
      fetched: 5,
      ok: 2,
      notFound: 1,
      httpErrors: 1,
      exceptions: 1,
      skippedCompleted: 0,
      skippedExisting: 0,
    });
    expect(delays).toEqual([5, 5, 5, 5, 5]);

    const record: unknown = JSON.parse(await fs.promises.readFile(path.join(dir, "out", "1.json"), "utf-8"));
    expect(record).toEqual({
      meta: { source: "https://core.test/athletes/1", http_status: 200, fetched_at: "2024-09-01T12:34:56Z" },
      data: { id: "1", fullName: "Player 1" },
      raw: null,
    });

    const rows = (await fs.promises.readFile(path.join(dir, "log.csv"), "utf-8")).trim().split("\n");
    const size = fs.statSync(path.join(dir, "out", "1.json")).size;
    expect(rows[0]).toBe("espn_id,status,http_status,bytes,path,error");
    expect(rows[1]).toBe(`1,ok,200,${size},${path.join(dir, "out", "1.json")},`);
    expect(rows[2]).toBe("3,not-found,404,9,,");
    expect(rows[3]).toBe("4,http-error,429,9,,slow down");
    expect(rows[4]).toBe("5,exception,,,,Failed after 1 attempts: https://core.test/athletes/5 params={} err=socket hang up");
    expect(metrics.getCounter("items_failed")).toBe(2);
  });

  it("makes no requests when resuming a finished queue", async () => {
    await crawlAthletesById(deps(createFakeFetch(athleteServer).fetchFn), options([1, 2, 3], false));
    const second = createFakeFetch(athleteServer);
    delays = [];

    const summary = await crawlAthletesById(deps(second.fetchFn), options([1, 2, 3], true));

    expect(second.calls).toHaveLength(0);
    expect(delays).toEqual([]);
    expect(summary.skippedCompleted).toBe(3);
    const rows = (await fs.promises.readFile(path.join(dir, "log.csv"), "utf-8")).trim().split("\n");
    expect(rows).toHaveLength(4);
  });

  it("retries only unfinished ids on resume", async () => {
    await crawlAthletesById(deps(createFakeFetch(athleteServer).fetchFn), options([1, 4], false));
    const second = createFakeFetch(() => jsonResponse({ id: "4" }));

    const summary = await crawlAthletesById(deps(second.fetchFn), options([1, 4], true));

    expect(second.calls.map((call) => call.url.pathname)).toEqual(["/athletes/4"]);
    expect(summary.ok).toBe(1);
    expect(summary.skippedCompleted).toBe(1);
  });

  it("skips ids whose output already exists without a request or delay", async () => {
    const outputDir = path.join(dir, "out");
    await fs.promises.mkdir(outputDir, { recursive: true });
    const existing = JSON.stringify({ meta: { source: "earlier" }, data: { id: "2", note: "already here" } });
    await fs.promises.writeFile(path.join(outputDir, "2.json"), existing, "utf-8");
    const server = createFakeFetch(athleteServer);

    const summary = await crawlAthletesById(deps(server.fetchFn), options([2], false));

    expect(server.calls).toHaveLength(0);
    expect(delays).toEqual([]);
    expect(summary.skippedExisting).toBe(1);
    const rows = (await fs.promises.readFile(path.join(dir, "log.csv"), "utf-8")).trim().split("\n");
    expect(rows[1]).toBe(`2,skip-existing,,${Buffer.byteLength(existing)},${path.join(outputDir, "2.json")},`);
  });

  it("refetches a stub file too small to be a record", async () => {
    const outputDir = path.join(dir, "out");
    await fs.promises.mkdir(outputDir, { recursive: true });
    await fs.promises.writeFile(path.join(outputDir, "1.json"), "{}", "utf-8");
    const server = createFakeFetch(athleteServer);

    const summary = await crawlAthletesById(deps(server.fetchFn), options([1], false));

    expect(server.calls).toHaveLength(1);
    expect(summary.ok).toBe(1);
  });
});
