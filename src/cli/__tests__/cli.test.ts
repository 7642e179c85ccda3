import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createFakeFetch, jsonResponse } from "../../__tests__/support";
import { DEFAULT_CONFIG } from "../../config";
import { MissingCredentialError } from "../../core/errors";
import { applyCliOverrides, getHelpText, parseCliArgs, runCli } from "../index";

describe("parseCliArgs", () => {
  it("returns help for -h, no command or an unknown command", () => {
    expect(parseCliArgs(["-h"])).toBe("help");
    expect(parseCliArgs([])).toBe("help");
    expect(parseCliArgs(["scrape"])).toBe("help");
  });

  it("reads options for athletes-by-id", () => {
    expect(
      parseCliArgs(["athletes-by-id", "--resume", "--start", "10", "--limit", "5", "--id-csv", "ids.csv"]),
    ).toEqual({
      command: "athletes-by-id",
      resume: true,
      ignoreHttpsErrors: false,
      start: 10,
      limit: 5,
      maxPages: undefined,
      idCsv: "ids.csv",
      missingCsv: undefined,
      configPath: undefined,
    });
  });

  it("defaults the window and ignores numbers that do not parse", () => {
    const parsed = parseCliArgs(["athletes-index", "--max-pages", "many", "--config", "cfg.json"]);
    expect(parsed).toMatchObject({ command: "athletes-index", start: 0, limit: 0, maxPages: undefined, configPath: "cfg.json" });
  });
});

describe("applyCliOverrides", () => {
  it("lets flags switch options on without switching config off", () => {
    const parsed = parseCliArgs(["athletes-index", "--max-pages", "3"]);
    if (parsed === "help") {
      throw new Error("expected a command");
    }

    const config = applyCliOverrides({ ...DEFAULT_CONFIG, resume: true }, parsed);

    expect(config.resume).toBe(true);
    expect(config.maxPages).toBe(3);
    expect(config.ignoreHttpsErrors).toBe(false);
  });
});

describe("runCli", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => undefined);
    vi.spyOn(console, "error").mockImplementation(() => undefined);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints help and succeeds", async () => {
    expect(await runCli(["--help"])).toBe(0);
    expect(console.log).toHaveBeenCalledWith(getHelpText());
  });

  it("reports status from the run store", async () => {
    expect(await runCli(["status"], { env: { STORE_PATH: ":memory:" } })).toBe(0);
  });

  it("surfaces a missing credential without touching the network", async () => {
    const server = createFakeFetch(() => jsonResponse({}));

    await expect(
      runCli(["transactions"], { env: { STORE_PATH: ":memory:", ESPN_LEAGUE_ID: "7" }, fetchFn: server.fetchFn }),
    ).rejects.toBeInstanceOf(MissingCredentialError);
    expect(server.calls).toHaveLength(0);
  });
});
