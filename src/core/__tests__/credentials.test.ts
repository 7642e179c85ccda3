import fs from "node:fs";
import path from "node:path";
import { afterEach, describe, expect, it } from "vitest";
import { makeTempDir, removeDir } from "../../__tests__/support";
import { loadCredential, normalizeCredential } from "../credentials";
import { ConfigurationError, MissingCredentialError } from "../errors";

const CANONICAL = "espn_s2=AAA; SWID={X}";

describe("normalizeCredential", () => {
  it.each(["Cookie: espn_s2=AAA; SWID={X}", "espn_s2=AAA;SWID={X}", "SWID={X}; espn_s2=AAA"])(
    "normalizes %s",
    (raw) => {
      expect(normalizeCredential(raw)).toBe(CANONICAL);
    },
  );

  it("is idempotent", () => {
    expect(normalizeCredential(normalizeCredential("SWID={X}; espn_s2=AAA"))).toBe(CANONICAL);
  });

  it("drops unrelated cookies and quotes", () => {
    expect(normalizeCredential('other=1; swid="{X}"; espn_s2=AAA; trailing=2')).toBe(CANONICAL);
  });

  it("names the missing field", () => {
    try {
      normalizeCredential("espn_s2=AAA; other=1");
      expect.unreachable("expected a credential error");
    } catch (error) {
      expect(error).toBeInstanceOf(MissingCredentialError);
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof MissingCredentialError) {
        expect(error.missing).toEqual(["SWID"]);
      }
    }
  });

  it("rejects an empty string", () => {
    expect(() => normalizeCredential("")).toThrow(MissingCredentialError);
  });
});

describe("loadCredential", () => {
  let dir: string | undefined;

  afterEach(async () => {
    if (dir) {
      await removeDir(dir);
      dir = undefined;
    }
  });

  it("prefers ESPN_COOKIE", () => {
    expect(loadCredential({ ESPN_COOKIE: "Cookie: SWID={X}; espn_s2=AAA", ESPN_S2: "other" })).toBe(CANONICAL);
  });

  it("reads ESPN_COOKIE_FILE", async () => {
    dir = await makeTempDir("cookie");
    const cookiePath = path.join(dir, "cookie.txt");
    await fs.promises.writeFile(cookiePath, "espn_s2=AAA;SWID={X}\n", "utf-8");
    expect(loadCredential({ ESPN_COOKIE_FILE: cookiePath })).toBe(CANONICAL);
  });

  it("fails on a cookie file that does not exist", () => {
    expect(() => loadCredential({ ESPN_COOKIE_FILE: "/nonexistent/cookie.txt" })).toThrow(ConfigurationError);
  });

  it("combines the separate variables", () => {
    expect(loadCredential({ ESPN_S2: "AAA", ESPN_SWID: "{X}" })).toBe(CANONICAL);
  });

  it("fails when nothing is provided", () => {
    expect(() => loadCredential({})).toThrow(MissingCredentialError);
  });
});
