import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { FetchInit, FetchLike } from "../core/fetch";
import { RetryClient } from "../core/retryClient";
import { Logger, MetricsRegistry } from "../observability";

export interface RecordedRequest {
  url: URL;
  init: FetchInit;
}

export type FakeHandler = (url: URL, init: FetchInit) => Response | Promise<Response>;

export function createFakeFetch(handler: FakeHandler): { fetchFn: FetchLike; calls: RecordedRequest[] } {
  const calls: RecordedRequest[] = [];
  const fetchFn: FetchLike = async (url, init) => {
    const parsed = new URL(url);
    calls.push({ url: parsed, init });
    return handler(parsed, init);
  };
  return { fetchFn, calls };
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { "content-type": "application/json; charset=utf-8" },
  });
}

export function textResponse(body: string, status: number, contentType = "text/html"): Response {
  return new Response(body, { status, headers: { "content-type": contentType } });
}

export function quietLogger(): Logger {
  return new Logger({ component: "test", runId: "test-run", minLevel: "error" });
}

export const noSleep = async (): Promise<void> => {};

export function createTestClient(
  fetchFn: FetchLike,
  overrides: { maxAttempts?: number; followRedirects?: boolean; metrics?: MetricsRegistry } = {},
): RetryClient {
  return new RetryClient({
    fetchFn,
    logger: quietLogger(),
    metrics: overrides.metrics ?? new MetricsRegistry(),
    maxAttempts: overrides.maxAttempts ?? 2,
    backoffBase: 2,
    unitMs: 10,
    timeoutMs: 5_000,
    followRedirects: overrides.followRedirects,
    sleep: noSleep,
  });
}

export async function makeTempDir(prefix: string): Promise<string> {
  return fs.promises.mkdtemp(path.join(os.tmpdir(), `${prefix}-`));
}

export async function removeDir(dir: string): Promise<void> {
  await fs.promises.rm(dir, { recursive: true, force: true });
}
