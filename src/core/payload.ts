import type { HttpResult } from "./retryClient";

export type JsonObject = Record<string, unknown>;

export type ParsedBody =
  | { ok: true; payload: unknown }
  | { ok: false; reason: "redirect" | "http_status" | "content_type" | "unparseable"; detail: string };

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseJson(text: string): { ok: true; value: unknown } | { ok: false; error: string } {
  try {
    return { ok: true, value: JSON.parse(text) };
  } catch (error) {
    return { ok: false, error: error instanceof Error ? error.message : String(error) };
  }
}

/** Classifies a league-API answer: only a 2xx JSON body counts as a payload. */
export function parseJsonResponse(result: HttpResult): ParsedBody {
  if (result.status >= 300 && result.status < 400) {
    return { ok: false, reason: "redirect", detail: `HTTP ${result.status} location=${result.headers.location ?? ""}` };
  }
  if (result.status < 200 || result.status >= 300) {
    return { ok: false, reason: "http_status", detail: `HTTP ${result.status}` };
  }
  if (!result.contentType.toLowerCase().includes("application/json")) {
    return { ok: false, reason: "content_type", detail: `content-type=${result.contentType}` };
  }
  const parsed = parseJson(result.body);
  if (!parsed.ok) {
    return { ok: false, reason: "unparseable", detail: parsed.error };
  }
  return { ok: true, payload: parsed.value };
}

// The league API wraps some single results in a one-element array.
export function unwrapSingle(payload: unknown): unknown {
  if (Array.isArray(payload) && payload.length === 1) {
    return payload[0];
  }
  return payload;
}
