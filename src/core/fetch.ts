import { Agent, fetch as undiciFetch } from "undici";

export type QueryValue = string | number | ReadonlyArray<string | number>;
export type QueryParams = Readonly<Record<string, QueryValue>>;

export interface HeadersLike {
  get(name: string): string | null;
  forEach(callback: (value: string, key: string) => void): void;
}

export interface ResponseLike {
  status: number;
  headers: HeadersLike;
  text(): Promise<string>;
}

export interface FetchInit {
  method: "GET";
  headers: Record<string, string>;
  redirect: "manual" | "follow";
  signal: AbortSignal;
}

export type FetchLike = (url: string, init: FetchInit) => Promise<ResponseLike>;

let insecureAgent: Agent | undefined;

function getInsecureAgent(): Agent {
  if (!insecureAgent) {
    insecureAgent = new Agent({
      connect: {
        rejectUnauthorized: false,
      },
    });
  }
  return insecureAgent;
}

export function getFetchDispatcher(ignoreHttpsErrors: boolean): Agent | undefined {
  if (!ignoreHttpsErrors) {
    return undefined;
  }
  return getInsecureAgent();
}

export function createFetch(ignoreHttpsErrors: boolean): FetchLike {
  const dispatcher = getFetchDispatcher(ignoreHttpsErrors);
  return (url, init) => undiciFetch(url, { ...init, dispatcher });
}

export function buildUrl(baseUrl: string, params: QueryParams): string {
  const url = new URL(baseUrl);
  for (const [key, value] of Object.entries(params)) {
    const values: ReadonlyArray<string | number> =
      typeof value === "string" || typeof value === "number" ? [value] : value;
    for (const entry of values) {
      url.searchParams.append(key, String(entry));
    }
  }
  return url.toString();
}
