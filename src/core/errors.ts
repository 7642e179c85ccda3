import type { QueryParams } from "./fetch";

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigurationError";
  }
}

export class MissingCredentialError extends ConfigurationError {
  readonly missing: string[];

  constructor(missing: string[]) {
    super(`Missing ESPN cookie values (${missing.join(", ")}). Provide ESPN_COOKIE or ESPN_COOKIE_FILE.`);
    this.name = "MissingCredential";
    this.missing = missing;
  }
}

export class FetchExhaustedError extends Error {
  readonly url: string;
  readonly params: QueryParams;
  readonly attempts: number;
  readonly lastError: string;

  constructor(url: string, params: QueryParams, attempts: number, lastError: string) {
    super(`Failed after ${attempts} attempts: ${url} params=${JSON.stringify(params)} err=${lastError}`);
    this.name = "FetchExhausted";
    this.url = url;
    this.params = params;
    this.attempts = attempts;
    this.lastError = lastError;
  }
}

/** Upstream answered, but nothing it returned has the shape the caller needs. */
export class StructuralResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "StructuralResponseError";
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
