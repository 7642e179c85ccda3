import fs from "node:fs";
import path from "node:path";
import { ConfigurationError, MissingCredentialError } from "./errors";

// Emission order of the recognized session cookies.
const CREDENTIAL_FIELDS = ["espn_s2", "SWID"] as const;

type CredentialField = (typeof CREDENTIAL_FIELDS)[number];

const FIELD_PATTERN = /(?:^|[\s;])(espn_s2|swid)\s*[=:]\s*"?([^";\s]+)"?/gi;
const LABEL_PATTERN = /^\s*cookie\s*:/i;

function toField(name: string): CredentialField | undefined {
  const lowered = name.toLowerCase();
  return CREDENTIAL_FIELDS.find((field) => field.toLowerCase() === lowered);
}

/**
 * Reduces a pasted cookie string or `Cookie:` header line to the two ESPN
 * session cookies, always emitted as `espn_s2=...; SWID=...`.
 */
export function normalizeCredential(raw: string): string {
  const text = raw.replace(LABEL_PATTERN, " ");
  const values = new Map<CredentialField, string>();

  for (const match of text.matchAll(FIELD_PATTERN)) {
    const field = toField(match[1]);
    if (field && !values.has(field)) {
      values.set(field, match[2]);
    }
  }

  const missing = CREDENTIAL_FIELDS.filter((field) => !values.has(field));
  if (missing.length > 0) {
    throw new MissingCredentialError(missing);
  }

  return CREDENTIAL_FIELDS.map((field) => `${field}=${values.get(field)}`).join("; ");
}

export function loadCredential(env: NodeJS.ProcessEnv = process.env): string {
  let raw = env.ESPN_COOKIE?.trim();

  if (!raw && env.ESPN_COOKIE_FILE) {
    const cookiePath = path.resolve(env.ESPN_COOKIE_FILE);
    if (!fs.existsSync(cookiePath)) {
      throw new ConfigurationError(`Cookie file not found: ${cookiePath}`);
    }
    raw = fs.readFileSync(cookiePath, "utf-8").trim();
  }

  if (!raw && (env.ESPN_S2 || env.ESPN_SWID)) {
    raw = `espn_s2=${env.ESPN_S2 ?? ""}; SWID=${env.ESPN_SWID ?? ""}`;
  }

  return normalizeCredential(raw ?? "");
}
