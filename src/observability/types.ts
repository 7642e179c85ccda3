export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LogFields {
  espnId?: number;
  season?: number;
  scoringPeriodId?: number;
  url?: string;
  attempt?: number;
  [key: string]: unknown;
}

export type MetricCounterName =
  | "requests_sent"
  | "requests_retried"
  | "pages_fetched"
  | "pages_reused"
  | "descriptors_failed"
  | "items_ok"
  | "items_not_found"
  | "items_skipped"
  | "items_failed"
  | "transactions_kept"
  | "transactions_duplicate";

export type MetricTimerName = "request_ms" | "season_ms";
