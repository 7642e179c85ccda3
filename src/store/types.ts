export type RunStatus = "running" | "completed" | "failed";

export type DatasetName = "transactions" | "lineups" | "athletes_index" | "athletes_by_id";

export interface RunRecord {
  runId: string;
  command: string;
  startedAt: string;
  finishedAt?: string;
  status: RunStatus;
}

export interface DatasetCount {
  dataset: DatasetName;
  season: number;
  count: number;
  runId: string;
  updatedAt: string;
}

export interface StoreStats {
  totalRuns: number;
  completedRuns: number;
  failedRuns: number;
  lastRun?: RunRecord;
  datasets: DatasetCount[];
}

export interface RunStore {
  startRun(runId: string, command: string, startedAt: string): Promise<void>;
  finishRun(runId: string, status: "completed" | "failed", finishedAt: string): Promise<void>;
  recordDatasetCount(count: DatasetCount): Promise<void>;
  getStats(): Promise<StoreStats>;
  close(): Promise<void>;
}
