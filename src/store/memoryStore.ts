import type { DatasetCount, RunRecord, RunStore, StoreStats } from "./types";

export class InMemoryStore implements RunStore {
  private readonly runs = new Map<string, RunRecord>();
  private readonly datasets = new Map<string, DatasetCount>();

  async startRun(runId: string, command: string, startedAt: string): Promise<void> {
    this.runs.set(runId, { runId, command, startedAt, status: "running" });
  }

  async finishRun(runId: string, status: "completed" | "failed", finishedAt: string): Promise<void> {
    const run = this.runs.get(runId);
    if (run) {
      this.runs.set(runId, { ...run, status, finishedAt });
    }
  }

  async recordDatasetCount(count: DatasetCount): Promise<void> {
    this.datasets.set(`${count.dataset}:${count.season}`, { ...count });
  }

  async getStats(): Promise<StoreStats> {
    const runs = [...this.runs.values()];
    const lastRun = [...runs].sort((a, b) => b.startedAt.localeCompare(a.startedAt))[0];
    return {
      totalRuns: runs.length,
      completedRuns: runs.filter((run) => run.status === "completed").length,
      failedRuns: runs.filter((run) => run.status === "failed").length,
      lastRun,
      datasets: [...this.datasets.values()].sort(
        (a, b) => a.dataset.localeCompare(b.dataset) || a.season - b.season,
      ),
    };
  }

  async close(): Promise<void> {
    return;
  }
}
