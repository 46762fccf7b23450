import { RunReport } from "./reporter";

export type RunState = "idle" | "running" | "completed" | "failed";

export interface RunStatus {
  run_id: number;
  state: RunState;
  categories: string[];
  started_at?: string;
  finished_at?: string;
  verdict?: string;
  error?: string;
}

/** In-memory view of the current and last crawl run, for the HTTP surface. */
export class RunRegistry {
  private status: RunStatus = { run_id: 0, state: "idle", categories: [] };
  private report: RunReport | undefined;

  current(): RunStatus {
    return { ...this.status, categories: [...this.status.categories] };
  }

  lastReport(): RunReport | undefined {
    return this.report;
  }

  isRunning(): boolean {
    return this.status.state === "running";
  }

  markRunning(categories: readonly string[]): RunStatus {
    if (this.isRunning()) {
      throw new Error(`crawl run ${this.status.run_id} already in progress`);
    }
    this.status = {
      run_id: this.status.run_id + 1,
      state: "running",
      categories: [...categories],
      started_at: new Date().toISOString()
    };
    return this.current();
  }

  markCompleted(report: RunReport): void {
    this.report = report;
    this.status = {
      ...this.status,
      state: "completed",
      verdict: report.verdict,
      error: undefined,
      finished_at: new Date().toISOString()
    };
  }

  markFailed(error: string): void {
    this.status = {
      ...this.status,
      state: "failed",
      verdict: undefined,
      error,
      finished_at: new Date().toISOString()
    };
  }
}
