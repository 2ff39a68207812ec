import fs from "node:fs/promises";
import type { RunManager, RunSettings, RunSource } from "./run_manager.js";
import type { GameType } from "./pipeline/schemas.js";
import { isKnownPipelineError } from "./pipeline/errors.js";
import { artifactAbsPath, nowIso, writeTextFile } from "./pipeline/utils.js";

export type PipelineOptions = {
  signal: AbortSignal;
};

export type PipelineInput = {
  runId: string;
  gameType: GameType;
  source: RunSource;
  settings?: RunSettings;
};

export type PipelineFn = (input: PipelineInput, runs: RunManager, options: PipelineOptions) => Promise<void>;

export class RunExecutor {
  private readonly concurrency: number;
  private readonly running = new Map<string, AbortController>();
  private readonly queue: string[] = [];

  constructor(
    private readonly runs: RunManager,
    private readonly pipeline: PipelineFn,
    options?: {
      concurrency?: number;
    }
  ) {
    this.concurrency = Math.max(1, options?.concurrency ?? 1);
  }

  isRunning(runId: string): boolean {
    return this.running.has(runId);
  }

  enqueue(runId: string): boolean {
    const run = this.runs.getRun(runId);
    if (!run) return false;
    if (run.status !== "queued") return false;

    // Avoid duplicate queue entries.
    if (this.queue.includes(runId) || this.running.has(runId)) return true;

    this.queue.push(runId);
    this.runs.log(runId, `Queued (max concurrency ${this.concurrency})`);
    this.drain();
    return true;
  }

  async cancel(runId: string): Promise<boolean> {
    const run = this.runs.getRun(runId);
    if (!run) return false;

    const ctrl = this.running.get(runId);
    if (ctrl) {
      this.runs.log(runId, "Cancellation requested");
      ctrl.abort();
      return true;
    }

    const idx = this.queue.indexOf(runId);
    if (idx !== -1) {
      this.queue.splice(idx, 1);
      this.runs.error(runId, "Cancelled while queued");
      await this.releaseSource(runId);
      await this.runs.setRunStatus(runId, "error", { finishedAt: nowIso() });
      return true;
    }

    return false;
  }

  private drain(): void {
    while (this.running.size < this.concurrency) {
      const next = this.queue.shift();
      if (next === undefined) return;
      // Reserve the slot before the async start so the loop sees it.
      this.running.set(next, new AbortController());
      void this.start(next);
    }
  }

  private async releaseSource(runId: string): Promise<void> {
    const tempPath = this.runs.getRun(runId)?.source.tempPath;
    if (!tempPath) return;
    try {
      await fs.rm(tempPath, { force: true });
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      this.runs.error(runId, `Failed to remove uploaded document ${tempPath}: ${msg}`);
    }
  }

  private async start(runId: string): Promise<void> {
    const controller = this.running.get(runId) ?? new AbortController();

    try {
      const run = this.runs.getRun(runId);
      if (!run) return;

      await this.runs.setRunStatus(runId, "running");
      await this.pipeline({ runId, gameType: run.gameType, source: run.source, settings: run.settings }, this.runs, {
        signal: controller.signal
      });
      await this.runs.setRunStatus(runId, "done", { finishedAt: nowIso() });
    } catch (err) {
      const aborted = controller.signal.aborted;
      const msg = aborted ? "Cancelled" : err instanceof Error ? err.message : String(err);
      this.runs.error(runId, msg);
      if (!aborted && !isKnownPipelineError(err) && err instanceof Error && err.stack) {
        this.runs.error(runId, err.stack);
      }
      await this.runs.setRunStatus(runId, "error", { finishedAt: nowIso() });

      // Persist a cancellation marker for UX.
      if (aborted) {
        await writeTextFile(artifactAbsPath(runId, "CANCELLED.txt"), `Cancelled at ${nowIso()}`).catch((markerErr: unknown) => {
          const markerMsg = markerErr instanceof Error ? markerErr.message : String(markerErr);
          this.runs.error(runId, `Failed to write cancellation marker: ${markerMsg}`);
        });
      }
    } finally {
      await this.releaseSource(runId);
      this.running.delete(runId);
      this.drain();
    }
  }
}
