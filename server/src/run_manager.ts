import { EventEmitter } from "node:events";
import fs from "node:fs/promises";
import path from "node:path";
import { randomBytes } from "node:crypto";
import {
  ensureDir,
  nowIso,
  outputRootAbs,
  runFinalDirAbs,
  runIntermediateDirAbs,
  runOutputDirAbs,
  sourceStem,
  tryReadJsonFile,
  writeJsonFile
} from "./pipeline/utils.js";
import type { GameType } from "./pipeline/schemas.js";
import type { AttemptRecord } from "./pipeline/workflow.js";

export const STEP_ORDER = ["extract", "architect", "review", "refine", "build"] as const;

export type StepName = (typeof STEP_ORDER)[number];

export type RunSettings = {
  maxRetries?: number;
};

export type RunSource = {
  originalName: string;
  /** Uploaded copy; removed once the run leaves the executor. */
  tempPath: string;
  sizeBytes: number;
};

export type StepRecord = {
  name: StepName;
  status: "queued" | "running" | "done" | "error";
  invocations: number;
  startedAt?: string;
  finishedAt?: string;
  error?: string;
  artifacts: string[];
};

export type RunOutcome = {
  approved: boolean;
  attempts: number;
  gameArtifact: string;
};

export type RunStatus = {
  runId: string;
  gameType: GameType;
  source: RunSource;
  settings?: RunSettings;
  status: "queued" | "running" | "done" | "error";
  startedAt: string;
  finishedAt?: string;
  steps: Record<StepName, StepRecord>;
  attempts: AttemptRecord[];
  outcome?: RunOutcome;
  outputFolder: string;
};

type RunInternal = RunStatus & {
  emitter: EventEmitter;
};

export type RunListItem = Pick<RunStatus, "runId" | "gameType" | "status" | "startedAt" | "finishedAt"> & { sourceName: string };

export type CreateRunInput = {
  gameType: GameType;
  source: RunSource;
  settings?: RunSettings;
};

const RUN_EVENT_TYPES = ["step_started", "step_finished", "artifact_written", "attempt_finished", "log", "error"] as const;

const RUN_ID_SLUG_MAX = 40;
const RUN_ID_SUFFIX_LEN = 8;
const RUN_ID_MAX_ATTEMPTS = 10;
const RUN_ID_SUFFIX_ALPHABET = "abcdefghijklmnopqrstuvwxyz0123456789";

function randomRunSuffix(length: number): string {
  const bytes = randomBytes(length);
  let out = "";
  for (let i = 0; i < bytes.length; i++) {
    out += RUN_ID_SUFFIX_ALPHABET[bytes[i] % RUN_ID_SUFFIX_ALPHABET.length];
  }
  return out;
}

function isTerminalRunStatus(status: RunStatus["status"]): boolean {
  return status === "done" || status === "error";
}

function isRunStatusRecord(value: unknown): value is RunStatus {
  if (!value || typeof value !== "object") return false;
  return (
    "runId" in value &&
    typeof value.runId === "string" &&
    "status" in value &&
    typeof value.status === "string" &&
    "steps" in value &&
    typeof value.steps === "object" &&
    value.steps !== null
  );
}

function recoverStaleLoadedRun(run: RunStatus): RunStatus {
  if (isTerminalRunStatus(run.status)) return run;
  const recoveredAt = nowIso();
  const recoveredSteps = { ...run.steps };

  for (const stepName of STEP_ORDER) {
    const step = recoveredSteps[stepName];
    if (!step) continue;
    if (step.status === "running") {
      recoveredSteps[stepName] = {
        ...step,
        status: "error",
        error: step.error ?? "Recovered after server restart while run was active.",
        finishedAt: step.finishedAt ?? recoveredAt
      };
    }
  }

  return {
    ...run,
    status: "error",
    finishedAt: run.finishedAt ?? recoveredAt,
    steps: recoveredSteps
  };
}

function newEmitter(): EventEmitter {
  const emitter = new EventEmitter();
  // Node treats "error" events specially: if nobody is listening, it throws.
  // Run errors are an optional event stream, never a process crash.
  emitter.on("error", () => undefined);
  return emitter;
}

export class RunManager {
  private runs = new Map<string, RunInternal>();

  async initFromDisk(): Promise<void> {
    await ensureDir(outputRootAbs());
    const entries = await fs.readdir(outputRootAbs(), { withFileTypes: true }).catch(() => []);
    for (const ent of entries) {
      if (!ent.isDirectory()) continue;
      const runId = ent.name;
      const runJsonPath = path.join(runOutputDirAbs(runId), "run.json");
      const data = await tryReadJsonFile(runJsonPath);
      if (!isRunStatusRecord(data)) continue;
      const recovered = recoverStaleLoadedRun({ ...data, attempts: data.attempts ?? [] });
      if (recovered.status !== data.status) {
        await writeJsonFile(runJsonPath, recovered);
        // The upload of an interrupted run will never be consumed.
        if (recovered.source?.tempPath) await fs.rm(recovered.source.tempPath, { force: true });
      }
      this.runs.set(runId, { ...recovered, emitter: newEmitter() });
    }
  }

  listRuns(): RunListItem[] {
    return [...this.runs.values()]
      .map((r) => ({
        runId: r.runId,
        gameType: r.gameType,
        sourceName: r.source.originalName,
        status: r.status,
        startedAt: r.startedAt,
        finishedAt: r.finishedAt
      }))
      .sort((a, b) => (a.startedAt < b.startedAt ? 1 : -1));
  }

  getRun(runId: string): RunStatus | null {
    const r = this.runs.get(runId);
    if (!r) return null;
    return this.snapshot(r);
  }

  private async runIdExists(runId: string): Promise<boolean> {
    if (this.runs.has(runId)) return true;
    const onDisk = await fs
      .stat(runOutputDirAbs(runId))
      .then((st) => st.isDirectory())
      .catch(() => false);
    return onDisk;
  }

  private async nextRunId(gameType: GameType, originalName: string): Promise<string> {
    const base = `${gameType}-${sourceStem(originalName)}`.slice(0, RUN_ID_SLUG_MAX).replace(/^-+|-+$/g, "");
    for (let attempt = 0; attempt < RUN_ID_MAX_ATTEMPTS; attempt++) {
      const runId = `${base}-${randomRunSuffix(RUN_ID_SUFFIX_LEN)}`;
      if (!(await this.runIdExists(runId))) return runId;
    }
    throw new Error("Unable to allocate unique runId after retries");
  }

  async createRun(input: CreateRunInput): Promise<RunStatus> {
    const runId = await this.nextRunId(input.gameType, input.source.originalName);
    const startedAt = nowIso();
    const outputFolder = path.join("output", runId);

    const queued = (name: StepName): StepRecord => ({ name, status: "queued", invocations: 0, artifacts: [] });
    const steps: Record<StepName, StepRecord> = {
      extract: queued("extract"),
      architect: queued("architect"),
      review: queued("review"),
      refine: queued("refine"),
      build: queued("build")
    };

    const run: RunInternal = {
      runId,
      gameType: input.gameType,
      source: { ...input.source },
      settings: input.settings,
      status: "queued",
      startedAt,
      steps,
      attempts: [],
      outputFolder,
      emitter: newEmitter()
    };

    await ensureDir(runIntermediateDirAbs(runId));
    await ensureDir(runFinalDirAbs(runId));
    await this.persist(run);

    this.runs.set(runId, run);
    return this.snapshot(run);
  }

  async setRunStatus(runId: string, status: RunStatus["status"], patch?: Pick<Partial<RunStatus>, "finishedAt">): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    r.status = status;
    if (patch?.finishedAt) r.finishedAt = patch.finishedAt;
    await this.persist(r);
  }

  async startStep(runId: string, step: StepName): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[step];
    s.status = "running";
    s.invocations += 1;
    s.startedAt = nowIso();
    delete s.finishedAt;
    delete s.error;
    await this.persist(r);
    r.emitter.emit("step_started", { step, invocation: s.invocations, at: s.startedAt });
  }

  async finishStep(runId: string, step: StepName, ok: boolean, error?: string): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[step];
    s.status = ok ? "done" : "error";
    s.finishedAt = nowIso();
    if (!ok && error) s.error = error;
    await this.persist(r);
    r.emitter.emit("step_finished", { step, invocation: s.invocations, at: s.finishedAt, ok });
    if (!ok && error) r.emitter.emit("error", { step, message: error, at: s.finishedAt });
  }

  async addArtifact(runId: string, step: StepName, name: string): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    const s = r.steps[step];
    if (!s.artifacts.includes(name)) s.artifacts.push(name);
    await this.persist(r);
    r.emitter.emit("artifact_written", { step, name, at: nowIso() });
  }

  async recordAttempt(runId: string, record: AttemptRecord): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    r.attempts = [...r.attempts.filter((a) => a.attempt !== record.attempt), { ...record }];
    await this.persist(r);
    r.emitter.emit("attempt_finished", { ...record, at: nowIso() });
  }

  async setOutcome(runId: string, outcome: RunOutcome): Promise<void> {
    const r = this.runs.get(runId);
    if (!r) return;
    r.outcome = { ...outcome };
    await this.persist(r);
  }

  log(runId: string, message: string, step?: StepName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("log", { message, step, at: nowIso() });
  }

  error(runId: string, message: string, step?: StepName): void {
    const r = this.runs.get(runId);
    if (!r) return;
    r.emitter.emit("error", { message, step, at: nowIso() });
  }

  subscribe(runId: string, onEvent: (type: string, payload: unknown) => void): (() => void) | null {
    const r = this.runs.get(runId);
    if (!r) return null;

    const handlers = RUN_EVENT_TYPES.map((type) => {
      const handler = (payload: unknown) => onEvent(type, payload);
      r.emitter.on(type, handler);
      return { type, handler };
    });

    return () => {
      for (const { type, handler } of handlers) r.emitter.off(type, handler);
    };
  }

  private snapshot(run: RunInternal): RunStatus {
    const { emitter: _emitter, ...pub } = run;
    return structuredClone(pub);
  }

  private async persist(run: RunInternal): Promise<void> {
    await writeJsonFile(path.join(runOutputDirAbs(run.runId), "run.json"), this.snapshot(run));
  }
}
