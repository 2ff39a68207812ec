import type { StepName } from "../run_manager.js";
import { NoUsableGameSpecError } from "./errors.js";
import type { GameSpec, GameType, ReviewVerdict, Summary } from "./schemas.js";

export const DEFAULT_MAX_RETRIES = 3;

export type WorkflowStages = {
  extract: (sourcePath: string) => Promise<Summary>;
  design: (summary: Summary, gameType: GameType) => Promise<GameSpec | null>;
  review: (spec: GameSpec, summary: Summary) => Promise<ReviewVerdict>;
  refine: (spec: GameSpec, feedback: string, summary: Summary) => Promise<GameSpec | null>;
  build: (spec: GameSpec) => Promise<string>;
};

export type WorkflowReporter = {
  log: (message: string, step?: StepName) => void;
  error: (message: string, step?: StepName) => void;
};

export type StepRunner = <T>(step: StepName, fn: () => Promise<T>) => Promise<T>;

export type AttemptRecord = {
  attempt: number;
  stage: "architect" | "refine";
  produced: boolean;
  verdict?: ReviewVerdict;
  error?: string;
};

export type DiamondWorkflowOptions = {
  stages: WorkflowStages;
  maxRetries: number;
  reporter: WorkflowReporter;
  signal?: AbortSignal;
  /** Wraps each stage call, e.g. for step bookkeeping. */
  runStep?: StepRunner;
  /** Called once per attempt with the spec held after that attempt. */
  onAttempt?: (record: AttemptRecord, held: GameSpec | null) => Promise<void> | void;
};

export type DiamondWorkflowResult = {
  summary: Summary;
  spec: GameSpec;
  approved: boolean;
  attempts: AttemptRecord[];
  html: string;
};

const passThrough: StepRunner = (_step, fn) => fn();

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Extract once, then alternate generate (architect, later refine) and review
 * until approval or `maxRetries` attempts, then build whatever spec is held.
 */
export async function runDiamondWorkflow(
  input: { sourcePath: string; gameType: GameType },
  options: DiamondWorkflowOptions
): Promise<DiamondWorkflowResult> {
  const { stages, reporter, signal } = options;
  if (!Number.isInteger(options.maxRetries) || options.maxRetries < 1) {
    throw new RangeError(`maxRetries must be a positive integer (got ${options.maxRetries})`);
  }
  const maxRetries = options.maxRetries;
  const runStep = options.runStep ?? passThrough;

  const summary = await runStep("extract", () => stages.extract(input.sourcePath));

  let spec: GameSpec | null = null;
  let feedback = "";
  let approved = false;
  const attempts: AttemptRecord[] = [];

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    if (signal?.aborted) throw new Error("Cancelled");
    reporter.log(`Attempt ${attempt}/${maxRetries}`);

    // Nothing to refine until something usable exists.
    const held: GameSpec | null = spec;
    const record: AttemptRecord = { attempt, stage: held === null ? "architect" : "refine", produced: false };

    let produced: GameSpec | null = null;
    try {
      produced =
        held === null
          ? await runStep("architect", () => stages.design(summary, input.gameType))
          : await runStep("refine", () => stages.refine(held, feedback, summary));
    } catch (err) {
      if (signal?.aborted) throw err;
      record.error = errorMessage(err);
      reporter.error(`${record.stage} failed on attempt ${attempt}: ${record.error}`, record.stage);
    }

    if (!produced) {
      reporter.log(`Attempt ${attempt} failed to generate structure`);
      attempts.push(record);
      await options.onAttempt?.(record, spec);
      continue;
    }

    const current: GameSpec = produced;
    spec = current;
    record.produced = true;

    let verdict: ReviewVerdict;
    try {
      verdict = await runStep("review", () => stages.review(current, summary));
    } catch (err) {
      if (signal?.aborted) throw err;
      verdict = { approved: false, feedback: `Review failed: ${errorMessage(err)}` };
      reporter.error(verdict.feedback, "review");
    }
    record.verdict = verdict;
    attempts.push(record);
    await options.onAttempt?.(record, spec);

    if (verdict.approved) {
      approved = true;
      reporter.log(`Content approved on attempt ${attempt}!`, "review");
      break;
    }

    feedback = verdict.feedback;
    reporter.log(`Reviewer feedback (attempt ${attempt}): ${feedback}`, "review");
  }

  if (!spec) throw new NoUsableGameSpecError(attempts.length);
  if (!approved) reporter.log("Max retries reached. Proceeding with best version...");

  const finalSpec = spec;
  const html = await runStep("build", () => stages.build(finalSpec));
  return { summary, spec: finalSpec, approved, attempts, html };
}
