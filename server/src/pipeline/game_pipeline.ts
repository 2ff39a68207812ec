import { requireApiKey, type AppConfig } from "../config.js";
import type { PipelineFn } from "../executor.js";
import type { StepName } from "../run_manager.js";
import { buildGame } from "./builder.js";
import { createFakeTextModel } from "./fake_model.js";
import { createAgentsTextModel, type TextModel } from "./llm.js";
import { itemCount } from "./schemas.js";
import { designGame, extractSummary, refineGame, reviewGame, type StageContext } from "./stages.js";
import { artifactAbsPath, sourceStem, templatesRootAbs, writeJsonFile, writeTextFile } from "./utils.js";
import { runDiamondWorkflow, type WorkflowStages } from "./workflow.js";

export type GamePipelineDeps = {
  config: AppConfig;
  /** Overrides model construction (tests inject scripted models here). */
  createModel?: (config: AppConfig) => TextModel;
  templatesDir?: string;
};

export function createTextModel(config: AppConfig): TextModel {
  if (config.pipelineMode === "fake") return createFakeTextModel();
  return createAgentsTextModel({ apiKey: requireApiKey(config), model: config.model });
}

export function gameArtifactName(gameType: string, originalName: string): string {
  return `game_${gameType}_${sourceStem(originalName)}.html`;
}

export function createGamePipeline(deps: GamePipelineDeps): PipelineFn {
  const { config } = deps;

  return async (input, runs, options) => {
    const { runId, gameType, source, settings } = input;
    const { signal } = options;
    const maxRetries = settings?.maxRetries ?? config.maxRetries;
    const templatesDir = deps.templatesDir ?? templatesRootAbs();

    // Credential check happens here, before any model call.
    const model = (deps.createModel ?? createTextModel)(config);

    runs.log(runId, `Pipeline start (gameType=${gameType}, maxRetries=${maxRetries})`);
    runs.log(runId, config.pipelineMode === "fake" ? "Using fake model (GF_PIPELINE_MODE=fake)" : `Using model: ${config.model}`);

    async function writeJsonArtifact(step: StepName, name: string, obj: unknown) {
      await writeJsonFile(artifactAbsPath(runId, name), obj);
      await runs.addArtifact(runId, step, name);
    }

    async function writeTextArtifact(step: StepName, name: string, text: string) {
      await writeTextFile(artifactAbsPath(runId, name), text);
      await runs.addArtifact(runId, step, name);
    }

    async function runStep<T>(step: StepName, fn: () => Promise<T>): Promise<T> {
      if (signal.aborted) throw new Error("Cancelled");
      await runs.startStep(runId, step);
      try {
        const out = await fn();
        await runs.finishStep(runId, step, true);
        return out;
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        await runs.finishStep(runId, step, false, msg);
        throw err;
      }
    }

    function stageContext(step: StepName): StageContext {
      return {
        model,
        signal,
        documentCharLimit: config.documentCharLimit,
        reporter: {
          log: (message) => runs.log(runId, message, step),
          error: (message) => runs.error(runId, message, step)
        },
        onDocumentConverted: (markdown) => writeTextArtifact(step, "document.md", markdown)
      };
    }

    const gameArtifact = gameArtifactName(gameType, source.originalName);

    const stages: WorkflowStages = {
      extract: async (sourcePath) => {
        const summary = await extractSummary(stageContext("extract"), sourcePath);
        const { full_text: _fullText, ...fields } = summary;
        await writeJsonArtifact("extract", "summary.json", fields);
        return summary;
      },
      design: (summary, type) => designGame(stageContext("architect"), summary, type),
      review: (spec, summary) => reviewGame(stageContext("review"), spec, summary),
      refine: (spec, feedback, summary) => refineGame(stageContext("refine"), spec, feedback, summary),
      build: async (spec) => {
        runs.log(runId, `Builder: rendering ${spec.game_type} template (${itemCount(spec)} items) from ${templatesDir}`, "build");
        const html = await buildGame(spec, templatesDir);
        await writeTextArtifact("build", gameArtifact, html);
        return html;
      }
    };

    const result = await runDiamondWorkflow(
      { sourcePath: source.tempPath, gameType },
      {
        stages,
        maxRetries,
        signal,
        runStep,
        reporter: {
          log: (message, step) => runs.log(runId, message, step),
          error: (message, step) => runs.error(runId, message, step)
        },
        onAttempt: async (record, held) => {
          await runs.recordAttempt(runId, record);
          const step: StepName = record.stage;
          if (record.produced && held) await writeJsonArtifact(step, `game_spec_attempt_${record.attempt}.json`, held);
          if (record.verdict) await writeJsonArtifact("review", `review_attempt_${record.attempt}.json`, record.verdict);
        }
      }
    );

    await writeJsonArtifact("build", "game_spec.json", result.spec);
    await writeJsonArtifact("build", "workflow_report.json", {
      gameType,
      source: source.originalName,
      approved: result.approved,
      maxRetries,
      attempts: result.attempts,
      gameArtifact
    });
    await runs.setOutcome(runId, { approved: result.approved, attempts: result.attempts.length, gameArtifact });
    runs.log(runId, result.approved ? "Game built from approved content." : "Game built from best unapproved version.", "build");
  };
}
