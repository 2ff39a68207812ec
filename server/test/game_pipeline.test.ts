import { afterEach, beforeEach, describe, expect, it } from "vitest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import type { AppConfig } from "../src/config.js";
import { MissingCredentialError, TemplateNotFoundError } from "../src/pipeline/errors.js";
import { createGamePipeline, gameArtifactName } from "../src/pipeline/game_pipeline.js";
import type { TextModel } from "../src/pipeline/llm.js";
import type { GameType } from "../src/pipeline/schemas.js";
import { artifactAbsPath, readJsonFile, repoRoot, runFinalDirAbs, runIntermediateDirAbs } from "../src/pipeline/utils.js";
import { RunManager } from "../src/run_manager.js";
import { fenced, makeMatchingSpec, scriptedModel, testConfig, type ScriptedModel } from "./fixtures.js";

let tmpRoot: string | null = null;

function root(): string {
  if (!tmpRoot) throw new Error("tmpRoot not initialised");
  return tmpRoot;
}

beforeEach(async () => {
  tmpRoot = await fs.mkdtemp(path.join(os.tmpdir(), "gf-pipeline-"));
  process.env.GF_OUTPUT_DIR = path.join(tmpRoot, "output");
});

afterEach(async () => {
  delete process.env.GF_OUTPUT_DIR;
  if (tmpRoot) await fs.rm(tmpRoot, { recursive: true, force: true }).catch(() => undefined);
  tmpRoot = null;
});

const SUMMARY_REPLY = JSON.stringify({
  topic: "Cell biology",
  subject_area: "biology",
  key_concepts: ["mitochondria", "ribosome"],
  facts: ["Mitochondria produce ATP."],
  learning_objectives: ["Name the organelles"]
});

async function startRun(options: {
  gameType?: GameType;
  doc?: string;
  name?: string;
  config?: AppConfig;
  model?: TextModel;
  templatesDir?: string;
  maxRetries?: number;
}) {
  const name = options.name ?? "Cell Notes.md";
  const tempPath = path.join(root(), "upload.md");
  await fs.writeFile(tempPath, options.doc ?? "# Cell biology\n\nMitochondria produce ATP.", "utf8");

  const runs = new RunManager();
  const run = await runs.createRun({
    gameType: options.gameType ?? "matching",
    source: { originalName: name, tempPath, sizeBytes: 10 },
    settings: options.maxRetries === undefined ? undefined : { maxRetries: options.maxRetries }
  });
  const model = options.model;
  const pipeline = createGamePipeline({
    config: options.config ?? testConfig(),
    createModel: model ? () => model : undefined,
    templatesDir: options.templatesDir ?? path.join(repoRoot(), "templates")
  });
  const logs: string[] = [];
  runs.subscribe(run.runId, (type, payload) => {
    if (type === "log" && typeof payload === "object" && payload !== null && "message" in payload) logs.push(String(payload.message));
  });

  const done = pipeline(
    { runId: run.runId, gameType: run.gameType, source: run.source, settings: run.settings },
    runs,
    { signal: new AbortController().signal }
  );
  return { runs, runId: run.runId, done, logs };
}

function approving(): ScriptedModel {
  return scriptedModel({
    extract: [SUMMARY_REPLY],
    architect: [fenced(makeMatchingSpec())],
    review: [JSON.stringify({ approved: true, feedback: "Content approved" })]
  });
}

describe("createGamePipeline", () => {
  it("builds an approved game and writes every artifact", async () => {
    const { runs, runId, done, logs } = await startRun({ model: approving() });
    await done;

    const artifact = "game_matching_cell-notes.html";
    expect(runs.getRun(runId)?.outcome).toEqual({ approved: true, attempts: 1, gameArtifact: artifact });

    expect((await fs.readdir(runIntermediateDirAbs(runId))).sort()).toEqual([
      "document.md",
      "game_spec_attempt_1.json",
      "review_attempt_1.json",
      "summary.json"
    ]);
    expect((await fs.readdir(runFinalDirAbs(runId))).sort()).toEqual([artifact, "game_spec.json", "workflow_report.json"]);

    expect(await readJsonFile(artifactAbsPath(runId, "summary.json"))).toEqual(JSON.parse(SUMMARY_REPLY));
    expect(await readJsonFile(artifactAbsPath(runId, "game_spec.json"))).toEqual(makeMatchingSpec());
    expect(await readJsonFile(artifactAbsPath(runId, "review_attempt_1.json"))).toEqual({ approved: true, feedback: "Content approved" });
    expect(await readJsonFile(artifactAbsPath(runId, "workflow_report.json"))).toEqual({
      gameType: "matching",
      source: "Cell Notes.md",
      approved: true,
      maxRetries: 3,
      attempts: [{ attempt: 1, stage: "architect", produced: true, verdict: { approved: true, feedback: "Content approved" } }],
      gameArtifact: artifact
    });

    const html = await fs.readFile(artifactAbsPath(runId, artifact), "utf8");
    expect(html).toContain("<title>Organelle Match</title>");

    expect(logs[0]).toBe("Pipeline start (gameType=matching, maxRetries=3)");
    expect(logs[1]).toBe("Using model: gpt-4o");
    expect(logs[logs.length - 1]).toBe("Game built from approved content.");
  });

  it("refines through rejections and records each attempt", async () => {
    const v2 = makeMatchingSpec(8, "Second draft");
    const v3 = makeMatchingSpec(9, "Third draft");
    const model = scriptedModel({
      extract: [SUMMARY_REPLY],
      architect: [fenced(makeMatchingSpec())],
      refine: [fenced(v2), fenced(v3)],
      review: [
        JSON.stringify({ approved: false, feedback: "Definition 3 is wrong" }),
        JSON.stringify({ approved: false, feedback: "Add more pairs" }),
        JSON.stringify({ approved: true, feedback: "Content approved" })
      ]
    });
    const { runs, runId, done } = await startRun({ model });
    await done;

    const run = runs.getRun(runId);
    expect(run?.attempts.map((a) => [a.attempt, a.stage, a.verdict?.approved])).toEqual([
      [1, "architect", false],
      [2, "refine", false],
      [3, "refine", true]
    ]);
    expect(run?.steps.extract.invocations).toBe(1);
    expect(run?.steps.architect.invocations).toBe(1);
    expect(run?.steps.refine.invocations).toBe(2);
    expect(run?.steps.review.invocations).toBe(3);
    expect(run?.steps.build.invocations).toBe(1);
    expect(run?.steps.refine.artifacts).toEqual(["game_spec_attempt_2.json", "game_spec_attempt_3.json"]);

    expect(await readJsonFile(artifactAbsPath(runId, "game_spec_attempt_2.json"))).toEqual(v2);
    expect(await readJsonFile(artifactAbsPath(runId, "game_spec.json"))).toEqual(v3);
    expect(model.calls.map((c) => c.stage)).toEqual(["extract", "architect", "review", "refine", "review", "refine", "review"]);
  });

  it("honours a per-run retry budget and builds the unapproved spec", async () => {
    const model = scriptedModel({
      extract: [SUMMARY_REPLY],
      architect: [fenced(makeMatchingSpec())],
      refine: [fenced(makeMatchingSpec(8, "Refined"))],
      review: [JSON.stringify({ approved: false, feedback: "Too vague" })]
    });
    const { runs, runId, done, logs } = await startRun({ model, maxRetries: 2 });
    await done;

    expect(runs.getRun(runId)?.outcome).toEqual({ approved: false, attempts: 2, gameArtifact: "game_matching_cell-notes.html" });
    expect(model.calls.filter((c) => c.stage === "review")).toHaveLength(2);
    expect(logs).toContain("Max retries reached. Proceeding with best version...");
    expect(logs[logs.length - 1]).toBe("Game built from best unapproved version.");
  });

  it("checks credentials before any model call", async () => {
    const { runs, runId, done } = await startRun({ config: testConfig({ openaiApiKey: null }) });
    await expect(done).rejects.toThrow(MissingCredentialError);
    expect(runs.getRun(runId)?.steps.extract.invocations).toBe(0);
  });

  it("fails the build step when the template is missing", async () => {
    const templatesDir = path.join(root(), "templates");
    await fs.mkdir(templatesDir);
    const { runs, runId, done } = await startRun({ model: approving(), templatesDir });

    await expect(done).rejects.toThrow(TemplateNotFoundError);
    const build = runs.getRun(runId)?.steps.build;
    expect(build?.status).toBe("error");
    expect(build?.error).toBe(
      `Template not found: ${path.join(templatesDir, "matching_game.html")}\n\n` +
        `No templates found in ${templatesDir}.\n` +
        "Please ensure matching_game.html, quiz_game.html, flashcards_game.html are in the templates folder."
    );
    expect(runs.getRun(runId)?.outcome).toBeUndefined();
  });

  it("runs end to end on the fake model", async () => {
    const { runs, runId, done, logs } = await startRun({
      config: testConfig({ openaiApiKey: null, pipelineMode: "fake" }),
      gameType: "quiz",
      name: "volcanoes.txt",
      doc: "# Volcanoes\n\nMagma rises through the crust.\nAsh clouds travel far."
    });
    await done;

    expect(logs[1]).toBe("Using fake model (GF_PIPELINE_MODE=fake)");
    const outcome = runs.getRun(runId)?.outcome;
    expect(outcome).toEqual({ approved: true, attempts: 1, gameArtifact: "game_quiz_volcanoes.html" });
    const html = await fs.readFile(artifactAbsPath(runId, "game_quiz_volcanoes.html"), "utf8");
    expect(html).toContain("<title>Volcanoes: Quiz</title>");
  });
});

describe("gameArtifactName", () => {
  it("combines the game type with the source stem", () => {
    expect(gameArtifactName("flashcards", "Chapter 2 - Cells.pdf")).toBe("game_flashcards_chapter-2-cells.html");
  });
});
