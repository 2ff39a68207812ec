import express from "express";
import cors from "cors";
import path from "node:path";
import fs from "node:fs/promises";
import archiver from "archiver";
import formidable from "formidable";
import { z } from "zod";
import { MAX_RETRIES_LIMIT, type AppConfig } from "./config.js";
import type { RunExecutor } from "./executor.js";
import type { RunManager } from "./run_manager.js";
import { templateInventory } from "./pipeline/builder.js";
import { isSupportedDocument, SUPPORTED_DOCUMENT_EXTENSIONS } from "./pipeline/document.js";
import { GameTypeSchema } from "./pipeline/schemas.js";
import {
  ensureDir,
  isSafeArtifactName,
  resolveArtifactPathAbs,
  runFinalDirAbs,
  runIntermediateDirAbs,
  runOutputDirAbs,
  templatesRootAbs,
  uploadsRootAbs
} from "./pipeline/utils.js";

type ArtifactFolder = "intermediate" | "final";

const MAX_UPLOAD_BYTES = 50 * 1024 * 1024;

const CreateRunFieldsSchema = z
  .object({
    gameType: GameTypeSchema,
    maxRetries: z.coerce.number().int().min(1).max(MAX_RETRIES_LIMIT).optional()
  })
  .strict();

function firstField(value: string[] | undefined): string | undefined {
  return value && value.length > 0 ? value[0] : undefined;
}

function contentTypeFor(name: string): string {
  const lower = name.toLowerCase();
  if (lower.endsWith(".json")) return "application/json; charset=utf-8";
  if (lower.endsWith(".md")) return "text/markdown; charset=utf-8";
  if (lower.endsWith(".html")) return "text/html; charset=utf-8";
  return "text/plain; charset=utf-8";
}

export type AppOptions = {
  config: AppConfig;
  templatesDir?: string;
};

export function createApp(runs: RunManager, executor: RunExecutor, options: AppOptions) {
  const { config } = options;
  const templatesDir = () => options.templatesDir ?? templatesRootAbs();

  const app = express();
  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  app.get("/api/health", async (_req, res) => {
    res.json({
      ok: true,
      hasKey: Boolean(config.openaiApiKey),
      model: config.model,
      pipelineMode: config.pipelineMode,
      maxRetries: config.maxRetries,
      templates: await templateInventory(templatesDir())
    });
  });

  app.get("/api/templates", async (_req, res) => {
    res.json(await templateInventory(templatesDir()));
  });

  app.post("/api/runs", async (req, res) => {
    if (config.pipelineMode === "live" && !config.openaiApiKey) {
      res.status(503).json({ error: "OPENAI_API_KEY is not configured; set it in .env and restart the server." });
      return;
    }

    const uploadDir = uploadsRootAbs();
    await ensureDir(uploadDir);
    const form = formidable({ uploadDir, keepExtensions: true, maxFiles: 1, maxFileSize: MAX_UPLOAD_BYTES });

    let fields: formidable.Fields;
    let files: formidable.Files;
    try {
      [fields, files] = await form.parse(req);
    } catch (err) {
      const msg = err instanceof Error ? err.message : String(err);
      res.status(400).json({ error: `invalid upload: ${msg}` });
      return;
    }

    const document = files.document?.[0];
    const discardUpload = async () => {
      for (const list of Object.values(files)) {
        for (const f of list ?? []) await fs.rm(f.filepath, { force: true });
      }
    };

    const parsed = CreateRunFieldsSchema.safeParse({
      gameType: firstField(fields.gameType),
      maxRetries: firstField(fields.maxRetries)
    });
    if (!parsed.success) {
      await discardUpload();
      res.status(400).json({ error: parsed.error.flatten() });
      return;
    }

    if (!document) {
      await discardUpload();
      res.status(400).json({ error: "document file is required" });
      return;
    }

    const originalName = path.basename(document.originalFilename ?? "document");
    if (!isSupportedDocument(originalName)) {
      await discardUpload();
      res.status(400).json({ error: `unsupported document type; expected one of ${SUPPORTED_DOCUMENT_EXTENSIONS.join(", ")}` });
      return;
    }

    const settings = parsed.data.maxRetries === undefined ? undefined : { maxRetries: parsed.data.maxRetries };
    const run = await runs.createRun({
      gameType: parsed.data.gameType,
      source: { originalName, tempPath: document.filepath, sizeBytes: document.size },
      settings
    });
    res.json({ runId: run.runId });

    executor.enqueue(run.runId);
  });

  app.get("/api/runs", (_req, res) => {
    res.json(runs.listRuns());
  });

  app.get("/api/runs/:runId", (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    res.json(run);
  });

  app.post("/api/runs/:runId/cancel", async (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const ok = await executor.cancel(run.runId);
    if (!ok) {
      res.status(409).json({ error: "run not cancellable" });
      return;
    }

    res.json({ ok: true });
  });

  app.get("/api/runs/:runId/events", (req, res) => {
    const runId = req.params.runId;
    if (!runs.getRun(runId)) {
      res.status(404).end();
      return;
    }

    res.setHeader("Content-Type", "text/event-stream");
    res.setHeader("Cache-Control", "no-cache");
    res.setHeader("Connection", "keep-alive");

    const send = (type: string, payload: unknown) => {
      res.write(`event: ${type}\n`);
      res.write(`data: ${JSON.stringify(payload)}\n\n`);
    };

    const unsubscribe = runs.subscribe(runId, send);
    send("log", { message: "SSE connected" });

    const ping = setInterval(() => {
      res.write("event: ping\n");
      res.write("data: {}\n\n");
    }, 15000);

    req.on("close", () => {
      clearInterval(ping);
      unsubscribe?.();
      res.end();
    });
  });

  app.get("/api/runs/:runId/game", async (req, res) => {
    const run = runs.getRun(req.params.runId);
    if (!run) {
      res.status(404).json({ error: "run not found" });
      return;
    }
    const name = run.outcome?.gameArtifact;
    const filePath = name ? await resolveArtifactPathAbs(run.runId, name) : null;
    if (!name || !filePath) {
      res.status(404).json({ error: "game not built yet" });
      return;
    }

    const inline = req.query.inline === "1" || req.query.inline === "true";
    res.setHeader("Content-Type", "text/html; charset=utf-8");
    res.setHeader("Content-Disposition", `${inline ? "inline" : "attachment"}; filename="${name}"`);
    res.send(await fs.readFile(filePath));
  });

  app.get("/api/runs/:runId/export", (req, res) => {
    const runId = req.params.runId;
    if (!runs.getRun(runId)) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    res.setHeader("Content-Type", "application/zip");
    res.setHeader("Content-Disposition", `attachment; filename="run-${runId}.zip"`);

    const archive = archiver("zip", { zlib: { level: 9 } });

    archive.on("warning", (err) => {
      runs.log(runId, `zip warning: ${err.message}`);
    });

    archive.on("error", (err) => {
      runs.error(runId, `zip error: ${err.message}`);
      res.status(500).end();
    });

    archive.pipe(res);
    archive.directory(runOutputDirAbs(runId), false);
    void archive.finalize();
  });

  app.get("/api/runs/:runId/artifacts", async (req, res) => {
    const runId = req.params.runId;
    if (!runs.getRun(runId)) {
      res.status(404).json({ error: "run not found" });
      return;
    }

    const scanDirs: Array<{ dir: string; folder: ArtifactFolder }> = [
      { dir: runIntermediateDirAbs(runId), folder: "intermediate" },
      { dir: runFinalDirAbs(runId), folder: "final" }
    ];
    const infos: Array<{ name: string; size: number; mtimeMs: number; folder: ArtifactFolder }> = [];

    for (const scan of scanDirs) {
      const entries = await fs.readdir(scan.dir, { withFileTypes: true }).catch(() => []);
      for (const ent of entries) {
        if (!ent.isFile()) continue;
        const st = await fs.stat(path.join(scan.dir, ent.name)).catch(() => null);
        if (!st) continue;
        infos.push({ name: ent.name, size: st.size, mtimeMs: st.mtimeMs, folder: scan.folder });
      }
    }

    res.json(infos.sort((a, b) => b.mtimeMs - a.mtimeMs));
  });

  app.get("/api/runs/:runId/artifacts/:name", async (req, res) => {
    const { runId, name } = req.params;

    if (!isSafeArtifactName(name)) {
      res.status(400).send("invalid artifact name");
      return;
    }

    if (!runs.getRun(runId)) {
      res.status(404).send("run not found");
      return;
    }

    const filePath = await resolveArtifactPathAbs(runId, name);
    if (!filePath) {
      res.status(404).send("artifact not found");
      return;
    }

    res.setHeader("Content-Type", contentTypeFor(name));
    res.send(await fs.readFile(filePath));
  });

  return app;
}
