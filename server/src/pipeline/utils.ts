import fs from "node:fs/promises";
import path from "node:path";
import { fileURLToPath } from "node:url";

export const RUN_INTERMEDIATE_DIRNAME = "intermediate";
export const RUN_FINAL_DIRNAME = "final";

// Final outputs; everything else a run writes is intermediate.
const FINAL_ARTIFACT_PATTERNS = [/^game_spec\.json$/, /^workflow_report\.json$/, /^game_[a-z]+_.+\.html$/];

export function nowIso(): string {
  return new Date().toISOString();
}

export function repoRoot(): string {
  // This file lives at server/src/pipeline/utils.ts
  // repo root is three levels up: pipeline -> src -> server -> repo
  const here = path.dirname(fileURLToPath(import.meta.url));
  return path.resolve(here, "../../..");
}

function dirFromEnv(name: string, fallback: string): string {
  const env = process.env[name];
  if (env && env.trim().length > 0) return path.resolve(env.trim());
  return path.join(repoRoot(), fallback);
}

export function outputRootAbs(): string {
  return dirFromEnv("GF_OUTPUT_DIR", "output");
}

export function uploadsRootAbs(): string {
  return dirFromEnv("GF_UPLOAD_DIR", "uploads");
}

export function templatesRootAbs(): string {
  return dirFromEnv("GF_TEMPLATES_DIR", "templates");
}

export function runOutputDirAbs(runId: string): string {
  return path.join(outputRootAbs(), runId);
}

export function runIntermediateDirAbs(runId: string): string {
  return path.join(runOutputDirAbs(runId), RUN_INTERMEDIATE_DIRNAME);
}

export function runFinalDirAbs(runId: string): string {
  return path.join(runOutputDirAbs(runId), RUN_FINAL_DIRNAME);
}

export function isFinalArtifactName(name: string): boolean {
  return FINAL_ARTIFACT_PATTERNS.some((re) => re.test(name));
}

export function artifactAbsPath(runId: string, name: string): string {
  if (isFinalArtifactName(name)) {
    return path.join(runFinalDirAbs(runId), name);
  }
  return path.join(runIntermediateDirAbs(runId), name);
}

async function fileExists(filePath: string): Promise<boolean> {
  try {
    const stat = await fs.stat(filePath);
    return stat.isFile();
  } catch {
    return false;
  }
}

export async function resolveArtifactPathAbs(runId: string, name: string): Promise<string | null> {
  const preferred = artifactAbsPath(runId, name);
  if (await fileExists(preferred)) return preferred;

  const intermediate = path.join(runIntermediateDirAbs(runId), name);
  if (intermediate !== preferred && (await fileExists(intermediate))) return intermediate;

  const final = path.join(runFinalDirAbs(runId), name);
  if (final !== preferred && (await fileExists(final))) return final;

  return null;
}

export async function ensureDir(dirPath: string): Promise<void> {
  await fs.mkdir(dirPath, { recursive: true });
}

async function atomicWrite(filePath: string, data: string | Buffer): Promise<void> {
  await ensureDir(path.dirname(filePath));
  const tmpPath = `${filePath}.tmp.${process.pid}.${Date.now()}`;
  await fs.writeFile(tmpPath, data);
  await fs.rename(tmpPath, filePath);
}

export async function writeTextFile(filePath: string, text: string): Promise<void> {
  const out = text.endsWith("\n") ? text : `${text}\n`;
  await atomicWrite(filePath, out);
}

export async function writeJsonFile(filePath: string, obj: unknown): Promise<void> {
  await atomicWrite(filePath, `${JSON.stringify(obj, null, 2)}\n`);
}

export async function readJsonFile(filePath: string): Promise<unknown> {
  const raw = await fs.readFile(filePath, "utf8");
  return JSON.parse(raw) as unknown;
}

export async function tryReadJsonFile(filePath: string): Promise<unknown> {
  try {
    return await readJsonFile(filePath);
  } catch {
    return null;
  }
}

export function isSafeArtifactName(name: string): boolean {
  // Prevent path traversal and keep filenames predictable.
  if (name.includes("/") || name.includes("\\") || name.includes("..")) return false;
  return /^[A-Za-z0-9._-]+$/.test(name);
}

export function slug(input: string): string {
  const s = input
    .trim()
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, "-")
    .replace(/^-+|-+$/g, "");
  return s.slice(0, 60) || "untitled";
}

export function sourceStem(originalName: string): string {
  const base = path.basename(originalName);
  const ext = path.extname(base);
  return slug(ext ? base.slice(0, -ext.length) : base);
}
