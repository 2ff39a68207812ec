import fs from "node:fs/promises";
import path from "node:path";
import nunjucks from "nunjucks";
import { TemplateNotFoundError } from "./errors.js";
import { GAME_TYPES, type GameSpec, type GameType } from "./schemas.js";

export const TEMPLATE_SUFFIX = "_game.html";

export function templateFileName(gameType: GameType): string {
  return `${gameType}${TEMPLATE_SUFFIX}`;
}

export async function listTemplates(templatesDir: string): Promise<string[]> {
  const entries = await fs.readdir(templatesDir, { withFileTypes: true }).catch(() => []);
  return entries
    .filter((ent) => ent.isFile() && ent.name.toLowerCase().endsWith(".html"))
    .map((ent) => ent.name)
    .sort();
}

export type TemplateInventory = {
  dir: string;
  available: string[];
  missing: string[];
};

export async function templateInventory(templatesDir: string): Promise<TemplateInventory> {
  const available = await listTemplates(templatesDir);
  const missing = GAME_TYPES.map(templateFileName).filter((name) => !available.includes(name));
  return { dir: templatesDir, available, missing };
}

function notFoundMessage(templatePath: string, templatesDir: string, available: string[]): string {
  let msg = `Template not found: ${templatePath}\n\n`;
  if (available.length > 0) {
    msg += `Available templates: ${available.join(", ")}`;
  } else {
    msg += `No templates found in ${templatesDir}.\n`;
    msg += `Please ensure ${GAME_TYPES.map(templateFileName).join(", ")} are in the templates folder.`;
  }
  return msg;
}

// Autoescape is the only transformation applied to spec values.
const env = new nunjucks.Environment(null, { autoescape: true, throwOnUndefined: false });

export function renderGame(template: string, spec: GameSpec): string {
  return env.renderString(template, { ...spec });
}

export async function buildGame(spec: GameSpec, templatesDir: string): Promise<string> {
  const templatePath = path.join(templatesDir, templateFileName(spec.game_type));

  let template: string;
  try {
    template = await fs.readFile(templatePath, "utf8");
  } catch (err) {
    const code = err instanceof Error && "code" in err ? err.code : undefined;
    if (code !== "ENOENT" && code !== "EISDIR") throw err;
    const available = await listTemplates(templatesDir);
    throw new TemplateNotFoundError(templatePath, available, notFoundMessage(templatePath, templatesDir, available));
  }

  return renderGame(template, spec);
}
