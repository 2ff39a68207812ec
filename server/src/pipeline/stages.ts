import { convertDocument } from "./document.js";
import { SummaryExtractionError } from "./errors.js";
import { extractJson, isEmptyMapping } from "./json_extract.js";
import type { LlmStage } from "./agents.js";
import type { TextModel } from "./llm.js";
import {
  checkGameSpec,
  MIN_ITEMS,
  SummaryFieldsSchema,
  toReviewVerdict,
  type GameSpec,
  type GameType,
  type ReviewVerdict,
  type Summary
} from "./schemas.js";

export const DEFAULT_DOCUMENT_CHAR_LIMIT = 8000;

export type StageReporter = {
  log: (message: string) => void;
  error: (message: string) => void;
};

export type StageContext = {
  model: TextModel;
  reporter: StageReporter;
  signal?: AbortSignal;
  documentCharLimit?: number;
  /** Receives the converted document so callers can keep it as an artifact. */
  onDocumentConverted?: (markdown: string) => Promise<void> | void;
};

const GAME_SCHEMAS: Record<GameType, string> = {
  matching: `{
  "game_type": "matching",
  "title": "creative title",
  "theme_color": "CSS color based on subject (e.g., medical=#00bfa5, history=#ff6b35, tech=#667eea)",
  "pairs": [
    {"term": "concept name", "definition": "clear definition"},
    ... (minimum ${MIN_ITEMS.matching} pairs)
  ]
}`,
  quiz: `{
  "game_type": "quiz",
  "title": "creative title",
  "theme_color": "CSS color",
  "questions": [
    {
      "question": "question text",
      "options": ["A", "B", "C", "D"],
      "correct": 0,
      "explanation": "why this is correct"
    },
    ... (minimum ${MIN_ITEMS.quiz} questions)
  ]
}`,
  flashcards: `{
  "game_type": "flashcards",
  "title": "creative title",
  "theme_color": "CSS color",
  "cards": [
    {"front": "term or question", "back": "definition or answer"},
    ... (minimum ${MIN_ITEMS.flashcards} cards)
  ]
}`
};

function summaryForPrompt(summary: Summary): string {
  // full_text goes into its own SOURCE TEXT section.
  const { full_text: _fullText, ...fields } = summary;
  return JSON.stringify(fields, null, 2);
}

function sourceSection(summary: Summary, charLimit: number): string {
  return `SOURCE TEXT:\n${summary.full_text.slice(0, charLimit)}\n\n`;
}

function charLimitOf(ctx: StageContext): number {
  return ctx.documentCharLimit ?? DEFAULT_DOCUMENT_CHAR_LIMIT;
}

async function askForJson(ctx: StageContext, stage: LlmStage, prompt: string): Promise<unknown> {
  const text = await ctx.model.complete({ stage, prompt, signal: ctx.signal });
  return extractJson(text, (message, offending) => {
    ctx.reporter.error(message);
    ctx.reporter.log(`Unparsable ${stage} response:\n${offending}`);
  });
}

export function buildExtractPrompt(markdown: string, charLimit: number): string {
  return (
    `Given this document content, create a comprehensive summary that captures:\n` +
    `1. Main topic and subject area\n` +
    `2. Key concepts and terminology (at least 10-15 items)\n` +
    `3. Important facts and relationships\n` +
    `4. Learning objectives\n\n` +
    `DOCUMENT CONTENT:\n${markdown.slice(0, charLimit)}\n\n` +
    `OUTPUT KEYS:\n` +
    `- topic: main subject\n` +
    `- subject_area: (e.g., "biology", "history", "programming", "physics")\n` +
    `- key_concepts: list of important terms/concepts\n` +
    `- facts: list of key facts or relationships\n` +
    `- learning_objectives: what students should learn\n\n` +
    `Return ONLY valid JSON, no markdown formatting.`
  );
}

export function buildArchitectPrompt(
  summary: Summary,
  gameType: GameType,
  charLimit = DEFAULT_DOCUMENT_CHAR_LIMIT
): string {
  return (
    `CONTENT SUMMARY (JSON):\n${summaryForPrompt(summary)}\n\n` +
    sourceSection(summary, charLimit) +
    `GAME TYPE:\n${gameType}\n\n` +
    `OUTPUT SCHEMA:\n${GAME_SCHEMAS[gameType]}\n\n` +
    `Design a ${gameType} game with at least ${MIN_ITEMS[gameType]} items, using content from the summary.\n` +
    `Make it educational and engaging. Return ONLY valid JSON.`
  );
}

export function buildReviewPrompt(spec: GameSpec, summary: Summary, charLimit = DEFAULT_DOCUMENT_CHAR_LIMIT): string {
  return (
    `CONTENT SUMMARY (JSON):\n${summaryForPrompt(summary)}\n\n` +
    sourceSection(summary, charLimit) +
    `PROPOSED GAME (JSON):\n${JSON.stringify(spec, null, 2)}\n\n` +
    `Review the game content for:\n` +
    `1. Factual accuracy (do terms/definitions match the source text?)\n` +
    `2. Completeness (are key concepts included?)\n` +
    `3. Clarity (are explanations clear and correct?)\n\n` +
    `Respond in JSON format:\n` +
    `{\n  "approved": true/false,\n  "feedback": "specific issues found or 'Content approved'"\n}`
  );
}

export function buildRefinePrompt(
  spec: GameSpec,
  feedback: string,
  summary: Summary,
  charLimit = DEFAULT_DOCUMENT_CHAR_LIMIT
): string {
  return (
    `CONTENT SUMMARY (JSON):\n${summaryForPrompt(summary)}\n\n` +
    sourceSection(summary, charLimit) +
    `CURRENT GAME (JSON):\n${JSON.stringify(spec, null, 2)}\n\n` +
    `REVIEWER FEEDBACK:\n${feedback}\n\n` +
    `Fix the issues mentioned in the feedback while maintaining the same JSON structure ` +
    `(game_type "${spec.game_type}", at least ${MIN_ITEMS[spec.game_type]} items).\n` +
    `Return ONLY the corrected JSON in the same format.`
  );
}

export async function extractSummary(ctx: StageContext, sourcePath: string): Promise<Summary> {
  ctx.reporter.log("Extractor: processing document...");
  const markdown = await convertDocument(sourcePath);
  await ctx.onDocumentConverted?.(markdown);

  const charLimit = charLimitOf(ctx);
  if (markdown.length > charLimit) {
    ctx.reporter.log(`Document is ${markdown.length} chars; summarizing the first ${charLimit}.`);
  }

  const raw = await askForJson(ctx, "extract", buildExtractPrompt(markdown, charLimit));
  if (isEmptyMapping(raw)) throw new SummaryExtractionError("Failed to extract document content");

  const parsed = SummaryFieldsSchema.safeParse(raw);
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`).join("; ");
    throw new SummaryExtractionError(`Document summary is invalid: ${detail}`);
  }
  return { ...parsed.data, full_text: markdown };
}

export async function designGame(ctx: StageContext, summary: Summary, gameType: GameType): Promise<GameSpec | null> {
  ctx.reporter.log("Architect: designing game structure...");
  const raw = await askForJson(ctx, "architect", buildArchitectPrompt(summary, gameType, charLimitOf(ctx)));
  const checked = checkGameSpec(raw, gameType);
  if (!checked.ok) {
    ctx.reporter.log(`Architect output rejected: ${checked.reason}`);
    return null;
  }
  return checked.spec;
}

export async function reviewGame(ctx: StageContext, spec: GameSpec, summary: Summary): Promise<ReviewVerdict> {
  ctx.reporter.log("Reviewer: fact-checking content...");
  const raw = await askForJson(ctx, "review", buildReviewPrompt(spec, summary, charLimitOf(ctx)));
  return toReviewVerdict(raw);
}

export async function refineGame(ctx: StageContext, spec: GameSpec, feedback: string, summary: Summary): Promise<GameSpec | null> {
  ctx.reporter.log("Refiner: improving game based on feedback...");
  const raw = await askForJson(ctx, "refine", buildRefinePrompt(spec, feedback, summary, charLimitOf(ctx)));
  const checked = checkGameSpec(raw, spec.game_type);
  if (!checked.ok) {
    ctx.reporter.log(`Refiner output rejected: ${checked.reason}`);
    return null;
  }
  return checked.spec;
}
