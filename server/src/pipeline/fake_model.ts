import { z } from "zod";
import type { TextModel, TextRequest } from "./llm.js";
import { MIN_ITEMS, type GameSpec, type GameType } from "./schemas.js";

const THEME_BY_SUBJECT: Record<string, string> = {
  biology: "#00bfa5",
  medicine: "#00bfa5",
  history: "#ff6b35",
  programming: "#667eea",
  physics: "#3f51b5"
};

/** Reads the body of an `UPPER CASE HEADING:` block from a stage prompt. */
export function promptSection(prompt: string, heading: string): string | null {
  const marker = `${heading}:\n`;
  const start = prompt.indexOf(marker);
  if (start === -1) return null;
  const rest = prompt.slice(start + marker.length);
  const next = rest.search(/\n\n[A-Z][A-Z ()/_-]*:\n/);
  return (next === -1 ? rest : rest.slice(0, next)).trim();
}

function parseRecord(text: string | null): Record<string, unknown> {
  if (!text) return {};
  try {
    const parsed = z.record(z.unknown()).safeParse(JSON.parse(text));
    return parsed.success ? parsed.data : {};
  } catch {
    return {};
  }
}

function stringList(value: unknown): string[] {
  return Array.isArray(value) ? value.filter((v): v is string => typeof v === "string" && v.trim().length > 0) : [];
}

function cycle<T>(items: T[], count: number): T[] {
  return Array.from({ length: count }, (_, i) => items[i % items.length]);
}

function fakeSummary(prompt: string): string {
  const doc = promptSection(prompt, "DOCUMENT CONTENT") ?? "";
  const lines = doc
    .split("\n")
    .map((l) => l.replace(/^#+\s*/, "").trim())
    .filter((l) => l.length > 0);
  const topic = lines[0]?.slice(0, 80) || "Uploaded document";
  const words = [...new Set(doc.match(/[A-Za-z][A-Za-z-]{6,}/g) ?? [])].slice(0, 12);
  const concepts = words.length > 0 ? words : [topic];
  return JSON.stringify({
    topic,
    subject_area: "general",
    key_concepts: concepts,
    facts: lines.slice(1, 9),
    learning_objectives: [`Recall the key ideas of ${topic}`]
  });
}

export function fakeGameSpec(gameType: GameType, topic: string, concepts: string[], facts: string[]): GameSpec {
  const terms = concepts.length > 0 ? concepts : [topic];
  const notes = facts.length > 0 ? facts : [`A key idea in ${topic}.`];
  const title = `${topic}: ${gameType === "quiz" ? "Quiz" : gameType === "matching" ? "Match-Up" : "Flashcards"}`;
  const theme_color = "#667eea";

  if (gameType === "matching") {
    const terms8 = cycle(terms, MIN_ITEMS.matching);
    return {
      game_type: "matching",
      title,
      theme_color,
      pairs: terms8.map((term, i) => ({ term: `${term} (${i + 1})`, definition: notes[i % notes.length] }))
    };
  }

  if (gameType === "quiz") {
    return {
      game_type: "quiz",
      title,
      theme_color,
      questions: cycle(terms, MIN_ITEMS.quiz).map((term, i) => ({
        question: `Question ${i + 1}: which statement relates to "${term}"?`,
        options: [notes[i % notes.length], "None of the above", "All of the above", "It is not covered"],
        correct: 0,
        explanation: `The document links "${term}" to this statement.`
      }))
    };
  }

  return {
    game_type: "flashcards",
    title,
    theme_color,
    cards: cycle(terms, MIN_ITEMS.flashcards).map((term, i) => ({ front: `${term} (${i + 1})`, back: notes[i % notes.length] }))
  };
}

function fakeDesign(prompt: string): string {
  const summary = parseRecord(promptSection(prompt, "CONTENT SUMMARY (JSON)"));
  const requested = promptSection(prompt, "GAME TYPE");
  const gameType: GameType = requested === "quiz" || requested === "flashcards" ? requested : "matching";
  const topic = typeof summary.topic === "string" ? summary.topic : "Uploaded document";
  const spec = fakeGameSpec(gameType, topic, stringList(summary.key_concepts), stringList(summary.facts));
  const subject = typeof summary.subject_area === "string" ? summary.subject_area.toLowerCase() : "";
  return "```json\n" + JSON.stringify({ ...spec, theme_color: THEME_BY_SUBJECT[subject] ?? spec.theme_color }, null, 2) + "\n```";
}

/**
 * Deterministic stand-in for the LLM: summarizes by scanning the document,
 * designs from the summary, approves every review and echoes refinements.
 */
export function createFakeTextModel(): TextModel {
  return {
    async complete({ stage, prompt }: TextRequest): Promise<string> {
      if (stage === "extract") return fakeSummary(prompt);
      if (stage === "architect") return fakeDesign(prompt);
      if (stage === "review") return JSON.stringify({ approved: true, feedback: "Content approved" });
      return promptSection(prompt, "CURRENT GAME (JSON)") ?? "{}";
    }
  };
}
