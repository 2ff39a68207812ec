import type { AppConfig } from "../src/config.js";
import type { TextModel, TextRequest } from "../src/pipeline/llm.js";
import type { FlashcardsSpec, MatchingSpec, QuizSpec, Summary } from "../src/pipeline/schemas.js";

export function makeSummary(overrides?: Partial<Summary>): Summary {
  return {
    topic: "Cell biology",
    subject_area: "biology",
    key_concepts: ["mitochondria", "ribosome", "nucleus"],
    facts: ["Mitochondria produce ATP.", "Ribosomes build proteins."],
    learning_objectives: ["Name the main organelles"],
    full_text: "# Cell biology\n\nMitochondria produce ATP.",
    ...(overrides ?? {})
  };
}

export function makeMatchingSpec(count = 8, title = "Organelle Match"): MatchingSpec {
  return {
    game_type: "matching",
    title,
    theme_color: "#00bfa5",
    pairs: Array.from({ length: count }, (_, i) => ({ term: `term ${i + 1}`, definition: `definition ${i + 1}` }))
  };
}

export function makeQuizSpec(count = 10): QuizSpec {
  return {
    game_type: "quiz",
    title: "Organelle Quiz",
    theme_color: "#667eea",
    questions: Array.from({ length: count }, (_, i) => ({
      question: `question ${i + 1}?`,
      options: ["A", "B", "C", "D"],
      correct: i % 4,
      explanation: `because ${i + 1}`
    }))
  };
}

export function makeFlashcardsSpec(count = 12): FlashcardsSpec {
  return {
    game_type: "flashcards",
    title: "Organelle Cards",
    theme_color: "#ff6b35",
    cards: Array.from({ length: count }, (_, i) => ({ front: `front ${i + 1}`, back: `back ${i + 1}` }))
  };
}

export function fenced(value: unknown): string {
  return "```json\n" + JSON.stringify(value, null, 2) + "\n```";
}

export type ScriptedModel = TextModel & { calls: TextRequest[] };

/**
 * Replies from per-stage queues; the last reply of a queue repeats once the
 * queue is drained. A thrown Error reply is rethrown.
 */
export function scriptedModel(script: Partial<Record<TextRequest["stage"], Array<string | Error>>>): ScriptedModel {
  const calls: TextRequest[] = [];
  const cursors = new Map<string, number>();
  return {
    calls,
    async complete(request: TextRequest): Promise<string> {
      calls.push(request);
      const replies = script[request.stage] ?? [];
      if (replies.length === 0) throw new Error(`no scripted reply for ${request.stage}`);
      const idx = cursors.get(request.stage) ?? 0;
      cursors.set(request.stage, idx + 1);
      const reply = replies[Math.min(idx, replies.length - 1)];
      if (reply instanceof Error) throw reply;
      return reply;
    }
  };
}

export function testConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    openaiApiKey: "test-key",
    model: "gpt-4o",
    maxRetries: 3,
    documentCharLimit: 8000,
    pipelineMode: "live",
    maxConcurrentRuns: 1,
    port: 5050,
    ...(overrides ?? {})
  };
}
