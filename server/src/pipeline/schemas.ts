import { z } from "zod";

export const GAME_TYPES = ["matching", "quiz", "flashcards"] as const;
export const GameTypeSchema = z.enum(GAME_TYPES);
export type GameType = z.infer<typeof GameTypeSchema>;

export const MIN_ITEMS: Record<GameType, number> = {
  matching: 8,
  quiz: 10,
  flashcards: 12
};

function listItemText(item: string | number | Record<string, unknown>): string {
  if (typeof item === "string") return item;
  if (typeof item === "number") return String(item);
  return Object.entries(item)
    .map(([key, value]) => `${key}: ${typeof value === "string" ? value : JSON.stringify(value)}`)
    .join("; ");
}

// Models often answer with objects ("fact"/"relationship" pairs) or numbers; keep them as text.
const SummaryListSchema = z
  .array(z.union([z.string(), z.number(), z.record(z.unknown())]))
  .transform((items) => items.map(listItemText));

export const SummaryFieldsSchema = z.object({
  topic: z.string().trim().min(1),
  subject_area: z.string().trim().min(1).default("general"),
  key_concepts: SummaryListSchema.default([]),
  facts: SummaryListSchema.default([]),
  learning_objectives: z.union([z.string(), z.array(z.string())]).default([])
});

export type SummaryFields = z.infer<typeof SummaryFieldsSchema>;
export type Summary = SummaryFields & { full_text: string };

const nonEmpty = z.string().trim().min(1);

export const MatchingPairSchema = z.object({
  term: nonEmpty,
  definition: nonEmpty
});

export const QuizQuestionSchema = z
  .object({
    question: nonEmpty,
    options: z.array(nonEmpty).min(2),
    correct: z.number().int().min(0),
    explanation: nonEmpty
  })
  .refine((q) => q.correct < q.options.length, {
    message: "correct must index into options",
    path: ["correct"]
  });

export const FlashcardSchema = z.object({
  front: nonEmpty,
  back: nonEmpty
});

export const MatchingSpecSchema = z.object({
  game_type: z.literal("matching"),
  title: nonEmpty,
  theme_color: nonEmpty,
  pairs: z.array(MatchingPairSchema).min(MIN_ITEMS.matching)
});

export const QuizSpecSchema = z.object({
  game_type: z.literal("quiz"),
  title: nonEmpty,
  theme_color: nonEmpty,
  questions: z.array(QuizQuestionSchema).min(MIN_ITEMS.quiz)
});

export const FlashcardsSpecSchema = z.object({
  game_type: z.literal("flashcards"),
  title: nonEmpty,
  theme_color: nonEmpty,
  cards: z.array(FlashcardSchema).min(MIN_ITEMS.flashcards)
});

export const GameSpecSchema = z.discriminatedUnion("game_type", [MatchingSpecSchema, QuizSpecSchema, FlashcardsSpecSchema]);

export type MatchingSpec = z.infer<typeof MatchingSpecSchema>;
export type QuizSpec = z.infer<typeof QuizSpecSchema>;
export type FlashcardsSpec = z.infer<typeof FlashcardsSpecSchema>;
export type GameSpec = z.infer<typeof GameSpecSchema>;

export type ReviewVerdict = {
  approved: boolean;
  feedback: string;
};

export const NO_FEEDBACK = "No feedback provided";

const ReviewPayloadSchema = z.object({
  approved: z.unknown(),
  feedback: z.unknown()
});

export function itemCount(spec: GameSpec): number {
  if (spec.game_type === "matching") return spec.pairs.length;
  if (spec.game_type === "quiz") return spec.questions.length;
  return spec.cards.length;
}

export type GameSpecCheck = { ok: true; spec: GameSpec } | { ok: false; reason: string };

/** Validate an untrusted model payload as a spec of the expected game type. */
export function checkGameSpec(raw: unknown, expected: GameType): GameSpecCheck {
  const parsed = GameSpecSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    return { ok: false, reason: issues.slice(0, 5).join("; ") };
  }
  if (parsed.data.game_type !== expected) {
    return { ok: false, reason: `expected game_type "${expected}" but got "${parsed.data.game_type}"` };
  }
  return { ok: true, spec: parsed.data };
}

/**
 * Fail-closed review parsing: only a literal `true` approves, and a missing or
 * blank `feedback` becomes {@link NO_FEEDBACK}.
 */
export function toReviewVerdict(raw: unknown): ReviewVerdict {
  const parsed = ReviewPayloadSchema.safeParse(raw);
  const rec = parsed.success ? parsed.data : { approved: undefined, feedback: undefined };
  const feedback = typeof rec.feedback === "string" && rec.feedback.trim().length > 0 ? rec.feedback.trim() : NO_FEEDBACK;
  return { approved: rec.approved === true, feedback };
}
