import { Agent } from "@openai/agents";

export const DEFAULT_MODEL = "gpt-4o";

export const LLM_STAGES = ["extract", "architect", "review", "refine"] as const;
export type LlmStage = (typeof LLM_STAGES)[number];

export type StageAgents = Record<LlmStage, Agent>;

export function makeStageAgents(model: string): StageAgents {
  return {
    extract: new Agent({
      name: "Extractor",
      handoffDescription: "Summarizes an uploaded document for game design.",
      model,
      modelSettings: { temperature: 0.3 },
      tools: [],
      instructions: `You are an expert content analyzer.

You will receive the text of a document.
Summarize it so an educational game can be built from it.

Rules:
- Return ONLY valid JSON, no markdown formatting.
- Use exactly the keys requested in the prompt.`
    }),

    architect: new Agent({
      name: "Architect",
      handoffDescription: "Designs the game content structure.",
      model,
      modelSettings: { temperature: 0.7 },
      tools: [],
      instructions: `You are a game design architect specializing in educational games.

You will receive a content summary and the game type to design.
Build the game only from facts present in the summary.

Rules:
- Follow the output schema in the prompt exactly.
- Meet the minimum item count.
- Return ONLY valid JSON.`
    }),

    review: new Agent({
      name: "Reviewer",
      handoffDescription: "Fact-checks game content against the source summary.",
      model,
      modelSettings: { temperature: 0.2 },
      tools: [],
      instructions: `You are a strict educational content reviewer.

Be strict but fair. Approve only if content is accurate and educational.

Rules:
- Return ONLY valid JSON with the keys "approved" (boolean) and "feedback" (string).`
    }),

    refine: new Agent({
      name: "Refiner",
      handoffDescription: "Fixes game content based on reviewer feedback.",
      model,
      modelSettings: { temperature: 0.5 },
      tools: [],
      instructions: `You are a game content refiner.

Fix the issues mentioned in the reviewer feedback while keeping the same JSON structure.

Rules:
- Do not change game_type.
- Ensure all content is factually accurate and educationally sound.
- Return ONLY the corrected JSON.`
    })
  };
}
