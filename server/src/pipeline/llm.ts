import { OpenAIProvider, Runner } from "@openai/agents";
import { makeStageAgents, type LlmStage, type StageAgents } from "./agents.js";

export type TextRequest = {
  stage: LlmStage;
  prompt: string;
  signal?: AbortSignal;
};

/** The one capability every stage needs: send a prompt, get text back. */
export interface TextModel {
  complete(request: TextRequest): Promise<string>;
}

export type AgentsTextModelOptions = {
  apiKey: string;
  model: string;
  /** Injected in tests; defaults to a Runner bound to the given key. */
  runner?: Pick<Runner, "run">;
  agents?: StageAgents;
};

export function createAgentsTextModel(options: AgentsTextModelOptions): TextModel {
  const runner = options.runner ?? new Runner({ modelProvider: new OpenAIProvider({ apiKey: options.apiKey }) });
  const agents = options.agents ?? makeStageAgents(options.model);

  return {
    async complete({ stage, prompt, signal }: TextRequest): Promise<string> {
      try {
        const result = await runner.run(agents[stage], prompt, { maxTurns: 1, signal });
        const text = result.finalOutput;
        if (typeof text !== "string" || text.trim().length === 0) throw new Error(`${stage} produced no final output`);
        return text;
      } catch (err) {
        const msg = err instanceof Error ? err.message : String(err);
        // Common API error when the configured model isn't available for the API key.
        if (msg.includes("does not exist") && msg.includes("do not have access")) {
          throw new Error(`${msg}\nHint: set GF_MODEL in .env (currently "${options.model}") and restart the server.`, { cause: err });
        }
        throw err;
      }
    }
  };
}
