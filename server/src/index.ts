import dotenv from "dotenv";
import path from "node:path";
import { fileURLToPath } from "node:url";

const __dirname = path.dirname(fileURLToPath(import.meta.url));
const repoRoot = path.resolve(__dirname, "../../");

dotenv.config({ path: path.resolve(repoRoot, ".env") });

// Dynamic imports so `.env` is loaded before any modules read process.env at import-time.
const { loadConfig } = await import("./config.js");
const { RunManager } = await import("./run_manager.js");
const { RunExecutor } = await import("./executor.js");
const { createApp } = await import("./app.js");
const { createGamePipeline } = await import("./pipeline/game_pipeline.js");
const { templateInventory } = await import("./pipeline/builder.js");
const { templatesRootAbs } = await import("./pipeline/utils.js");

const config = loadConfig();

if (config.pipelineMode === "fake") {
  console.log("server pipeline mode: fake (GF_PIPELINE_MODE=fake)");
} else if (!config.openaiApiKey) {
  console.log("OPENAI_API_KEY is not set; runs will be rejected until it is added to .env");
}

const templates = await templateInventory(templatesRootAbs());
if (templates.missing.length > 0) {
  console.log(`templates missing from ${templates.dir}: ${templates.missing.join(", ")}`);
}

const runs = new RunManager();
await runs.initFromDisk();

const executor = new RunExecutor(runs, createGamePipeline({ config }), { concurrency: config.maxConcurrentRuns });
const app = createApp(runs, executor, { config });

app.listen(config.port, () => {
  console.log(`server listening on http://localhost:${config.port}`);
});
