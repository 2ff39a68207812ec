import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import request from "supertest";
import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { RunExecutor } from "../src/executor.js";
import { RunManager } from "../src/run_manager.js";
import { testConfig } from "./fixtures.js";

let tmpOut: string | null = null;

beforeEach(async () => {
  tmpOut = await fs.mkdtemp(path.join(os.tmpdir(), "gf-out-"));
  process.env.GF_OUTPUT_DIR = tmpOut;

  vi.resetModules();
  vi.doMock("archiver", () => {
    return {
      default: () => {
        const handlers: Record<string, ((err: Error) => void) | undefined> = {};
        const archive = {
          on: (evt: string, cb: (err: Error) => void) => {
            handlers[evt] = cb;
            return archive;
          },
          pipe: () => undefined,
          directory: () => undefined,
          finalize: async () => {
            handlers.warning?.(new Error("stat failed"));
            handlers.error?.(new Error("boom"));
          }
        };
        return archive;
      }
    };
  });
});

afterEach(async () => {
  delete process.env.GF_OUTPUT_DIR;
  vi.doUnmock("archiver");
  vi.resetModules();
  if (tmpOut) await fs.rm(tmpOut, { recursive: true, force: true }).catch(() => undefined);
  tmpOut = null;
});

describe("export zip error handling", () => {
  it("returns 500 and reports archiver warnings and errors on the run", async () => {
    const { createApp } = await import("../src/app.js");
    const runs = new RunManager();
    const run = await runs.createRun({
      gameType: "matching",
      source: { originalName: "a.md", tempPath: path.join(tmpOut ?? "", "a.md"), sizeBytes: 1 }
    });
    const logs: string[] = [];
    runs.subscribe(run.runId, (type, payload) => {
      if (typeof payload === "object" && payload !== null && "message" in payload) logs.push(`${type}: ${String(payload.message)}`);
    });

    const app = createApp(runs, new RunExecutor(runs, async () => undefined), { config: testConfig() });
    const res = await request(app).get(`/api/runs/${run.runId}/export`);

    expect(res.status).toBe(500);
    expect(logs).toEqual(["log: zip warning: stat failed", "error: zip error: boom"]);
  });
});
