import { beforeEach, describe, expect, it } from "vitest";
import { ReconciliationEngine } from "../../src/engine/ReconciliationEngine.js";
import { Watcher } from "../../src/engine/Watcher.js";
import { setLogWriter } from "../../src/logging.js";
import { type ToolDefinition, buildTools } from "../../src/mcp/tools.js";
import { createConsoleSink } from "../../src/sink/consoleSink.js";
import { MemoryStore } from "../support/memoryStore.js";
import { QueueSource, transportFailure } from "../support/queueSource.js";

const SERVER = "https://ci.example.test";

function getTool(tools: ToolDefinition[], name: string) {
  const tool = tools.find((item) => item.name === name);
  if (!tool) throw new Error("tool not found");
  return tool;
}

async function setup(queue: Array<Record<string, string> | Error>) {
  const source = new QueueSource(SERVER, queue);
  const engine = new ReconciliationEngine(createConsoleSink({ write: () => undefined }));
  await engine.initialize(SERVER, new MemoryStore());
  const watcher = new Watcher(engine, source, 0);
  const tools = buildTools(engine, watcher, { version: "0.0.0", source: "http", startedAt: Date.now() });
  return { tools, engine };
}

beforeEach(() => {
  setLogWriter(() => undefined);
});

describe("MCP tools", () => {
  it("exposes jobs/running/snapshot/poll/info", async () => {
    const { tools } = await setup([]);
    expect(tools.map((tool) => tool.name)).toEqual(["ci:jobs", "ci:running", "ci:snapshot", "ci:poll", "ci:info"]);
  });

  it("polls and reports changes", async () => {
    const { tools } = await setup([{ a: "blue" }, transportFailure(SERVER), { a: "red", b: "blue" }]);
    const poll = getTool(tools, "ci:poll");

    expect((await poll.handler({})).structuredContent).toEqual({ skipped: false, firstObservation: true, changes: [] });
    expect((await poll.handler({})).structuredContent).toEqual({ skipped: true });
    expect((await poll.handler({})).structuredContent).toEqual({
      skipped: false,
      firstObservation: false,
      changes: [
        { job: "a", outcome: "failed" },
        { job: "b", outcome: "created" }
      ]
    });
  });

  it("lists jobs, optionally only running ones", async () => {
    const { tools } = await setup([{ web: "blue_anime", api: "red" }]);
    await getTool(tools, "ci:poll").handler({});

    const all = await getTool(tools, "ci:jobs").handler({});
    expect(all.structuredContent).toEqual({
      jobs: [
        { name: "api", indicator: "red" },
        { name: "web", indicator: "blue_anime" }
      ]
    });
    expect(all.content).toEqual([{ type: "text", text: JSON.stringify(all.structuredContent) }]);

    const running = await getTool(tools, "ci:jobs").handler({ running: true });
    expect(running.structuredContent).toEqual({ jobs: [{ name: "web", indicator: "blue_anime" }] });
    expect((await getTool(tools, "ci:running").handler({})).structuredContent).toEqual({ jobs: ["web"] });
  });

  it("validates tool arguments", async () => {
    const { tools } = await setup([]);
    await expect(getTool(tools, "ci:jobs").handler({ running: "yes" })).rejects.toThrow();
  });

  it("returns the serialized snapshot", async () => {
    const { tools } = await setup([{ b: "red", a: "blue" }]);
    expect((await getTool(tools, "ci:snapshot").handler({})).structuredContent).toEqual({ snapshot: "{}" });
    await getTool(tools, "ci:poll").handler({});
    expect((await getTool(tools, "ci:snapshot").handler({})).structuredContent).toEqual({
      snapshot: '{\n    "a": "blue",\n    "b": "red"\n}'
    });
  });

  it("reports version, server and uptime", async () => {
    const { tools } = await setup([]);
    const info = await getTool(tools, "ci:info").handler(undefined);
    expect(info.structuredContent).toMatchObject({ version: "0.0.0", server: SERVER, source: "http" });
    expect(typeof info.structuredContent.uptimeMs).toBe("number");
  });
});
