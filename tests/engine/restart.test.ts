import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { ReconciliationEngine } from "../../src/engine/ReconciliationEngine.js";
import { setLogWriter } from "../../src/logging.js";
import { FileStore } from "../../src/persistence/fileStore.js";
import { createConsoleSink } from "../../src/sink/consoleSink.js";
import { Snapshot } from "../../src/snapshot.js";

const SERVER = "https://ci.example.test";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "ci-watch-restart-"));
  setLogWriter(() => undefined);
});

afterEach(async () => {
  setLogWriter((line) => {
    process.stderr.write(`${line}\n`);
  });
  await rm(dir, { recursive: true, force: true });
});

/** A fresh engine on the state directory, as after a process restart. */
async function boot(serverIdentity: string) {
  const lines: string[] = [];
  const engine = new ReconciliationEngine(createConsoleSink({ verbose: true, write: (line) => lines.push(line) }));
  const init = await engine.initialize(serverIdentity, new FileStore(dir));
  return { engine, lines, init };
}

describe("ReconciliationEngine across restarts", () => {
  it("resumes from the persisted snapshot without re-announcing jobs", async () => {
    const seen: Array<[string, string]> = [
      ["__proto__", "blue"],
      ["10", "red"],
      ["deploy", "blue_anime"],
      ["lint", "red"]
    ];

    const first = await boot(SERVER);
    expect(first.init).toEqual({ restored: false });
    expect((await first.engine.reconcile(Snapshot.fromEntries(seen))).firstObservation).toBe(true);

    const second = await boot(SERVER);
    expect(second.init).toEqual({ restored: true });
    expect(second.engine.listRunningJobNames()).toEqual(["deploy"]);
    const unchanged = await second.engine.reconcile(Snapshot.fromEntries(seen));
    expect(unchanged).toEqual({ firstObservation: false, changes: [] });

    const changed = await second.engine.reconcile(
      Snapshot.fromRecord({ "10": "red_anime", deploy: "blue", lint: "red", docs: "notbuilt" })
    );
    expect(changed.changes).toEqual([
      { job: "__proto__", outcome: "deleted" },
      { job: "10", outcome: "started" },
      { job: "deploy", outcome: "passed" },
      { job: "docs", outcome: "created" }
    ]);
    expect(second.lines).toEqual(["Job deleted: __proto__", "Build started: 10", "Build passed: deploy", "Job created: docs"]);
  });

  it("behaves as a first run after switching servers", async () => {
    const first = await boot(SERVER);
    await first.engine.reconcile(Snapshot.fromRecord({ a: "blue" }));

    const other = await boot("https://other.example.test");
    expect(other.init.restored).toBe(false);
    expect(other.init.mismatch?.persisted).toBe(SERVER);
    const result = await other.engine.reconcile(Snapshot.fromRecord({ a: "red", b: "blue" }));
    expect(result).toEqual({ firstObservation: true, changes: [] });
    expect(other.lines).toEqual([]);

    const back = await boot(SERVER);
    expect(back.init.mismatch?.persisted).toBe("https://other.example.test");
  });
});
