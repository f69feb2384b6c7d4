import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pathToFileURL } from "node:url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { loadConfig } from "../../src/config.js";
import { TransportError } from "../../src/errors.js";
import { FileSource, HttpSource, createSource } from "../../src/sources/index.js";

let dir: string;

beforeEach(async () => {
  dir = await mkdtemp(join(tmpdir(), "ci-watch-source-"));
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
});

describe("FileSource", () => {
  it("reads a serialized snapshot", async () => {
    const path = join(dir, "jobs.json");
    await writeFile(path, JSON.stringify({ nightly: "aborted", build: "blue" }));
    const source = new FileSource(path);

    expect(source.identity).toBe(pathToFileURL(path).href);
    expect((await source.fetch()).entries()).toEqual([
      ["build", "blue"],
      ["nightly", "aborted"]
    ]);
  });

  it("reports a missing or malformed file as a transport error", async () => {
    await expect(new FileSource(join(dir, "missing.json")).fetch()).rejects.toBeInstanceOf(TransportError);

    const path = join(dir, "bad.json");
    await writeFile(path, '{"build": ""}');
    await expect(new FileSource(path).fetch()).rejects.toBeInstanceOf(TransportError);
  });
});

describe("createSource", () => {
  it("picks the source matching the configured target", () => {
    const http = createSource(loadConfig({ CI_WATCH_URL: "ci.example.test" }));
    expect(http).toBeInstanceOf(HttpSource);
    expect(http.identity).toBe("https://ci.example.test");

    const file = createSource(loadConfig({ CI_WATCH_INPUT: join(dir, "jobs.json") }));
    expect(file).toBeInstanceOf(FileSource);
    expect(file.kind).toBe("file");
  });
});
