import { promises as fs } from "node:fs";
import { join } from "node:path";
import { PersistenceError, formatErrorMessage } from "../errors.js";
import { Snapshot } from "../snapshot.js";
import type { PersistedState, SnapshotStore } from "./types.js";

export const DEFAULT_JOBS_FILE = "ci_jobs.json";
export const DEFAULT_SERVER_FILE = "ci_server.txt";

export interface FileStoreFiles {
  jobs?: string;
  server?: string;
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

async function atomicWrite(path: string, data: string): Promise<void> {
  // Atomic write: a crash mid-write leaves the previous file in place.
  const tmpPath = `${path}.${process.pid}.${Date.now()}.${Math.random().toString(16).slice(2)}.tmp`;
  await fs.writeFile(tmpPath, data, "utf8");
  await fs.rename(tmpPath, path);
}

/**
 * Keeps the last snapshot as a JSON file next to a one-line record of the
 * server it was taken from.
 */
export class FileStore implements SnapshotStore {
  readonly jobsPath: string;
  readonly serverPath: string;

  constructor(private readonly directory: string, files: FileStoreFiles = {}) {
    this.jobsPath = join(directory, files.jobs ?? DEFAULT_JOBS_FILE);
    this.serverPath = join(directory, files.server ?? DEFAULT_SERVER_FILE);
  }

  get location(): string {
    return this.directory;
  }

  async load(): Promise<PersistedState | null> {
    let serverText: string;
    let jobsText: string;
    try {
      serverText = await fs.readFile(this.serverPath, "utf8");
      jobsText = await fs.readFile(this.jobsPath, "utf8");
    } catch (error) {
      if (isNotFound(error)) return null;
      throw new PersistenceError(`could not read state: ${formatErrorMessage(error)}`, this.directory, {
        cause: error
      });
    }

    const serverIdentity = serverText.split(/\r?\n/, 1)[0].trim();
    try {
      return { serverIdentity, snapshot: Snapshot.parse(jobsText) };
    } catch (error) {
      throw new PersistenceError(`corrupt state in ${this.jobsPath}: ${formatErrorMessage(error)}`, this.directory, {
        cause: error
      });
    }
  }

  async save(state: PersistedState): Promise<void> {
    try {
      await fs.mkdir(this.directory, { recursive: true });
      // Server file goes first and comes back last: a write torn in between
      // loads as "no state" instead of jobs labelled with the wrong server.
      await fs.rm(this.serverPath, { force: true });
      await atomicWrite(this.jobsPath, `${state.snapshot.serialize()}\n`);
      await atomicWrite(this.serverPath, `${state.serverIdentity}\n`);
    } catch (error) {
      throw new PersistenceError(`could not write state: ${formatErrorMessage(error)}`, this.directory, {
        cause: error
      });
    }
  }
}
