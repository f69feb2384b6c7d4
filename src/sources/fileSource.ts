import { promises as fs } from "node:fs";
import { TransportError, formatErrorMessage } from "../errors.js";
import { offlineIdentity } from "../identity.js";
import { Snapshot } from "../snapshot.js";
import type { SnapshotSource } from "./types.js";

/** Reads a previously serialized snapshot instead of asking a server. */
export class FileSource implements SnapshotSource {
  readonly kind = "file";
  readonly identity: string;

  constructor(private readonly path: string) {
    this.identity = offlineIdentity(path);
  }

  async fetch(): Promise<Snapshot> {
    try {
      const raw = await fs.readFile(this.path, "utf8");
      return Snapshot.parse(raw);
    } catch (error) {
      throw new TransportError(`could not read ${this.path}: ${formatErrorMessage(error)}`, this.identity, {
        cause: error
      });
    }
  }
}
