import type { WatchConfig } from "../config.js";
import { FileSource } from "./fileSource.js";
import { HttpSource } from "./httpSource.js";
import type { SnapshotSource } from "./types.js";

export function createSource(config: WatchConfig): SnapshotSource {
  const { target } = config;
  switch (target.kind) {
    case "http":
      return new HttpSource(target.url, {
        requestDelayMs: config.requestDelayMs,
        timeoutMs: config.timeoutMs
      });
    case "file":
      return new FileSource(target.path);
  }
}

export { FileSource } from "./fileSource.js";
export { HttpSource, type HttpSourceOptions } from "./httpSource.js";
export type { SnapshotSource, SourceKind } from "./types.js";
