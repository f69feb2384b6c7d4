import type { Snapshot } from "../snapshot.js";

export type SourceKind = "http" | "file";

export interface SnapshotSource {
  readonly kind: SourceKind;
  /** Server identity the fetched snapshots belong to. */
  readonly identity: string;
  /** Rejects with a `TransportError` when no snapshot could be obtained. */
  fetch(): Promise<Snapshot>;
}
