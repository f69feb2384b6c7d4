import type { Snapshot } from "../snapshot.js";

export interface PersistedState {
  serverIdentity: string;
  snapshot: Snapshot;
}

export interface SnapshotStore {
  /** Where the state lives, for log messages. */
  readonly location: string;
  /** `null` when nothing was persisted yet. */
  load(): Promise<PersistedState | null>;
  save(state: PersistedState): Promise<void>;
}
