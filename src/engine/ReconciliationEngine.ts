import { IdentityMismatchError, PersistenceError, formatErrorMessage } from "../errors.js";
import { createSubsystemLogger } from "../logging.js";
import type { PersistedState, SnapshotStore } from "../persistence/types.js";
import type { EventSink } from "../sink/types.js";
import { Snapshot, diffSnapshots } from "../snapshot.js";
import { type DispatchResult, dispatchEvent } from "./dispatch.js";

const log = createSubsystemLogger("engine");

export interface InitializeResult {
  /** A prior snapshot for this server was loaded. */
  restored: boolean;
  mismatch?: IdentityMismatchError;
}

export interface ReconcileResult {
  /** No prior snapshot existed; `next` was adopted without events. */
  firstObservation: boolean;
  changes: DispatchResult[];
  /** The new state is current in memory but not on disk. */
  persistError?: PersistenceError;
}

/**
 * Owns the current snapshot of one server. `initialize` and `reconcile` are
 * the only mutators, and `reconcile` calls must not overlap.
 */
export class ReconciliationEngine {
  private current: Snapshot | null = null;
  private identity: string | null = null;
  private store: SnapshotStore | null = null;
  private reconciling = false;

  constructor(private readonly sink: EventSink) {}

  get serverIdentity(): string | null {
    return this.identity;
  }

  get hasSnapshot(): boolean {
    return this.current !== null;
  }

  async initialize(serverIdentity: string, store: SnapshotStore): Promise<InitializeResult> {
    this.identity = serverIdentity;
    this.store = store;
    this.current = null;

    let persisted: PersistedState | null;
    try {
      persisted = await store.load();
    } catch (error) {
      log.warn(`ignoring previous state in ${store.location}: ${formatErrorMessage(error)}`);
      return { restored: false };
    }
    if (!persisted) {
      log.debug(`no previous state for ${serverIdentity} in ${store.location}`);
      return { restored: false };
    }
    if (persisted.serverIdentity !== serverIdentity) {
      const mismatch = new IdentityMismatchError(persisted.serverIdentity, serverIdentity);
      log.info(mismatch.message);
      return { restored: false, mismatch };
    }

    this.current = persisted.snapshot;
    log.debug(`restored ${persisted.snapshot.size} jobs for ${serverIdentity}`);
    return { restored: true };
  }

  async reconcile(next: Snapshot): Promise<ReconcileResult> {
    const { identity, store } = this;
    if (identity === null || store === null) {
      throw new Error("reconcile called before initialize");
    }
    if (this.reconciling) {
      throw new Error("reconcile is already running for this server");
    }

    this.reconciling = true;
    try {
      const previous = this.current;
      const changes: DispatchResult[] = [];
      if (previous) {
        for (const event of diffSnapshots(previous, next)) {
          changes.push(await dispatchEvent(this.sink, event));
        }
      }
      this.current = next;

      const result: ReconcileResult = { firstObservation: previous === null, changes };
      try {
        await store.save({ serverIdentity: identity, snapshot: next });
      } catch (error) {
        const persistError =
          error instanceof PersistenceError
            ? error
            : new PersistenceError(formatErrorMessage(error), store.location, { cause: error });
        log.error(`state diverged from disk: ${persistError.message}`);
        result.persistError = persistError;
      }
      return result;
    } finally {
      this.reconciling = false;
    }
  }

  listJobNames(): string[] {
    return this.current?.names() ?? [];
  }

  listRunningJobNames(): string[] {
    return this.current?.runningNames() ?? [];
  }

  serializedSnapshot(): string {
    return (this.current ?? Snapshot.empty()).serialize();
  }

  /** Current snapshot, or `null` before the first observation. */
  snapshot(): Snapshot | null {
    return this.current;
  }
}
