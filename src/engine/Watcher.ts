import { TransportError, formatErrorMessage } from "../errors.js";
import { createSubsystemLogger } from "../logging.js";
import type { Snapshot } from "../snapshot.js";
import type { SnapshotSource } from "../sources/types.js";
import type { ReconcileResult, ReconciliationEngine } from "./ReconciliationEngine.js";

const log = createSubsystemLogger("watcher");

/**
 * Drives reconciliation cycles: fetch, diff, dispatch, persist. Cycles are
 * chained, so a manual poll never overlaps the background loop.
 */
export class Watcher {
  private tail: Promise<unknown> = Promise.resolve();
  private timer: NodeJS.Timeout | null = null;
  private running = false;

  constructor(
    private readonly engine: ReconciliationEngine,
    private readonly source: SnapshotSource,
    private readonly intervalMs: number
  ) {}

  /** Resolves to `null` when the fetch failed and the cycle was skipped. */
  pollOnce(): Promise<ReconcileResult | null> {
    const next = this.tail.catch(() => undefined).then(() => this.cycle());
    this.tail = next;
    return next;
  }

  /** Polls every `intervalMs`; the first cycle runs one interval from now. */
  start(): void {
    if (this.running) return;
    this.running = true;
    this.schedule(this.intervalMs);
  }

  stop(): void {
    this.running = false;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }

  get isRunning(): boolean {
    return this.running;
  }

  private schedule(delayMs: number): void {
    this.timer = setTimeout(() => {
      this.timer = null;
      void this.pollOnce()
        .catch((error: unknown) => {
          log.error(`cycle failed: ${formatErrorMessage(error)}`);
        })
        .finally(() => {
          if (this.running) this.schedule(this.intervalMs);
        });
    }, delayMs);
  }

  private async cycle(): Promise<ReconcileResult | null> {
    let snapshot: Snapshot;
    try {
      snapshot = await this.source.fetch();
    } catch (error) {
      if (error instanceof TransportError) {
        log.warn(`skipping cycle: ${formatErrorMessage(error)}`);
        return null;
      }
      throw error;
    }
    const result = await this.engine.reconcile(snapshot);
    log.debug(`reconciled ${snapshot.size} jobs, ${result.changes.length} changes`);
    return result;
  }
}
