import type { StatusIndicator } from "../types.js";

type Handled = void | Promise<void>;

/** One handler per event kind. Handlers run in order, one at a time. */
export interface EventSink {
  jobCreated(job: string): Handled;
  jobDeleted(job: string): Handled;
  buildStarted(job: string): Handled;
  buildPassed(job: string): Handled;
  buildFailed(job: string): Handled;
  buildAborted(job: string): Handled;
  unknownTransition(job: string, previous: StatusIndicator, next: StatusIndicator): Handled;
}
