import { isRunning, outcomeClass } from "./indicator.js";
import type { JobEvent, StatusIndicator } from "./types.js";

/**
 * Turns the indicators a job had in two consecutive snapshots into an event.
 * `undefined` means the job was absent from that snapshot. Returns `null`
 * when nothing changed.
 */
export function classifyTransition(
  job: string,
  previous: StatusIndicator | undefined,
  next: StatusIndicator | undefined
): JobEvent | null {
  if (previous === undefined && next === undefined) return null;
  if (next === undefined) return { kind: "deleted", job };
  if (previous === undefined) return { kind: "created", job };
  if (previous === next) return null;

  // Checked before outcomes: a build started after a failure is not a failure.
  if (isRunning(next) && !isRunning(previous)) return { kind: "started", job };

  switch (outcomeClass(next)) {
    case "aborted":
      return { kind: "aborted", job };
    case "failure":
      return { kind: "failed", job };
    case "success":
      return { kind: "passed", job };
    default:
      return { kind: "unknown", job, previous, next };
  }
}
