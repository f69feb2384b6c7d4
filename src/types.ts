/** Raw per-job status token reported by the CI server, e.g. `blue` or `red_anime`. */
export type StatusIndicator = string;

export type OutcomeClass =
  | "success"
  | "failure"
  | "aborted"
  | "not_built"
  | "disabled"
  | "running"
  | "unknown";

export type BuildEventKind = "created" | "deleted" | "started" | "passed" | "failed" | "aborted";

export type EventKind = BuildEventKind | "unknown";

export type JobEvent =
  | { kind: BuildEventKind; job: string }
  | { kind: "unknown"; job: string; previous: StatusIndicator; next: StatusIndicator };

export const DISPATCH_ERROR = "dispatch-error";

export type DispatchOutcome = EventKind | typeof DISPATCH_ERROR;

export interface JobChange {
  job: string;
  outcome: DispatchOutcome;
}
