import { DispatchError, formatErrorMessage } from "../errors.js";
import { createSubsystemLogger } from "../logging.js";
import type { EventSink } from "../sink/types.js";
import { DISPATCH_ERROR, type JobChange, type JobEvent } from "../types.js";

const log = createSubsystemLogger("dispatch");

export interface DispatchResult extends JobChange {
  error?: DispatchError;
}

type Call = { handler: keyof EventSink; args: string[]; invoke: () => void | Promise<void> };

function route(sink: EventSink, event: JobEvent): Call {
  const { job } = event;
  switch (event.kind) {
    case "created":
      return { handler: "jobCreated", args: [job], invoke: () => sink.jobCreated(job) };
    case "deleted":
      return { handler: "jobDeleted", args: [job], invoke: () => sink.jobDeleted(job) };
    case "started":
      return { handler: "buildStarted", args: [job], invoke: () => sink.buildStarted(job) };
    case "passed":
      return { handler: "buildPassed", args: [job], invoke: () => sink.buildPassed(job) };
    case "failed":
      return { handler: "buildFailed", args: [job], invoke: () => sink.buildFailed(job) };
    case "aborted":
      return { handler: "buildAborted", args: [job], invoke: () => sink.buildAborted(job) };
    case "unknown": {
      const { previous, next } = event;
      return {
        handler: "unknownTransition",
        args: [job, previous, next],
        invoke: () => sink.unknownTransition(job, previous, next)
      };
    }
  }
}

/** Runs the sink handler for one event. A failing handler only affects this job's outcome. */
export async function dispatchEvent(sink: EventSink, event: JobEvent): Promise<DispatchResult> {
  const call = route(sink, event);
  try {
    await call.invoke();
    return { job: event.job, outcome: event.kind };
  } catch (cause) {
    const error = new DispatchError(event.job, call.handler, call.args, { cause });
    log.error(`${error.message}: ${formatErrorMessage(cause)}`);
    return { job: event.job, outcome: DISPATCH_ERROR, error };
  }
}
