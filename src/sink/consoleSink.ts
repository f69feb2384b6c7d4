import type { EventSink } from "./types.js";

export interface ConsoleSinkOptions {
  /** Print unrecognized indicator changes, mostly useful for debugging. */
  verbose?: boolean;
  write?: (line: string) => void;
  overrides?: Partial<EventSink>;
}

export function createConsoleSink(options: ConsoleSinkOptions = {}): EventSink {
  const write =
    options.write ??
    ((line: string) => {
      process.stdout.write(`${line}\n`);
    });
  const verbose = options.verbose ?? false;

  const defaults: EventSink = {
    jobCreated: (job) => write(`Job created: ${job}`),
    jobDeleted: (job) => write(`Job deleted: ${job}`),
    buildStarted: (job) => write(`Build started: ${job}`),
    buildPassed: (job) => write(`Build passed: ${job}`),
    buildFailed: (job) => write(`Build failed: ${job}`),
    buildAborted: (job) => write(`Build aborted: ${job}`),
    unknownTransition: (job, previous, next) => {
      if (verbose) write(`Unrecognized color change: ${job} ${previous}->${next}`);
    }
  };
  return { ...defaults, ...options.overrides };
}
