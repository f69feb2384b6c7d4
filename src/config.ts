import { z } from "zod";
import { ConfigError } from "./errors.js";
import type { LogLevel } from "./logging.js";

export const VERSION = "0.1.0";
export const DEFAULT_STATE_DIR = ".ci-watch";
export const DEFAULT_POLL_INTERVAL_MS = 5_000;
export const DEFAULT_REQUEST_DELAY_MS = 1_000;
export const DEFAULT_TIMEOUT_MS = 30_000;

const flag = z
  .enum(["1", "0", "true", "false", "yes", "no", ""])
  .optional()
  .transform((value) => value === "1" || value === "true" || value === "yes");

const millis = (fallback: number) => z.coerce.number().int().nonnegative().default(fallback);

const envSchema = z
  .object({
    CI_WATCH_URL: z.string().trim().min(1).optional(),
    CI_WATCH_INPUT: z.string().trim().min(1).optional(),
    CI_WATCH_STATE_DIR: z.string().trim().min(1).default(DEFAULT_STATE_DIR),
    CI_WATCH_POLL_MS: millis(DEFAULT_POLL_INTERVAL_MS),
    CI_WATCH_REQUEST_DELAY_MS: millis(DEFAULT_REQUEST_DELAY_MS),
    CI_WATCH_TIMEOUT_MS: millis(DEFAULT_TIMEOUT_MS),
    CI_WATCH_VERBOSE: flag,
    CI_WATCH_PRINT_RUNNING: flag,
    CI_WATCH_LOG_LEVEL: z.enum(["debug", "info", "warn", "error"]).default("info")
  })
  .refine((env) => (env.CI_WATCH_URL === undefined) !== (env.CI_WATCH_INPUT === undefined), {
    message: "set exactly one of CI_WATCH_URL or CI_WATCH_INPUT"
  });

export type WatchTarget = { kind: "http"; url: string } | { kind: "file"; path: string };

export interface WatchConfig {
  target: WatchTarget;
  stateDir: string;
  /** 0 disables the background loop. */
  pollIntervalMs: number;
  requestDelayMs: number;
  timeoutMs: number;
  verbose: boolean;
  printRunning: boolean;
  logLevel: LogLevel;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): WatchConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => (issue.path.length > 0 ? `${issue.path.join(".")}: ${issue.message}` : issue.message))
      .join("; ");
    throw new ConfigError(`invalid configuration: ${details}`);
  }
  const values = parsed.data;
  let target: WatchTarget;
  if (values.CI_WATCH_URL !== undefined) {
    target = { kind: "http", url: values.CI_WATCH_URL };
  } else if (values.CI_WATCH_INPUT !== undefined) {
    target = { kind: "file", path: values.CI_WATCH_INPUT };
  } else {
    throw new ConfigError("invalid configuration: set exactly one of CI_WATCH_URL or CI_WATCH_INPUT");
  }

  return {
    target,
    stateDir: values.CI_WATCH_STATE_DIR,
    pollIntervalMs: values.CI_WATCH_POLL_MS,
    requestDelayMs: values.CI_WATCH_REQUEST_DELAY_MS,
    timeoutMs: values.CI_WATCH_TIMEOUT_MS,
    verbose: values.CI_WATCH_VERBOSE,
    printRunning: values.CI_WATCH_PRINT_RUNNING,
    logLevel: values.CI_WATCH_LOG_LEVEL
  };
}
