import type { OutcomeClass, StatusIndicator } from "./types.js";

export const RUNNING_MARKER = "anime";

const OUTCOMES: Record<string, OutcomeClass> = {
  blue: "success",
  red: "failure",
  aborted: "aborted",
  notbuilt: "not_built",
  disabled: "disabled"
};

export function isRunning(indicator: StatusIndicator): boolean {
  return indicator.includes(RUNNING_MARKER);
}

/**
 * Outcome of the last finished build. Running indicators keep stale outcome
 * bits (`red_anime`), so they report `running` instead.
 */
export function outcomeClass(indicator: StatusIndicator): OutcomeClass {
  if (isRunning(indicator)) return "running";
  return Object.hasOwn(OUTCOMES, indicator) ? OUTCOMES[indicator] : "unknown";
}
