export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

type LogWriter = (line: string) => void;

let minLevel: LogLevel = "info";
// stdout belongs to the MCP transport.
let writer: LogWriter = (line) => {
  process.stderr.write(`${line}\n`);
};

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export function setLogWriter(next: LogWriter): void {
  writer = next;
}

export type SubsystemLogger = Record<LogLevel, (message: string) => void>;

export function createSubsystemLogger(subsystem: string): SubsystemLogger {
  const emit = (level: LogLevel) => (message: string) => {
    if (LEVEL_ORDER[level] < LEVEL_ORDER[minLevel]) return;
    writer(`[ci-watch/${subsystem}] ${level}: ${message}`);
  };
  return {
    debug: emit("debug"),
    info: emit("info"),
    warn: emit("warn"),
    error: emit("error")
  };
}
