import { z } from "zod";
import { InvalidSnapshotError } from "./errors.js";
import { classifyTransition } from "./events.js";
import { isRunning } from "./indicator.js";
import type { JobEvent, StatusIndicator } from "./types.js";

const indicatorSchema = z.string().min(1);

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Code point order; `<` on strings would compare UTF-16 code units. */
function compareNames(a: string, b: string): number {
  let i = 0;
  let j = 0;
  while (i < a.length && j < b.length) {
    const left = a.codePointAt(i) ?? 0;
    const right = b.codePointAt(j) ?? 0;
    if (left !== right) return left - right;
    i += left > 0xffff ? 2 : 1;
    j += right > 0xffff ? 2 : 1;
  }
  return a.length - i - (b.length - j);
}

/**
 * Job name → indicator at one poll, ordered by job name. Never mutated; a
 * new poll builds a new Snapshot.
 */
export class Snapshot {
  private readonly jobs: ReadonlyMap<string, StatusIndicator>;

  private constructor(sorted: Array<[string, StatusIndicator]>) {
    this.jobs = new Map(sorted);
  }

  static empty(): Snapshot {
    return new Snapshot([]);
  }

  static fromEntries(entries: Iterable<readonly [string, StatusIndicator]>): Snapshot {
    const seen = new Set<string>();
    const list: Array<[string, StatusIndicator]> = [];
    for (const [name, indicator] of entries) {
      if (!name) throw new InvalidSnapshotError("job name must not be empty");
      if (!indicator) throw new InvalidSnapshotError(`job "${name}" has an empty indicator`);
      if (seen.has(name)) throw new InvalidSnapshotError(`duplicate job name "${name}"`);
      seen.add(name);
      list.push([name, indicator]);
    }
    list.sort(([a], [b]) => compareNames(a, b));
    return new Snapshot(list);
  }

  static fromRecord(record: Record<string, StatusIndicator>): Snapshot {
    return Snapshot.fromEntries(Object.entries(record));
  }

  static parse(text: string): Snapshot {
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (error) {
      throw new InvalidSnapshotError("snapshot is not valid JSON", { cause: error });
    }
    if (!isPlainObject(raw)) {
      throw new InvalidSnapshotError("snapshot must map job names to indicators");
    }
    // Entries are read directly: object schemas would drop a job named "__proto__".
    const entries: Array<[string, StatusIndicator]> = [];
    for (const [name, value] of Object.entries(raw)) {
      const indicator = indicatorSchema.safeParse(value);
      if (!indicator.success) {
        throw new InvalidSnapshotError(`job "${name}" has an invalid indicator: ${indicator.error.message}`);
      }
      entries.push([name, indicator.data]);
    }
    return Snapshot.fromEntries(entries);
  }

  get size(): number {
    return this.jobs.size;
  }

  names(): string[] {
    return [...this.jobs.keys()];
  }

  get(name: string): StatusIndicator | undefined {
    return this.jobs.get(name);
  }

  has(name: string): boolean {
    return this.jobs.has(name);
  }

  entries(): Array<[string, StatusIndicator]> {
    return [...this.jobs.entries()];
  }

  runningNames(): string[] {
    return this.entries()
      .filter(([, indicator]) => isRunning(indicator))
      .map(([name]) => name);
  }

  equals(other: Snapshot): boolean {
    if (other.size !== this.size) return false;
    const theirs = other.entries();
    return this.entries().every(([name, indicator], i) => theirs[i][0] === name && theirs[i][1] === indicator);
  }

  toRecord(): Record<string, StatusIndicator> {
    return Object.fromEntries(this.jobs);
  }

  /**
   * JSON object in snapshot order. Written key by key: object property order
   * would move integer-like job names to the front.
   */
  serialize(): string {
    if (this.jobs.size === 0) return "{}";
    const lines = this.entries().map(
      ([name, indicator]) => `    ${JSON.stringify(name)}: ${JSON.stringify(indicator)}`
    );
    return `{\n${lines.join(",\n")}\n}`;
  }
}

/** Deletions first, then creations and changes in job name order. */
export function diffSnapshots(previous: Snapshot, next: Snapshot): JobEvent[] {
  const events: JobEvent[] = [];
  for (const name of previous.names()) {
    if (!next.has(name)) events.push({ kind: "deleted", job: name });
  }
  for (const [name, indicator] of next.entries()) {
    const event = classifyTransition(name, previous.get(name), indicator);
    if (event) events.push(event);
  }
  return events;
}
