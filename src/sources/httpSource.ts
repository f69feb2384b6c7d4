import axios, { type AxiosInstance, isAxiosError } from "axios";
import { setTimeout as sleep } from "node:timers/promises";
import { z } from "zod";
import { TransportError, formatErrorMessage } from "../errors.js";
import { normalizeServerUrl } from "../identity.js";
import { createSubsystemLogger } from "../logging.js";
import { Snapshot } from "../snapshot.js";
import type { SnapshotSource } from "./types.js";

const log = createSubsystemLogger("http");

const jobListSchema = z.object({
  jobs: z.array(
    z
      .object({
        name: z.string().min(1),
        // Folders and views carry no color.
        color: z.string().min(1).optional()
      })
      .passthrough()
  )
});

export interface HttpSourceOptions {
  /** Courtesy pause before every request to the server. */
  requestDelayMs?: number;
  timeoutMs?: number;
  retries?: number;
  retryBaseDelayMs?: number;
  client?: AxiosInstance;
}

function isRetriable(error: unknown): boolean {
  if (!isAxiosError(error)) return false;
  const status = error.response?.status;
  if (status !== undefined) return status === 429 || (status >= 500 && status < 600);
  return error.code === "ECONNABORTED" || error.code === "ECONNRESET" || error.code === "ETIMEDOUT";
}

export class HttpSource implements SnapshotSource {
  readonly kind = "http";
  readonly identity: string;
  private readonly client: AxiosInstance;
  private readonly requestDelayMs: number;
  private readonly retries: number;
  private readonly retryBaseDelayMs: number;

  constructor(url: string, options: HttpSourceOptions = {}) {
    this.identity = normalizeServerUrl(url);
    this.client = options.client ?? axios.create({ timeout: options.timeoutMs ?? 30_000 });
    this.requestDelayMs = options.requestDelayMs ?? 1000;
    this.retries = options.retries ?? 3;
    this.retryBaseDelayMs = options.retryBaseDelayMs ?? 500;
  }

  get apiUrl(): string {
    return `${this.identity}/api/json/`;
  }

  async fetch(): Promise<Snapshot> {
    const data = await this.requestWithRetry();
    const parsed = jobListSchema.safeParse(data);
    if (!parsed.success) {
      throw new TransportError(`malformed job list from ${this.apiUrl}: ${parsed.error.message}`, this.identity);
    }

    const entries: Array<[string, string]> = [];
    for (const job of parsed.data.jobs) {
      if (job.color === undefined) {
        log.debug(`skipping ${job.name}: no status color`);
        continue;
      }
      entries.push([job.name, job.color]);
    }
    try {
      return Snapshot.fromEntries(entries);
    } catch (error) {
      throw new TransportError(`malformed job list from ${this.apiUrl}: ${formatErrorMessage(error)}`, this.identity, {
        cause: error
      });
    }
  }

  private async requestWithRetry(): Promise<unknown> {
    let attempt = 0;
    while (true) {
      await sleep(this.requestDelayMs);
      try {
        const response = await this.client.get<unknown>(this.apiUrl, { responseType: "json" });
        return response.data;
      } catch (error) {
        attempt += 1;
        if (!isRetriable(error) || attempt > this.retries) {
          throw new TransportError(`GET ${this.apiUrl} failed: ${formatErrorMessage(error)}`, this.identity, {
            cause: error
          });
        }
        const backoff = this.retryBaseDelayMs * 2 ** (attempt - 1);
        log.warn(`GET ${this.apiUrl} failed (attempt ${attempt}), retrying in ${backoff}ms`);
        await sleep(backoff);
      }
    }
  }
}
