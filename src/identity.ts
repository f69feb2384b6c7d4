import { resolve } from "node:path";
import { pathToFileURL } from "node:url";
import { ConfigError } from "./errors.js";

const SCHEME = /^[a-z][a-z0-9+.-]*:\/\//i;

/** Canonical form of a server URL: no trailing slashes, always a scheme (https by default). */
export function normalizeServerUrl(raw: string): string {
  const url = raw.trim().replace(/\/+$/, "");
  if (!url) throw new ConfigError(`invalid server url: "${raw}"`);
  return SCHEME.test(url) ? url : `https://${url}`;
}

export function offlineIdentity(path: string): string {
  return pathToFileURL(resolve(path)).href;
}
