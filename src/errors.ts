export class ConfigError extends Error {
  override name = "ConfigError";
}

export class InvalidSnapshotError extends Error {
  override name = "InvalidSnapshotError";
}

/** Fetching a snapshot failed: network, HTTP status or malformed payload. */
export class TransportError extends Error {
  override name = "TransportError";

  constructor(
    message: string,
    readonly source: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

export class PersistenceError extends Error {
  override name = "PersistenceError";

  constructor(
    message: string,
    readonly location: string,
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/** An event sink handler threw for one job. Never aborts the cycle. */
export class DispatchError extends Error {
  override name = "DispatchError";

  constructor(
    readonly job: string,
    readonly handler: string,
    readonly args: readonly string[],
    options?: ErrorOptions
  ) {
    super(`Function call failed: ${handler}(${args.join(", ")})`, options);
  }
}

export class IdentityMismatchError extends Error {
  override name = "IdentityMismatchError";

  constructor(
    readonly persisted: string,
    readonly current: string
  ) {
    super(`server changed, history was discarded (${persisted} != ${current})`);
  }
}

export function formatErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const cause = error.cause;
    if (cause instanceof Error && cause.message !== error.message) {
      return `${error.message}: ${cause.message}`;
    }
    return error.message;
  }
  return String(error);
}
