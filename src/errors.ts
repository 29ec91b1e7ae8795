/** Error raised for any failed round-trip to the search API. */
export class TransportError extends Error {
  /** HTTP status, when the server answered with a non-2xx response. */
  readonly status?: number;
  /** URL of the request that failed. */
  readonly url?: string;

  constructor(message: string, opts: { status?: number; url?: string; cause?: unknown } = {}) {
    super(message, opts.cause === undefined ? undefined : { cause: opts.cause });
    this.name = "TransportError";
    this.status = opts.status;
    this.url = opts.url;
  }
}

/** Normalize an unknown error into a human-readable message. */
export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  try {
    return JSON.stringify(err);
  } catch {
    return String(err);
  }
}
