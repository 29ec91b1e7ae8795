/** HTTP helper with a per-request timeout. */
import { TransportError, errorMessage } from "./errors.js";

const DEFAULT_TIMEOUT_MS = 30_000;

/** Options for {@link httpGet}. */
export type FetchOptions = {
  /** Request timeout in milliseconds (default: 30s). */
  timeoutMs?: number;
};

/**
 * Perform a single GET request with a timeout. There is no retry: the first
 * network failure or timeout is reported to the caller.
 *
 * @param url - Absolute URL to fetch.
 * @param opts - Optional {@link FetchOptions} configuration.
 * @returns The fetch {@link Response} object, whatever its status.
 * @throws {@link TransportError} if the request fails or times out.
 */
export async function httpGet(url: string, opts: FetchOptions = {}): Promise<Response> {
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;
  const headers: Record<string, string> = {
    accept: "application/json",
    "user-agent": "sdk-downloads-report/0.1.0",
  };
  const controller = new AbortController();
  const t = setTimeout(() => controller.abort(), timeoutMs);
  try {
    return await fetch(url, { headers, signal: controller.signal });
  } catch (err) {
    if (controller.signal.aborted) {
      throw new TransportError(`request timed out after ${timeoutMs}ms: ${url}`, { url, cause: err });
    }
    throw new TransportError(`request failed: ${errorMessage(err)}`, { url, cause: err });
  } finally {
    clearTimeout(t);
  }
}
