import { ErrorCode, LookupError, errorMessage } from "./errors.js";

const DEFAULT_TIMEOUT_MS = 10_000;

export type FetchJsonOptions = {
  timeoutMs?: number;
  headers?: Record<string, string>;
  fetch?: typeof fetch;
};

/** GET a JSON document, mapping transport failures onto LookupError codes. */
export async function fetchJson(url: string, opts: FetchJsonOptions = {}): Promise<unknown> {
  const doFetch = opts.fetch ?? fetch;
  const timeoutMs = opts.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  let response: Response;
  try {
    response = await doFetch(url, {
      headers: { accept: "application/json", ...opts.headers },
      signal: AbortSignal.timeout(timeoutMs),
    });
  } catch (err) {
    if (err instanceof Error && (err.name === "TimeoutError" || err.name === "AbortError")) {
      throw new LookupError(ErrorCode.TIMEOUT, `request timed out after ${timeoutMs}ms`, { url });
    }
    throw new LookupError(ErrorCode.LOOKUP_FAILED, errorMessage(err), { url });
  }

  if (!response.ok) {
    throw new LookupError(
      ErrorCode.LOOKUP_FAILED,
      `HTTP ${response.status} ${response.statusText}`.trim(),
      { url, status: response.status }
    );
  }

  try {
    return await response.json();
  } catch (err) {
    throw new LookupError(ErrorCode.LOOKUP_FAILED, `invalid JSON response: ${errorMessage(err)}`, {
      url,
    });
  }
}
