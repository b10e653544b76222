import type { FetchOptions } from "./types.js";
import { log } from "./logger.js";
import { errorMessage } from "./errors.js";

export const DEFAULT_USER_AGENT =
  "Mozilla/5.0 (Macintosh; Intel Mac OS X 10_15_7) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/123.0.0.0 Safari/537.36";

const DEFAULT_TIMEOUT_MS = 10_000;
const DEFAULT_RETRIES = 2;
const DEFAULT_RETRY_DELAY_MS = 500;

interface RequestOptions extends FetchOptions {
  method?: "GET" | "HEAD";
  accept?: string;
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || status >= 500;
}

const TRANSIENT_ERROR_CODES = new Set([
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "ETIMEDOUT",
  "EPIPE",
  "EAI_AGAIN",
  "UND_ERR_SOCKET",
  "UND_ERR_CONNECT_TIMEOUT",
  "UND_ERR_HEADERS_TIMEOUT",
  "UND_ERR_BODY_TIMEOUT",
]);

function errorCode(value: unknown): string | undefined {
  if (typeof value === "object" && value !== null && "code" in value && typeof value.code === "string") {
    return value.code;
  }
  return undefined;
}

/**
 * Determine if a fetch error is transient and worth retrying: timeouts and
 * dropped or refused connections. Bad URLs and unsupported schemes fail the
 * same way every time.
 */
export function isTransientFetchError(error: unknown): boolean {
  if (!(error instanceof Error)) return false;
  if (error.name === "TimeoutError") return true;

  const code = errorCode(error) ?? errorCode(error.cause);
  if (code && TRANSIENT_ERROR_CODES.has(code)) return true;

  const msg = `${error.message} ${error.cause instanceof Error ? error.cause.message : ""}`.toLowerCase();
  return (
    msg.includes("timeout") ||
    msg.includes("econnreset") ||
    msg.includes("econnrefused") ||
    msg.includes("socket hang up")
  );
}

/** Only absolute URLs with a host are worth a request. */
export function isRequestableUrl(url: string): boolean {
  try {
    return new URL(url).hostname !== "";
  } catch {
    return false;
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Fetch a URL, retrying transient network errors and 5xx/429 responses.
 * Returns the last response received, or null when no request was possible
 * or every attempt failed without one.
 */
export async function fetchWithRetry(url: string, options: RequestOptions = {}): Promise<Response | null> {
  if (!isRequestableUrl(url)) {
    log.debug("Skipping request to a URL without a host", url);
    return null;
  }

  const retries = Math.max(0, options.retries ?? DEFAULT_RETRIES);
  const retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  const timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;

  let lastResponse: Response | null = null;
  for (let attempt = 0; attempt <= retries; attempt++) {
    if (attempt > 0 && retryDelayMs > 0) {
      await sleep(retryDelayMs * attempt);
    }

    try {
      const res = await fetch(url, {
        method: options.method ?? "GET",
        redirect: "follow",
        signal: AbortSignal.timeout(timeoutMs),
        headers: {
          "user-agent": options.userAgent ?? DEFAULT_USER_AGENT,
          accept: options.accept ?? "*/*",
          ...options.headers,
        },
      });
      if (!isRetryableStatus(res.status)) {
        if (lastResponse) await discardBody(lastResponse);
        return res;
      }
      if (lastResponse) await discardBody(lastResponse);
      lastResponse = res;
      log.debug(`Attempt ${attempt + 1} got HTTP ${res.status}`, url);
    } catch (error) {
      log.debug(`Attempt ${attempt + 1} failed: ${errorMessage(error)}`, url);
      if (!isTransientFetchError(error)) {
        break;
      }
    }
  }

  return lastResponse;
}

/** Drain a response so its connection can be released. */
export async function discardBody(res: Response): Promise<void> {
  if (!res.body) return;
  try {
    await res.body.cancel();
  } catch (error) {
    log.debug(`Could not discard response body: ${errorMessage(error)}`, res.url);
  }
}
