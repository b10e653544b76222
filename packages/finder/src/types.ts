export type LogLevel = "debug" | "info" | "warn" | "error";

/** A page URL split into the pieces every strategy receives. */
export interface UrlParts {
  scheme: string;
  /** Host name without user info or port, e.g. "www.example.com". */
  server: string;
  /** Starts with "/" or is empty. */
  path: string;
}

export type StrategyResult = { found: true; url: string } | { found: false };

/**
 * One technique for discovering a favicon from a page's URL components.
 * Implementations should return `notFound()` rather than throw; the resolver
 * still absorbs anything they throw.
 */
export interface FaviconStrategy {
  readonly name: string;
  find(scheme: string, server: string, path: string): Promise<StrategyResult>;
}

export type FallbackFn = (server: string) => string;

export type Fallback = { kind: "constant"; url: string } | { kind: "computed"; compute: FallbackFn };

/** What callers may pass as a fallback before it is normalized. */
export type FallbackInput = string | FallbackFn | Fallback;

export interface StrategyErrorContext {
  strategy: string;
  link: string;
  parts: UrlParts;
}

export interface ResolveOptions {
  /** Tried in order; `null` or an empty array means the fallback answers every link. */
  strategies?: readonly FaviconStrategy[] | null;
  fallback?: FallbackInput;
  onLog?: (level: LogLevel, message: string, url?: string) => void | Promise<void>;
  onStrategyError?: (error: unknown, context: StrategyErrorContext) => void;
}

export interface FetchOptions {
  /** Per-attempt timeout. Defaults to 10000. */
  timeoutMs?: number;
  /** Extra attempts after a network error or a 5xx/429 response. Defaults to 2. */
  retries?: number;
  /** Delay before retry n is `retryDelayMs * n`. Defaults to 500. */
  retryDelayMs?: number;
  userAgent?: string;
  headers?: Record<string, string>;
}

export interface ProbeOptions extends FetchOptions {
  method?: "GET" | "HEAD";
}
