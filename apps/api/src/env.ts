import type { FaviconStrategy, FallbackInput } from "@favicon-finder/core";

export type StrategyName = "link" | "ico";

/**
 * Variables set per-request via context middleware.
 * Accessed in route handlers via c.get("deps").
 */
export type AppVariables = {
  deps: AppDeps;
};

/**
 * Hono environment type for every route in the API.
 */
export type AppEnv = {
  Variables: AppVariables;
};

export interface AppDeps {
  strategies: Record<StrategyName, FaviconStrategy>;
  /** Strategies used when a request does not name its own, in order. */
  defaultStrategies: StrategyName[];
  fallback: FallbackInput;
}
