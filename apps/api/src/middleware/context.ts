import { createMiddleware } from "hono/factory";
import {
  createFaviconIcoStrategy,
  createLinkTagStrategy,
  type FetchOptions,
} from "@favicon-finder/core";
import type { AppDeps, AppEnv } from "../env.js";
import type { AppConfig } from "../config/index.js";

/**
 * Build the strategies and fallback the routes resolve with.
 * Tests pass their own deps to createApp instead.
 */
export function createDeps(config: AppConfig): AppDeps {
  const fetchOptions: FetchOptions = {
    timeoutMs: config.fetchTimeoutMs,
    retries: config.fetchRetries,
  };

  return {
    strategies: {
      link: createLinkTagStrategy({ fetchOptions }),
      ico: createFaviconIcoStrategy({ ...fetchOptions, method: config.probeMethod }),
    },
    defaultStrategies: ["link", "ico"],
    fallback: config.fallback,
  };
}

/**
 * Middleware that sets per-request dependencies on the Hono context.
 * Route handlers access them via c.get("deps").
 */
export function contextMiddleware(deps: AppDeps) {
  return createMiddleware<AppEnv>(async (c, next) => {
    c.set("deps", deps);
    await next();
  });
}
