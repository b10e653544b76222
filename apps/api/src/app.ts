import { Hono } from "hono";
import { cors } from "hono/cors";
import { logger } from "hono/logger";
import { isInvalidArgumentError, log } from "@favicon-finder/core";
import type { AppDeps, AppEnv } from "./env.js";
import { contextMiddleware } from "./middleware/context.js";
import { faviconsRoutes } from "./routes/favicons.js";

export interface CreateAppOptions {
  deps: AppDeps;
  corsAllowedOrigins: string[];
}

export function createApp(options: CreateAppOptions) {
  const { deps, corsAllowedOrigins } = options;
  const app = new Hono<AppEnv>();

  // Inject dependencies into context
  app.use("*", contextMiddleware(deps));

  // Logging
  app.use("*", logger((message) => log.info(message)));

  // CORS
  app.use(
    "*",
    cors({
      origin: corsAllowedOrigins.length > 0 ? corsAllowedOrigins : "*",
    })
  );

  // Health check
  app.get("/health", (c) => c.json({ status: "ok", timestamp: new Date().toISOString() }));

  app.route("/api/favicons", faviconsRoutes);

  app.onError((error, c) => {
    if (isInvalidArgumentError(error)) {
      return c.json({ error: "Invalid argument", argument: error.argument, message: error.message }, 400);
    }
    log.error(`Unhandled error: ${error.message}`, c.req.url);
    return c.json({ error: "Internal Server Error" }, 500);
  });

  return app;
}

export type AppType = ReturnType<typeof createApp>;
