import { serve } from "@hono/node-server";
import { createApp } from "./app.js";
import { loadConfig } from "./config/index.js";
import { createDeps } from "./middleware/context.js";
import { log } from "@favicon-finder/core";

const config = loadConfig();

const app = createApp({
  deps: createDeps(config),
  corsAllowedOrigins: config.corsAllowedOrigins,
});

log.info(`Starting favicon API on port ${config.port}...`);

serve({
  fetch: app.fetch,
  port: config.port,
});

log.info(`Favicon API running at http://localhost:${config.port}`);
