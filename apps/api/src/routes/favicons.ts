import { Hono } from "hono";
import { z } from "zod";
import { zValidator } from "@hono/zod-validator";
import { resolveFavicons, type FallbackInput } from "@favicon-finder/core";
import { FALLBACK_SERVICES } from "../config/index.js";
import type { AppDeps, AppEnv, StrategyName } from "../env.js";

const app = new Hono<AppEnv>();

const MAX_LINKS = 50;

const strategyNameSchema = z.enum(["link", "ico"]);

const fallbackSchema = z.union([
  z.enum(["duckduckgo", "google"]),
  z.object({ constant: z.string().max(2000) }),
]);

// Validation schemas
const resolveQuerySchema = z.object({
  url: z.union([z.string().min(1), z.array(z.string().min(1)).min(1).max(MAX_LINKS)]),
});

const resolveBodySchema = z.object({
  links: z.array(z.string().max(2000)).max(MAX_LINKS),
  strategies: z.array(strategyNameSchema).optional(),
  fallback: fallbackSchema.optional(),
});

type FallbackSetting = z.infer<typeof fallbackSchema>;

function toFallbackInput(setting: FallbackSetting | undefined, deps: AppDeps): FallbackInput {
  if (setting === undefined) return deps.fallback;
  if (typeof setting === "string") return FALLBACK_SERVICES[setting];
  return setting.constant;
}

function pickStrategies(names: StrategyName[], deps: AppDeps) {
  return names.map((name) => deps.strategies[name]);
}

function toResponse(links: string[], favicons: string[]) {
  return {
    favicons: links.map((url, index) => ({ url, favicon: favicons[index] })),
  };
}

// Resolve with the configured strategies and fallback
app.get("/", zValidator("query", resolveQuerySchema), async (c) => {
  const { url } = c.req.valid("query");
  const links = Array.isArray(url) ? url : [url];
  const deps = c.get("deps");

  const favicons = await resolveFavicons(links, {
    strategies: pickStrategies(deps.defaultStrategies, deps),
    fallback: deps.fallback,
  });

  return c.json(toResponse(links, favicons));
});

// Resolve with per-request strategies and fallback
app.post("/", zValidator("json", resolveBodySchema), async (c) => {
  const body = c.req.valid("json");
  const deps = c.get("deps");

  const favicons = await resolveFavicons(body.links, {
    strategies: pickStrategies(body.strategies ?? deps.defaultStrategies, deps),
    fallback: toFallbackInput(body.fallback, deps),
  });

  return c.json(toResponse(body.links, favicons));
});

export { app as faviconsRoutes };
