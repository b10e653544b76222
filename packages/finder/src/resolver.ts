import { InvalidArgumentError, errorMessage } from "./errors.js";
import { applyFallback, duckDuckGoFallback, toFallback } from "./fallbacks.js";
import { createFaviconIcoStrategy } from "./favicon-ico-strategy.js";
import { createLinkTagStrategy } from "./link-tag-strategy.js";
import { log, runWithLogCallback } from "./logger.js";
import { isFaviconStrategy } from "./strategy.js";
import { parseUrlParts } from "./url-parts.js";
import type { Fallback, FaviconStrategy, ResolveOptions, StrategyErrorContext, UrlParts } from "./types.js";

export function defaultStrategies(): FaviconStrategy[] {
  return [createLinkTagStrategy(), createFaviconIcoStrategy()];
}

export function validateLinks(links: unknown): string[] {
  if (!Array.isArray(links) || !links.every((link): link is string => typeof link === "string")) {
    throw new InvalidArgumentError("links", "The argument `links` must be an array of URL strings");
  }
  return links;
}

export function validateStrategies(strategies: unknown): readonly FaviconStrategy[] {
  if (strategies === null || strategies === undefined) {
    return [];
  }
  if (!Array.isArray(strategies) || !strategies.every(isFaviconStrategy)) {
    throw new InvalidArgumentError(
      "strategies",
      "The argument `strategies` must be an array of favicon strategies or null"
    );
  }
  return strategies;
}

/**
 * Find a favicon URL for every link. Strategies are tried in order until one
 * finds a URL; otherwise the fallback provides it. The result has one entry
 * per link, in the same order.
 *
 * Only InvalidArgumentError escapes, and only before any request is made.
 */
export async function resolveFavicons(links: readonly string[], options: ResolveOptions = {}): Promise<string[]> {
  const validLinks = validateLinks(links);
  const strategies =
    options.strategies === undefined ? defaultStrategies() : validateStrategies(options.strategies);
  const fallback = toFallback(options.fallback ?? duckDuckGoFallback);

  const run = async () => {
    const favicons: string[] = [];
    for (const link of validLinks) {
      favicons.push(await resolveOne(link, strategies, fallback, options));
    }
    return favicons;
  };

  // Without onLog, keep whatever callback the caller already scoped.
  return options.onLog ? runWithLogCallback(options.onLog, run) : run();
}

export async function resolveFavicon(link: string, options: ResolveOptions = {}): Promise<string> {
  const [favicon] = await resolveFavicons([link], options);
  return favicon;
}

async function resolveOne(
  link: string,
  strategies: readonly FaviconStrategy[],
  fallback: Fallback,
  options: ResolveOptions
): Promise<string> {
  const parts = parseUrlParts(link);

  for (const strategy of strategies) {
    const url = await runStrategy(strategy, link, parts, options);
    if (url) {
      log.debug(`Favicon found by ${strategy.name}: ${url}`, link);
      return url;
    }
  }

  const favicon = applyFallback(fallback, parts.server);
  log.debug(`No strategy found a favicon, using fallback ${favicon}`, link);
  return favicon;
}

async function runStrategy(
  strategy: FaviconStrategy,
  link: string,
  parts: UrlParts,
  options: ResolveOptions
): Promise<string> {
  try {
    const result = await strategy.find(parts.scheme, parts.server, parts.path);
    return result.found ? result.url : "";
  } catch (error) {
    log.warn(`Strategy ${strategy.name} failed: ${errorMessage(error)}`, link);
    notifyStrategyError(error, { strategy: strategy.name, link, parts }, options);
    return "";
  }
}

function notifyStrategyError(error: unknown, context: StrategyErrorContext, options: ResolveOptions): void {
  if (!options.onStrategyError) return;
  try {
    options.onStrategyError(error, context);
  } catch (hookError) {
    log.error(`onStrategyError callback failed: ${errorMessage(hookError)}`, context.link);
  }
}
