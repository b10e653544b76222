// Main exports
export { resolveFavicons, resolveFavicon, defaultStrategies } from "./resolver.js";
export { createLinkTagStrategy, findIconHref, resolveIconHref } from "./link-tag-strategy.js";
export { createFaviconIcoStrategy } from "./favicon-ico-strategy.js";
export {
  duckDuckGoFallback,
  googleFallback,
  constantFallback,
  computedFallback,
  toFallback,
} from "./fallbacks.js";
export { InvalidArgumentError, isInvalidArgumentError } from "./errors.js";

// Types
export type {
  UrlParts,
  StrategyResult,
  FaviconStrategy,
  Fallback,
  FallbackFn,
  FallbackInput,
  ResolveOptions,
  StrategyErrorContext,
  FetchOptions,
  ProbeOptions,
  LogLevel,
} from "./types.js";
export type { LinkTagStrategyOptions } from "./link-tag-strategy.js";
export type { FaviconIcoStrategyOptions } from "./favicon-ico-strategy.js";
export type { DocumentFetcher, HtmlDocument } from "./html-document.js";
export type { DownloadProbe } from "./download-probe.js";

// Utilities (for custom strategies)
export { found, notFound } from "./strategy.js";
export { parseUrlParts, joinUrlParts } from "./url-parts.js";
export { fetchDocument, readDocumentFile, parseDocument, emptyDocument, isEmptyDocument } from "./html-document.js";
export { probeDownload } from "./download-probe.js";
export { log, setLogCallback, runWithLogCallback } from "./logger.js";
export type { LogCallback } from "./logger.js";
