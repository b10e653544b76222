import path from "node:path";
import { fileURLToPath } from "node:url";
import {
  fetchDocument,
  isEmptyDocument,
  readDocumentFile,
  type DocumentFetcher,
  type HtmlDocument,
} from "./html-document.js";
import { joinUrlParts } from "./url-parts.js";
import { found, notFound } from "./strategy.js";
import { log } from "./logger.js";
import type { FaviconStrategy, FetchOptions, StrategyResult } from "./types.js";

const ICON_RELS = new Set(["icon", "shortcut icon"]);

export interface LinkTagStrategyOptions {
  fetchDocument?: DocumentFetcher;
  fetchOptions?: FetchOptions;
}

/**
 * Look for `<link rel="icon">` or `<link rel="shortcut icon">` in the page's
 * head. When the page itself cannot be read, the server root is tried once.
 */
export function createLinkTagStrategy(options: LinkTagStrategyOptions = {}): FaviconStrategy {
  const fetcher = options.fetchDocument ?? fetchDocument;

  async function loadDocument(scheme: string, server: string, pagePath: string): Promise<HtmlDocument> {
    // Local files make it possible to check a page without a server.
    if (scheme === "file") {
      return readDocumentFile(fileURLToPath(joinUrlParts(scheme, server, pagePath)));
    }

    const doc = await fetcher(joinUrlParts(scheme, server, pagePath), options.fetchOptions);
    if (!isEmptyDocument(doc)) {
      return doc;
    }

    const rootUrl = joinUrlParts(scheme, server);
    log.debug("Page had no usable document, trying the server root", rootUrl);
    return fetcher(rootUrl, options.fetchOptions);
  }

  return {
    name: "link-tag",
    async find(scheme: string, server: string, pagePath: string): Promise<StrategyResult> {
      const $ = await loadDocument(scheme, server, pagePath);
      const href = findIconHref($);
      if (href === undefined) {
        return notFound();
      }
      return found(resolveIconHref(href, scheme, server, pagePath));
    },
  };
}

/** First icon link href in the head, prefixed with the `<base>` href if the page declares one. */
export function findIconHref($: HtmlDocument): string | undefined {
  const iconLink = $("html > head > link")
    .filter((_, el) => ICON_RELS.has($(el).attr("rel") ?? ""))
    .first();
  const href = iconLink.attr("href");
  if (href === undefined) {
    return undefined;
  }

  const baseHref = $("html > head > base").first().attr("href");
  return baseHref === undefined ? href : `${baseHref}${href}`;
}

/**
 * Turn an icon href into an absolute URL. Relative hrefs are joined onto the
 * directory of the page path without normalizing `..` segments.
 */
export function resolveIconHref(href: string, scheme: string, server: string, pagePath: string): string {
  if (href.startsWith("http")) {
    return href;
  }
  if (href.startsWith("//")) {
    return `${scheme}:${href}`;
  }
  if (href.startsWith("/")) {
    return joinUrlParts(scheme, server, href);
  }

  const origin = joinUrlParts(scheme, server);
  log.warn(`Resolving relative icon href "${href}" against the page directory; this may be wrong`, origin + pagePath);
  const relativePath = `${path.posix.dirname(pagePath)}/${href}`;
  return joinUrlParts(scheme, server, relativePath);
}
