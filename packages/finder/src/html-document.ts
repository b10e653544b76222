import fs from "fs-extra";
import { load, type CheerioAPI } from "cheerio";
import { fetchWithRetry, discardBody } from "./http.js";
import { log } from "./logger.js";
import type { FetchOptions } from "./types.js";
import { errorMessage } from "./errors.js";

export type HtmlDocument = CheerioAPI;

export type DocumentFetcher = (url: string, options?: FetchOptions) => Promise<HtmlDocument>;

/** A document with no nodes at all, returned whenever a page cannot be read. */
export function emptyDocument(): HtmlDocument {
  return load("", null, false);
}

export function isEmptyDocument($: HtmlDocument): boolean {
  return $.root().children().length === 0;
}

export function parseDocument(html: string): HtmlDocument {
  if (!html.trim()) {
    return emptyDocument();
  }
  return load(html);
}

/**
 * Download and parse an HTML page. Any failure (network, timeout, non-2xx
 * status) produces an empty document instead of an error.
 */
export async function fetchDocument(url: string, options: FetchOptions = {}): Promise<HtmlDocument> {
  const res = await fetchWithRetry(url, {
    ...options,
    accept: "text/html,application/xhtml+xml;q=0.9,*/*;q=0.8",
  });
  if (!res) {
    log.debug("Could not fetch document", url);
    return emptyDocument();
  }

  if (!res.ok) {
    log.debug(`Document request failed (${res.status})`, url);
    await discardBody(res);
    return emptyDocument();
  }

  try {
    return parseDocument(await res.text());
  } catch (error) {
    log.debug(`Could not read document body: ${errorMessage(error)}`, url);
    return emptyDocument();
  }
}

/** Read a local HTML file; a missing or unreadable file yields an empty document. */
export async function readDocumentFile(filePath: string): Promise<HtmlDocument> {
  if (!filePath || !(await fs.pathExists(filePath))) {
    log.debug("Local document does not exist", filePath);
    return emptyDocument();
  }

  try {
    return parseDocument(await fs.readFile(filePath, "utf8"));
  } catch (error) {
    log.debug(`Could not read local document: ${errorMessage(error)}`, filePath);
    return emptyDocument();
  }
}
