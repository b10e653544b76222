import type { UrlParts } from "./types.js";

const EMPTY_PARTS: UrlParts = { scheme: "", server: "", path: "" };

/**
 * Split a link into scheme, server and path. Query strings and fragments are
 * dropped, as is any port. Unparseable input yields empty fields.
 */
export function parseUrlParts(link: string): UrlParts {
  let parsed: URL;
  try {
    parsed = new URL(link.trim());
  } catch {
    return { ...EMPTY_PARTS };
  }

  const scheme = parsed.protocol.replace(/:$/, "");
  let path = parsed.pathname;
  if (path && !path.startsWith("/")) {
    path = `/${path}`;
  }

  return { scheme, server: parsed.hostname, path };
}

export function joinUrlParts(scheme: string, server: string, path = ""): string {
  return `${scheme}://${server}${path}`;
}
