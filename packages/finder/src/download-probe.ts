import { fetchWithRetry, discardBody } from "./http.js";
import { log } from "./logger.js";
import type { ProbeOptions } from "./types.js";

export type DownloadProbe = (url: string, options?: ProbeOptions) => Promise<boolean>;

/** Request a URL and throw the body away; true when the server answered 2xx. */
export async function probeDownload(url: string, options: ProbeOptions = {}): Promise<boolean> {
  const res = await fetchWithRetry(url, options);
  if (!res) {
    log.debug("Probe failed without a response", url);
    return false;
  }

  await discardBody(res);
  if (!res.ok) {
    log.debug(`Probe got HTTP ${res.status}`, url);
  }
  return res.ok;
}
