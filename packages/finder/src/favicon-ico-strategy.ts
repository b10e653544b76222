import { probeDownload, type DownloadProbe } from "./download-probe.js";
import { joinUrlParts } from "./url-parts.js";
import { found, notFound } from "./strategy.js";
import { log } from "./logger.js";
import type { FaviconStrategy, ProbeOptions, StrategyResult } from "./types.js";
import { errorMessage } from "./errors.js";

export interface FaviconIcoStrategyOptions extends ProbeOptions {
  probe?: DownloadProbe;
}

/** Check whether the server publishes `/favicon.ico`. */
export function createFaviconIcoStrategy(options: FaviconIcoStrategyOptions = {}): FaviconStrategy {
  const { probe = probeDownload, ...probeOptions } = options;

  return {
    name: "favicon-ico",
    async find(scheme: string, server: string): Promise<StrategyResult> {
      const favicon = joinUrlParts(scheme, server, "/favicon.ico");
      try {
        return (await probe(favicon, probeOptions)) ? found(favicon) : notFound();
      } catch (error) {
        log.debug(`favicon.ico probe threw: ${errorMessage(error)}`, favicon);
        return notFound();
      }
    },
  };
}
