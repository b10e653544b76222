import type { FaviconStrategy, StrategyResult } from "./types.js";

export function found(url: string): StrategyResult {
  return url ? { found: true, url } : { found: false };
}

export function notFound(): StrategyResult {
  return { found: false };
}

export function isFaviconStrategy(value: unknown): value is FaviconStrategy {
  return (
    typeof value === "object" &&
    value !== null &&
    "find" in value &&
    typeof value.find === "function"
  );
}
