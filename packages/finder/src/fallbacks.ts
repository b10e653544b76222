import { InvalidArgumentError } from "./errors.js";
import type { Fallback, FallbackFn } from "./types.js";

/**
 * DuckDuckGo's public favicon service. It answers every host, serving a
 * generic icon when it knows none.
 */
export function duckDuckGoFallback(server: string): string {
  return `https://icons.duckduckgo.com/ip3/${server}.ico`;
}

export function googleFallback(server: string): string {
  return `https://www.google.com/s2/favicons?domain_url=${server}`;
}

export function constantFallback(url: string): Fallback {
  return { kind: "constant", url };
}

export function computedFallback(compute: FallbackFn): Fallback {
  return { kind: "computed", compute };
}

function isOneArgFunction(value: unknown): value is FallbackFn {
  return typeof value === "function" && value.length === 1;
}

/**
 * Normalize a fallback given as a string, a one-argument function or a tagged
 * value. Anything else throws InvalidArgumentError.
 */
export function toFallback(input: unknown): Fallback {
  if (typeof input === "string") {
    return constantFallback(input);
  }
  if (isOneArgFunction(input)) {
    return computedFallback(input);
  }
  if (typeof input === "object" && input !== null && "kind" in input) {
    if (input.kind === "constant" && "url" in input && typeof input.url === "string") {
      return constantFallback(input.url);
    }
    if (input.kind === "computed" && "compute" in input && isOneArgFunction(input.compute)) {
      return computedFallback(input.compute);
    }
  }

  throw new InvalidArgumentError(
    "fallback",
    "The argument `fallback` must be a function with one argument or a single string"
  );
}

export function applyFallback(fallback: Fallback, server: string): string {
  return fallback.kind === "computed" ? fallback.compute(server) : fallback.url;
}
