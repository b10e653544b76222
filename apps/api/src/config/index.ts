import { z } from "zod";
import { duckDuckGoFallback, googleFallback, type FallbackInput } from "@favicon-finder/core";

export const FALLBACK_SERVICES = {
  duckduckgo: duckDuckGoFallback,
  google: googleFallback,
} as const;

export type FallbackServiceName = keyof typeof FALLBACK_SERVICES;

function isFallbackServiceName(value: string): value is FallbackServiceName {
  return Object.hasOwn(FALLBACK_SERVICES, value);
}

function isAbsoluteUrl(value: string): boolean {
  try {
    // eslint-disable-next-line no-new
    new URL(value);
    return true;
  } catch {
    return false;
  }
}

const envSchema = z.object({
  PORT: z.coerce.number().int().min(1).max(65535).default(3001),
  FAVICON_FALLBACK: z
    .string()
    .trim()
    .default("duckduckgo")
    .refine(
      (value) => isFallbackServiceName(value) || isAbsoluteUrl(value),
      "Expected duckduckgo, google or an absolute URL"
    ),
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  FETCH_RETRIES: z.coerce.number().int().min(0).max(10).default(2),
  PROBE_METHOD: z.enum(["GET", "HEAD"]).default("GET"),
  CORS_ALLOWED_ORIGINS: z.string().default(""),
});

export interface AppConfig {
  port: number;
  fallback: FallbackInput;
  fetchTimeoutMs: number;
  fetchRetries: number;
  probeMethod: "GET" | "HEAD";
  corsAllowedOrigins: string[];
}

export function resolveFallbackSetting(value: string): FallbackInput {
  return isFallbackServiceName(value) ? FALLBACK_SERVICES[value] : value;
}

/**
 * Parse the API configuration from environment variables. Throws a ZodError
 * listing every invalid variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);
  return {
    port: parsed.PORT,
    fallback: resolveFallbackSetting(parsed.FAVICON_FALLBACK),
    fetchTimeoutMs: parsed.FETCH_TIMEOUT_MS,
    fetchRetries: parsed.FETCH_RETRIES,
    probeMethod: parsed.PROBE_METHOD,
    corsAllowedOrigins: parsed.CORS_ALLOWED_ORIGINS.split(",")
      .map((value) => value.trim())
      .filter(Boolean),
  };
}
