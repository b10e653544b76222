import type { LogLevel } from "./types.js";
import { AsyncLocalStorage } from "node:async_hooks";
import { errorMessage } from "./errors.js";

export type LogCallback = (level: LogLevel, message: string, url?: string) => void | Promise<void>;

const logCallbackStorage = new AsyncLocalStorage<LogCallback | null>();
let fallbackLogCallback: LogCallback | null = null;

export function setLogCallback(callback: LogCallback | null): void {
  fallbackLogCallback = callback;
}

export function runWithLogCallback<T>(callback: LogCallback | null, fn: () => Promise<T>): Promise<T> {
  return logCallbackStorage.run(callback, fn);
}

function getLogCallback(): LogCallback | null {
  const scoped = logCallbackStorage.getStore();
  return scoped === undefined || scoped === null ? fallbackLogCallback : scoped;
}

function emit(level: LogLevel, message: string, url?: string): void {
  const callback = getLogCallback();
  if (!callback) {
    writeToConsole(level, message, url);
    return;
  }

  try {
    const pending = callback(level, message, url);
    if (pending instanceof Promise) {
      pending.catch((error: unknown) => {
        console.error("[error]", `Log callback failed: ${errorMessage(error)}`);
      });
    }
  } catch (error) {
    console.error("[error]", `Log callback failed: ${errorMessage(error)}`);
  }
}

function writeToConsole(level: LogLevel, message: string, url?: string): void {
  const line = url ? `${message} (${url})` : message;
  switch (level) {
    case "debug":
      if (process.env.DEBUG_FAVICON === "1") {
        console.log("[debug]", line);
      }
      break;
    case "info":
      console.log("[info]", line);
      break;
    case "warn":
      console.warn("[warn]", line);
      break;
    case "error":
      console.error("[error]", line);
      break;
  }
}

export const log = {
  debug: (message: string, url?: string) => emit("debug", message, url),
  info: (message: string, url?: string) => emit("info", message, url),
  warn: (message: string, url?: string) => emit("warn", message, url),
  error: (message: string, url?: string) => emit("error", message, url),
};
