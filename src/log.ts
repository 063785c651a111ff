type LogLevel = "debug" | "info" | "warn" | "error";

export interface Logger {
  debug(...args: unknown[]): void;
  info(...args: unknown[]): void;
  warn(...args: unknown[]): void;
  error(...args: unknown[]): void;
}

const DEBUG_STORAGE_KEY = "poster-debug";

let debugOverride: boolean | null = null;

const DEBUG_FROM_STORAGE = (() => {
  try {
    if (typeof window !== "undefined" && window.localStorage) {
      return window.localStorage.getItem(DEBUG_STORAGE_KEY) === "1";
    }
  } catch {
    return false;
  }
  return false;
})();

export function setDebugLogging(enabled: boolean): void {
  debugOverride = enabled;
}

export function isDebugLogging(): boolean {
  return debugOverride ?? DEBUG_FROM_STORAGE;
}

export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  const write = (level: LogLevel, args: unknown[]) => {
    if (level === "debug" && !isDebugLogging()) {
      return;
    }
    console[level](prefix, ...args);
  };
  return {
    debug: (...args) => write("debug", args),
    info: (...args) => write("info", args),
    warn: (...args) => write("warn", args),
    error: (...args) => write("error", args)
  };
}
