export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const envRecord = import.meta.env;

function readString(value: string | undefined, fallback: string): string {
  if (typeof value === "string" && value.trim().length > 0) return value.trim();
  return fallback;
}

function readBoolean(value: string | undefined, fallback: boolean): boolean {
  if (typeof value === "string") {
    if (value === "1" || value.toLowerCase() === "true") return true;
    if (value === "0" || value.toLowerCase() === "false") return false;
  }
  return fallback;
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

function readLogLevel(value: string | undefined): LogLevel {
  const candidate = value?.trim().toLowerCase() ?? "";
  return isLogLevel(candidate) ? candidate : "info";
}

export interface AppConfig {
  mode: string;
  apiBaseUrl: string;
  httpAdapter: string | undefined;
  logLevel: LogLevel;
  keepFilterOnDelete: boolean;
}

export const config: AppConfig = {
  mode: readString(envRecord.MODE, "development"),
  apiBaseUrl: readString(envRecord.VITE_PETS_API_URL, "http://localhost:3000"),
  httpAdapter: envRecord.VITE_HTTP_ADAPTER?.trim() || undefined,
  logLevel: readLogLevel(envRecord.VITE_LOG_LEVEL),
  // Deleting a pet collapses the visible list onto the full list unless this is set.
  keepFilterOnDelete: readBoolean(envRecord.VITE_PETS_KEEP_FILTER_ON_DELETE, false),
};

export { LOG_LEVELS };
