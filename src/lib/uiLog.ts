import { shouldLog } from "@utils/logger";
import type { LogLevel } from "@config/env";

export type UiLogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

export type UiLogDetails = Record<string, unknown>;

type UiLogPayload = {
  level: UiLogLevel;
  cmd: string;
  details: UiLogDetails;
  pet_id?: string;
  duration_ms?: number;
};

export type UiLogSink = (line: string, level: UiLogLevel) => void;

const PET_KEYS = ["pet_id", "petId"] as const;
const DURATION_KEYS = ["duration_ms", "durationMs"] as const;

const LEVEL_MAP: Record<UiLogLevel, LogLevel> = {
  DEBUG: "debug",
  INFO: "info",
  WARN: "warn",
  ERROR: "error",
};

function coerceId(value: unknown): string | undefined {
  if (typeof value === "string" && value.length > 0) return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return undefined;
}

function coerceDuration(value: unknown): number | undefined {
  if (typeof value === "number" && Number.isFinite(value)) {
    return Math.round(value);
  }
  if (typeof value === "string" && value.trim().length > 0) {
    const parsed = Number(value);
    if (Number.isFinite(parsed)) {
      return Math.round(parsed);
    }
  }
  return undefined;
}

function extractFirst<T extends readonly string[], V>(
  details: UiLogDetails,
  keys: T,
  extractor: (value: unknown) => V | undefined,
): V | undefined {
  for (const key of keys) {
    if (Object.prototype.hasOwnProperty.call(details, key)) {
      const next = extractor(details[key]);
      if (next !== undefined) {
        return next;
      }
    }
  }
  return undefined;
}

function buildPayload(level: UiLogLevel, cmd: string, details: UiLogDetails): UiLogPayload {
  const normalized: UiLogDetails = { ...details };
  const payload: UiLogPayload = { level, cmd, details: normalized };

  const petId = extractFirst(normalized, PET_KEYS, coerceId);
  if (petId !== undefined) {
    payload.pet_id = petId;
  }

  const duration = extractFirst(normalized, DURATION_KEYS, coerceDuration);
  if (duration !== undefined) {
    payload.duration_ms = duration;
  }

  return payload;
}

function toJsonLine(payload: UiLogPayload): string {
  const envelope: Record<string, unknown> = {
    ts: new Date().toISOString(),
    level: payload.level,
    area: "pets",
    cmd: payload.cmd,
    details: payload.details,
  };

  if (payload.pet_id) envelope.pet_id = payload.pet_id;
  if (typeof payload.duration_ms === "number") envelope.duration_ms = payload.duration_ms;

  return JSON.stringify(envelope);
}

const consoleSink: UiLogSink = (line, level) => {
  if (level === "ERROR") console.error(line);
  else if (level === "WARN") console.warn(line);
  else console.log(line);
};

let activeSink: UiLogSink = consoleSink;

export function setUiLogSink(sink: UiLogSink | null): void {
  activeSink = sink ?? consoleSink;
}

export function logUI(level: UiLogLevel, cmd: string, details: UiLogDetails = {}): void {
  if (!shouldLog(LEVEL_MAP[level])) return;
  const payload = buildPayload(level, cmd, details);
  activeSink(toJsonLine(payload), level);
}
