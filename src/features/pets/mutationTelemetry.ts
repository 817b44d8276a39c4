import { normalizeError } from "@lib/http/call";
import type { AppError } from "@lib/http/errors";
import { logUI } from "@lib/uiLog";

const FAILURE_WINDOW_MS = 24 * 60 * 60 * 1000;
const MAX_FAILURE_EVENTS = 200;

export interface PetsMutationFailureStats {
  failure_events: string[];
  last_24h_failures: number;
}

let failureEvents: number[] = [];
let now: () => number = () => Date.now();

function pruneFailures(existing: number[]): number[] {
  const cutoff = now() - FAILURE_WINDOW_MS;
  return existing.filter((ts) => Number.isFinite(ts) && ts >= cutoff);
}

export function recordPetsMutationFailure(
  op: string,
  error: unknown,
  context: Record<string, unknown> = {},
): AppError {
  const normalized = normalizeError(error);
  logUI("ERROR", "ui.pets.mutation_fail", {
    op,
    code: normalized.code,
    ...context,
  });

  const nextEvents = [...pruneFailures(failureEvents), now()];
  failureEvents = nextEvents.slice(Math.max(0, nextEvents.length - MAX_FAILURE_EVENTS));

  return normalized;
}

export function getPetsMutationFailureStats(): PetsMutationFailureStats {
  const events = pruneFailures(failureEvents);
  return {
    failure_events: events.map((ts) => new Date(ts).toISOString()),
    last_24h_failures: events.length,
  };
}

export const __testing = {
  setNow(next: () => number): void {
    now = next;
  },
  reset(): void {
    failureEvents = [];
    now = () => Date.now();
  },
};
