import { logUI } from "@lib/uiLog";
import { normalizeError } from "@lib/http/call";

export interface TimeItOptions {
  /** Extra details attached to the timing line, success or not. */
  fields?: Record<string, unknown>;
  clock?: () => number;
}

const defaultClock = (): number =>
  typeof performance !== "undefined" ? performance.now() : Date.now();

/**
 * Runs `fn` and logs one `perf.pets.timing` line for it: INFO when it
 * resolves, WARN with the error code when it rejects. Rejections come back
 * out normalized.
 */
export async function timeIt<T>(
  name: string,
  fn: () => Promise<T>,
  { fields = {}, clock = defaultClock }: TimeItOptions = {},
): Promise<T> {
  const startedAt = clock();
  const elapsed = () => Math.max(0, Math.round(clock() - startedAt));

  try {
    const result = await fn();
    logUI("INFO", "perf.pets.timing", { ...fields, name, ok: true, duration_ms: elapsed() });
    return result;
  } catch (error) {
    const normalized = normalizeError(error);
    logUI("WARN", "perf.pets.timing", {
      ...fields,
      name,
      ok: false,
      duration_ms: elapsed(),
      code: normalized.code,
    });
    throw normalized;
  }
}
