import { beforeEach, describe, expect, it, vi } from "vitest";

const { logSpy } = vi.hoisted(() => ({ logSpy: vi.fn() }));

vi.mock("@lib/uiLog", () => ({
  logUI: logSpy,
}));

import { timeIt } from "@lib/obs/timeIt";

function steppingClock(...times: number[]): () => number {
  let index = 0;
  return () => times[Math.min(index++, times.length - 1)] ?? 0;
}

beforeEach(() => {
  logSpy.mockReset();
});

describe("timeIt", () => {
  it("logs one INFO timing line on success", async () => {
    const result = await timeIt("list.load", async () => 42, { clock: steppingClock(100, 112.4) });

    expect(result).toBe(42);
    expect(logSpy).toHaveBeenCalledTimes(1);
    expect(logSpy).toHaveBeenCalledWith("INFO", "perf.pets.timing", {
      name: "list.load",
      ok: true,
      duration_ms: 12,
    });
  });

  it("logs a WARN line with the code and rethrows the normalized error", async () => {
    await expect(
      timeIt(
        "delete",
        async () => {
          throw new Error("boom");
        },
        { fields: { pet_id: 5 }, clock: steppingClock(1000, 1003) },
      ),
    ).rejects.toEqual({ code: "APP/UNKNOWN", message: "boom" });

    expect(logSpy).toHaveBeenCalledWith("WARN", "perf.pets.timing", {
      pet_id: 5,
      name: "delete",
      ok: false,
      duration_ms: 3,
      code: "APP/UNKNOWN",
    });
  });

  it("does not let fields override the timing keys", async () => {
    await timeIt("list.load", async () => undefined, {
      fields: { name: "other", ok: false },
      clock: steppingClock(0, 0),
    });

    expect(logSpy).toHaveBeenCalledWith("INFO", "perf.pets.timing", {
      name: "list.load",
      ok: true,
      duration_ms: 0,
    });
  });
});
