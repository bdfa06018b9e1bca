import { describe, expect, it } from "vitest";
import { pLimit } from "../src/lib/pLimit";

describe("pLimit", () => {
  it("caps the number of tasks in flight", async () => {
    const limit = pLimit(2);
    let active = 0;
    let peak = 0;

    const task = (value: number) =>
      limit(async () => {
        active++;
        peak = Math.max(peak, active);
        await new Promise((resolve) => setTimeout(resolve, 5));
        active--;
        return value;
      });

    const results = await Promise.all([1, 2, 3, 4, 5].map(task));
    expect(results).toEqual([1, 2, 3, 4, 5]);
    expect(peak).toBe(2);
  });

  it("keeps going after a rejection", async () => {
    const limit = pLimit(1);
    const failing = limit(() => Promise.reject(new Error("boom")));
    const next = limit(async () => "ok");

    await expect(failing).rejects.toThrow("boom");
    await expect(next).resolves.toBe("ok");
  });

  it("rejects invalid concurrency", () => {
    expect(() => pLimit(0)).toThrow(TypeError);
  });
});
